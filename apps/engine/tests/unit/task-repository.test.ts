import { Db, closeDatabase } from '../../src/db';
import { taskPriority, taskStatus } from '../../src/db/task.entity';
import { InvalidStateError, NotFoundError, ValidationError } from '../../src/errors/queue.errors';
import { TaskRepository } from '../../src/repositories/task.repository';
import { createClock, createTestDb, ManualClock, T0 } from '../helpers/db';

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('TaskRepository', () => {
    let db: Db;
    let clock: ManualClock;
    let repo: TaskRepository;

    beforeEach(() => {
        db = createTestDb();
        clock = createClock();
        repo = new TaskRepository(db, clock.now);
    });

    afterEach(() => {
        closeDatabase(db);
    });

    describe('create', () => {
        it('creates a pending task with defaults', () => {
            const task = repo.create({ kind: 'send-prompt', payload: { prompt: 'hi' } });

            expect(task.id).toMatch(UUID_V7);
            expect(task.status).toBe(taskStatus.PENDING);
            expect(task.priority).toBe(taskPriority.NORMAL);
            expect(task.attempts).toBe(0);
            expect(task.max_attempts).toBe(3);
            expect(task.payload).toEqual({ prompt: 'hi' });
            expect(task.result).toBeUndefined();
            expect(task.error).toBeNull();
            expect(task.lock_owner).toBeNull();
            expect(task.cancel_requested).toBe(false);
            expect(task.created_at.getTime()).toBe(T0);
            expect(task.finished_at).toBeNull();
        });

        it('rejects max_attempts below 1', () => {
            expect(() => repo.create({ kind: 'send-prompt', payload: {}, maxAttempts: 0 })).toThrow(ValidationError);
        });

        it('rejects payloads over the size limit', () => {
            const huge = { prompt: 'x'.repeat(1024 * 1024) };
            expect(() => repo.create({ kind: 'send-prompt', payload: huge })).toThrow(ValidationError);
            expect(() => repo.create({ kind: 'send-prompt', payload: huge })).toThrow(/^payload size exceeds maximum limit of 1\.00MB/);
        });

        it('round-trips dates inside the payload', () => {
            const due = new Date('2026-04-01T00:00:00.000Z');
            const task = repo.create({ kind: 'send-prompt', payload: { prompt: 'hi', due } });
            expect(repo.get(task.id).payload).toEqual({ prompt: 'hi', due });
        });
    });

    describe('get / findById', () => {
        it('returns null or throws for unknown ids', () => {
            expect(repo.findById('nope')).toBeNull();
            expect(() => repo.get('nope')).toThrow(NotFoundError);
            expect(() => repo.get('nope')).toThrow('Task nope not found');
        });
    });

    describe('claimNext', () => {
        it('claims by priority, then by age', () => {
            const low = repo.create({ kind: 'k', payload: {}, priority: taskPriority.LOW });
            clock.advance(1);
            const urgentOld = repo.create({ kind: 'k', payload: {}, priority: taskPriority.URGENT });
            clock.advance(1);
            const normal = repo.create({ kind: 'k', payload: {}, priority: taskPriority.NORMAL });
            clock.advance(1);
            const urgentNew = repo.create({ kind: 'k', payload: {}, priority: taskPriority.URGENT });

            const order = [1, 2, 3, 4].map(() => repo.claimNext('w1', 1000)?.id);
            expect(order).toEqual([urgentOld.id, urgentNew.id, normal.id, low.id]);
            expect(repo.claimNext('w1', 1000)).toBeNull();
        });

        it('breaks ties on identical timestamps by insertion order', () => {
            const first = repo.create({ kind: 'k', payload: {} });
            const second = repo.create({ kind: 'k', payload: {} });

            expect(repo.peekNext()?.id).toBe(first.id);
            expect(repo.claimNext('w1', 1000)?.id).toBe(first.id);
            expect(repo.claimNext('w1', 1000)?.id).toBe(second.id);
        });

        it('marks the claim on the record', () => {
            const created = repo.create({ kind: 'k', payload: {} });
            clock.advance(500);

            const claimed = repo.claimNext('w1', 1000);

            expect(claimed?.id).toBe(created.id);
            expect(claimed?.status).toBe(taskStatus.RUNNING);
            expect(claimed?.attempts).toBe(1);
            expect(claimed?.lock_owner).toBe('w1');
            expect(claimed?.lock_expiry?.getTime()).toBe(T0 + 1500);
            expect(claimed?.started_at?.getTime()).toBe(T0 + 500);
        });

        it('skips tasks that are not pending', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.update(task.id, { status: taskStatus.CANCELLED });
            expect(repo.claimNext('w1', 1000)).toBeNull();
            expect(repo.peekNext()).toBeNull();
        });
    });

    describe('claim', () => {
        it('claims a specific pending task once', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            expect(repo.claim(task.id, 'w1', 1000)?.lock_owner).toBe('w1');
            expect(repo.claim(task.id, 'w2', 1000)).toBeNull();
        });
    });

    describe('heartbeat', () => {
        it('extends the claim for its owner only', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            clock.advance(500);

            expect(repo.heartbeat(task.id, 'w1', 1000)).toEqual({ cancelRequested: false });
            expect(repo.get(task.id).lock_expiry?.getTime()).toBe(T0 + 1500);
            expect(repo.heartbeat(task.id, 'w2', 1000)).toBeNull();
        });

        it('reports a raised stop flag', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            repo.update(task.id, { cancelRequested: true });

            expect(repo.heartbeat(task.id, 'w1', 1000)).toEqual({ cancelRequested: true });
        });
    });

    describe('complete / fail', () => {
        it('completes a task for the claim owner', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            clock.advance(200);

            expect(repo.complete(task.id, 'w2', { content: 'stolen' })).toBeNull();
            const done = repo.complete(task.id, 'w1', { content: 'answer' });

            expect(done?.status).toBe(taskStatus.COMPLETED);
            expect(done?.result).toEqual({ content: 'answer' });
            expect(done?.lock_owner).toBeNull();
            expect(done?.lock_expiry).toBeNull();
            expect(done?.finished_at?.getTime()).toBe(T0 + 200);
        });

        it('records a retryable failure without finishing the task', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            const retryAt = new Date(T0 + 5000);

            const failed = repo.fail(task.id, 'w1', { name: 'Error', message: 'rate limited', classification: 'transient' }, retryAt);

            expect(failed?.status).toBe(taskStatus.FAILED);
            expect(failed?.retry_at?.getTime()).toBe(T0 + 5000);
            expect(failed?.finished_at).toBeNull();
            expect(failed?.error).toEqual({ name: 'Error', message: 'rate limited', classification: 'transient' });
        });

        it('records a terminal failure with finished_at', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            clock.advance(10);

            const failed = repo.fail(task.id, 'w1', { name: 'PermanentTaskError', message: 'bad', classification: 'permanent' }, null);

            expect(failed?.retry_at).toBeNull();
            expect(failed?.finished_at?.getTime()).toBe(T0 + 10);
        });
    });

    describe('promoteDueRetries', () => {
        it('moves failed tasks back to pending once their backoff elapsed', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            repo.fail(task.id, 'w1', { name: 'Error', message: 'x', classification: 'transient' }, new Date(T0 + 5000));

            expect(repo.promoteDueRetries(T0 + 4999)).toEqual([]);
            expect(repo.promoteDueRetries(T0 + 5000)).toEqual([task.id]);

            const promoted = repo.get(task.id);
            expect(promoted.status).toBe(taskStatus.PENDING);
            expect(promoted.retry_at).toBeNull();
            expect(promoted.attempts).toBe(1);
        });
    });

    describe('update', () => {
        it('applies field changes and stamps updated_at', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            clock.advance(100);

            const updated = repo.update(task.id, { priority: taskPriority.HIGH });

            expect(updated.priority).toBe(taskPriority.HIGH);
            expect(updated.updated_at.getTime()).toBe(T0 + 100);
        });

        it('stamps finished_at when a task becomes terminal and clears it on requeue', () => {
            const task = repo.create({ kind: 'k', payload: {} });
            clock.advance(50);

            const cancelled = repo.update(task.id, { status: taskStatus.CANCELLED });
            expect(cancelled.finished_at?.getTime()).toBe(T0 + 50);

            const requeued = repo.update(task.id, { status: taskStatus.PENDING });
            expect(requeued.finished_at).toBeNull();
        });

        it('rolls back when the mutation vetoes', () => {
            const task = repo.create({ kind: 'k', payload: {} });

            expect(() => repo.update(task.id, () => {
                throw new InvalidStateError('no');
            })).toThrow(InvalidStateError);
            expect(repo.get(task.id).status).toBe(taskStatus.PENDING);
        });

        it('throws NotFoundError for unknown ids', () => {
            expect(() => repo.update('nope', { priority: taskPriority.LOW })).toThrow(NotFoundError);
        });
    });

    describe('delete', () => {
        it('deletes existing tasks and reports missing ones', () => {
            const task = repo.create({ kind: 'k', payload: {} });

            expect(repo.delete(task.id)).toBe(true);
            expect(repo.findById(task.id)).toBeNull();
            expect(repo.delete(task.id)).toBe(false);
        });

        it('keeps the task when the guard refuses', () => {
            const task = repo.create({ kind: 'k', payload: {} });

            expect(() => repo.delete(task.id, () => {
                throw new InvalidStateError('pending');
            })).toThrow('pending');
            expect(repo.findById(task.id)).not.toBeNull();
        });
    });

    describe('list', () => {
        let a: string;
        let b: string;
        let c: string;

        beforeEach(() => {
            a = repo.create({ kind: 'send-prompt', payload: {}, priority: taskPriority.LOW }).id;
            clock.advance(1000);
            b = repo.create({ kind: 'refine', payload: {}, priority: taskPriority.HIGH }).id;
            clock.advance(1000);
            c = repo.create({ kind: 'send-prompt', payload: {} }).id;
            repo.update(c, { status: taskStatus.CANCELLED });
        });

        it('lists newest first', () => {
            expect(repo.list().map(t => t.id)).toEqual([c, b, a]);
        });

        it('combines filters with AND', () => {
            expect(repo.list({ kind: 'send-prompt' }).map(t => t.id)).toEqual([c, a]);
            expect(repo.list({ kind: 'send-prompt', status: taskStatus.PENDING }).map(t => t.id)).toEqual([a]);
            expect(repo.list({ priority: [taskPriority.HIGH, taskPriority.LOW] }).map(t => t.id)).toEqual([b, a]);
            expect(repo.list({ status: [] }).map(t => t.id)).toEqual([c, b, a]);
        });

        it('filters by creation time', () => {
            expect(repo.list({ createdAfter: new Date(T0 + 1000) }).map(t => t.id)).toEqual([c, b]);
            expect(repo.list({ createdBefore: new Date(T0 + 1000) }).map(t => t.id)).toEqual([a]);
        });

        it('returns every match when no limit is given', () => {
            for (let i = 0; i < 150; i++) {
                repo.create({ kind: 'bulk', payload: {} });
            }

            expect(repo.list({ kind: 'bulk' })).toHaveLength(150);
            expect(repo.list({ kind: 'bulk', offset: 140 })).toHaveLength(10);
        });

        it('pages with limit and offset', () => {
            expect(repo.list({ limit: 1 }).map(t => t.id)).toEqual([c]);
            expect(repo.list({ limit: 1, offset: 1 }).map(t => t.id)).toEqual([b]);
            expect(() => repo.list({ limit: 0 })).toThrow(ValidationError);
            expect(() => repo.list({ offset: -1 })).toThrow(ValidationError);
        });
    });

    describe('stats', () => {
        it('counts by status and kind', () => {
            repo.create({ kind: 'send-prompt', payload: {} });
            clock.advance(10);
            const second = repo.create({ kind: 'refine', payload: {} });
            repo.create({ kind: 'send-prompt', payload: {} });
            repo.update(second.id, { status: taskStatus.CANCELLED });

            expect(repo.stats()).toEqual({
                total: 3,
                byStatus: { pending: 2, running: 0, completed: 0, failed: 0, cancelled: 1 },
                byKind: { refine: 1, 'send-prompt': 2 },
                oldestPendingAt: new Date(T0),
            });
        });

        it('reports an empty store', () => {
            expect(repo.stats()).toEqual({
                total: 0,
                byStatus: { pending: 0, running: 0, completed: 0, failed: 0, cancelled: 0 },
                byKind: {},
                oldestPendingAt: null,
            });
        });
    });

    describe('purge', () => {
        it('deletes only terminal tasks finished before the cutoff', () => {
            const done = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            repo.complete(done.id, 'w1', 'ok');

            const waiting = repo.create({ kind: 'k', payload: {} });
            repo.claimNext('w1', 1000);
            repo.fail(waiting.id, 'w1', { name: 'Error', message: 'x', classification: 'transient' }, new Date(T0 + 100));

            const pending = repo.create({ kind: 'k', payload: {} });
            clock.advance(1000);
            const recent = repo.create({ kind: 'k', payload: {} });
            repo.update(recent.id, { status: taskStatus.CANCELLED });

            expect(repo.purge(new Date(T0 + 1))).toBe(1);
            expect(repo.findById(done.id)).toBeNull();
            expect(repo.findById(waiting.id)).not.toBeNull();
            expect(repo.findById(pending.id)).not.toBeNull();
            expect(repo.findById(recent.id)).not.toBeNull();
        });
    });
});
