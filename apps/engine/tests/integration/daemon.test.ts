import { existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { defineHandler, PermanentTaskError, TransientTaskError } from '@promptqueue/sdk';
import { QueueOperations } from '../../src/api/operations.service';
import { closeDatabase, Db } from '../../src/db';
import { taskStatus } from '../../src/db/task.entity';
import { ProcessMarker } from '../../src/daemon/process-marker';
import { createDefaultRegistry } from '../../src/handlers';
import { TaskRepository } from '../../src/repositories/task.repository';
import { QueueDaemon } from '../../src/services/daemon';
import { createTempDir, createTestDb, removeDir } from '../helpers/db';
import { recordingRegistry, Recorder, testQueueConfig } from '../helpers/daemon';
import { FakeLlm } from '../helpers/fake-llm';
import { sleep, waitUntil } from '../helpers/poll';

describe('QueueDaemon', () => {
    let db: Db;
    let repo: TaskRepository;
    let ops: QueueOperations;
    let recorder: Recorder;
    let daemon: QueueDaemon;
    let flakyCalls: number;

    const isDone = (id: string) => () => {
        const { status, retry_at } = repo.get(id);
        return status === taskStatus.COMPLETED || status === taskStatus.CANCELLED
            || (status === taskStatus.FAILED && retry_at === null);
    };

    beforeEach(() => {
        db = createTestDb();
        repo = new TaskRepository(db);
        flakyCalls = 0;
        recorder = recordingRegistry([
            defineHandler({
                kind: 'flaky-once',
                schema: z.object({}),
                handler: async () => {
                    flakyCalls++;
                    if (flakyCalls === 1) throw new TransientTaskError('rate limited');
                    return 'ok';
                },
            }),
            defineHandler({
                kind: 'always-transient',
                schema: z.object({}),
                handler: async () => {
                    throw new TransientTaskError('endpoint unreachable');
                },
            }),
            defineHandler({
                kind: 'always-permanent',
                schema: z.object({}),
                handler: async () => {
                    throw new PermanentTaskError('model not found');
                },
            }),
            defineHandler({
                kind: 'wait-for-stop',
                schema: z.object({}),
                handler: ({ signal }) => new Promise<never>((_, reject) => {
                    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
                }),
            }),
        ]);
        ops = new QueueOperations(repo, { registry: recorder.registry });
        daemon = new QueueDaemon({ db, registry: recorder.registry, queue: testQueueConfig(), workerId: 'daemon-test' });
    });

    afterEach(async () => {
        await daemon.stop();
        closeDatabase(db);
    });

    it('runs a send-prompt task from submission to a stored result', async () => {
        const llm = new FakeLlm();
        const registry = createDefaultRegistry({ llm });
        const prompts = new QueueOperations(repo, { registry });
        daemon = new QueueDaemon({ db, registry, queue: testQueueConfig(), workerId: 'daemon-test' });

        const id = prompts.add({ kind: 'send-prompt', payload: { prompt: 'hi' }, priority: 'high' });
        expect(prompts.list({ status: 'pending' }).map(t => t.id)).toEqual([id]);

        daemon.start();
        await waitUntil(isDone(id), 3000, 10);

        const detail = prompts.status(id);
        expect(detail.status).toBe(taskStatus.COMPLETED);
        expect(detail.priority).toBe('high');
        expect(detail.result).toEqual({ content: 'echo: hi', model: 'fake-model' });
        expect(detail.finishedAt).toBeInstanceOf(Date);
        expect(llm.requests.map(r => r.prompt)).toEqual(['hi']);
    });

    it('runs queued tasks by priority, then age', async () => {
        const low = ops.add({ kind: 'record', priority: 'low' });
        const normal = ops.add({ kind: 'record' });
        const urgent = ops.add({ kind: 'record', priority: 'urgent' });
        const high = ops.add({ kind: 'record', priority: 'high' });
        const normal2 = ops.add({ kind: 'record' });

        daemon.start();
        await waitUntil(() => recorder.ran.length === 5, 3000, 10);

        expect(recorder.ran).toEqual([urgent, high, normal, normal2, low]);
    });

    it('retries a transient failure after backoff', async () => {
        const id = ops.add({ kind: 'flaky-once' });

        daemon.start();
        await waitUntil(isDone(id), 3000, 10);

        const task = repo.get(id);
        expect(task.status).toBe(taskStatus.COMPLETED);
        expect(task.attempts).toBe(2);
        expect(task.result).toBe('ok');
        expect(task.error).toBeNull();
    });

    it('gives up once attempts are exhausted', async () => {
        const id = ops.add({ kind: 'always-transient', maxAttempts: 2 });

        daemon.start();
        await waitUntil(isDone(id), 3000, 10);

        const task = repo.get(id);
        expect(task.status).toBe(taskStatus.FAILED);
        expect(task.attempts).toBe(2);
        expect(task.error).toEqual({ name: 'TransientTaskError', message: 'endpoint unreachable', classification: 'transient' });
        expect(task.finished_at).not.toBeNull();
    });

    it('does not retry a permanent failure', async () => {
        const id = ops.add({ kind: 'always-permanent' });

        daemon.start();
        await waitUntil(isDone(id), 3000, 10);

        expect(repo.get(id).attempts).toBe(1);
        expect(repo.get(id).error?.classification).toBe('permanent');
    });

    it('stops a running task when cancel is requested', async () => {
        const id = ops.add({ kind: 'wait-for-stop' });

        daemon.start();
        await waitUntil(() => repo.get(id).status === taskStatus.RUNNING, 3000, 5);
        expect(ops.cancel(id).status).toBe(taskStatus.RUNNING);
        await waitUntil(isDone(id), 3000, 10);

        const task = repo.get(id);
        expect(task.status).toBe(taskStatus.FAILED);
        expect(task.attempts).toBe(1);
        expect(task.error?.classification).toBe('cancelled');
        expect(task.cancel_requested).toBe(false);
    });

    it('keeps running after a task fails and reports its status', async () => {
        ops.add({ kind: 'always-permanent' });
        const after = ops.add({ kind: 'record' });

        daemon.start();
        await waitUntil(isDone(after), 3000, 10);

        const status = daemon.status();
        expect(status.running).toBe(true);
        expect(status.workerId).toBe('daemon-test');
        expect(status.processed).toBe(2);
        expect(status.lastPollAt).toBeInstanceOf(Date);

        await daemon.stop();
        expect(daemon.status().running).toBe(false);
    });

    it('waits for the in-flight task on stop', async () => {
        const slow = recordingRegistry([
            defineHandler({
                kind: 'slow',
                schema: z.object({}),
                handler: async () => {
                    await sleep(80);
                    return 'finished';
                },
            }),
        ]);
        daemon = new QueueDaemon({ db, registry: slow.registry, queue: testQueueConfig(), workerId: 'daemon-test' });
        const id = repo.create({ kind: 'slow', payload: {} }).id;

        daemon.start();
        await waitUntil(() => repo.get(id).status === taskStatus.RUNNING, 3000, 5);
        await daemon.stop();

        expect(repo.get(id).status).toBe(taskStatus.COMPLETED);
        expect(repo.get(id).result).toBe('finished');
    });

    describe('process marker', () => {
        let dir: string;

        beforeEach(() => {
            dir = createTempDir();
        });

        afterEach(() => {
            removeDir(dir);
        });

        it('allows a single daemon per marker and releases it on stop', async () => {
            const file = join(dir, 'daemon.state.json');
            daemon = new QueueDaemon({
                db,
                registry: recorder.registry,
                queue: testQueueConfig(),
                marker: new ProcessMarker(file, { staleAfterMs: 30_000 }),
                workerId: 'daemon-1',
                version: '0.1.0',
            });
            const second = new QueueDaemon({
                db,
                registry: recorder.registry,
                queue: testQueueConfig(),
                marker: new ProcessMarker(file, { staleAfterMs: 30_000 }),
                workerId: 'daemon-2',
            });

            expect(daemon.start()).toBe(true);
            expect(second.start()).toBe(false);
            expect(second.status().running).toBe(false);

            const marker = new ProcessMarker(file, { staleAfterMs: 30_000 });
            expect(marker.read()).toMatchObject({ pid: process.pid, instanceId: 'daemon-1', version: '0.1.0' });

            ops.add({ kind: 'record' });
            await waitUntil(() => marker.read()?.processed === 1, 3000, 10);

            await daemon.stop();
            expect(existsSync(file)).toBe(false);
        });
    });
});
