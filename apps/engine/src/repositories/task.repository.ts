import { v7 as uuid } from 'uuid';
import { serialize, SerializationError, TaskPayload } from '@promptqueue/sdk';
import { Db } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { TaskEntity, TaskErrorDetail, TaskRow, taskPriority, taskStatus } from '../db/task.entity';
import { encodeError, isTaskStatus, rankOf, toEntity } from '../db/task.mapper';
import { NotFoundError, StoreError, ValidationError } from '../errors/queue.errors';
import { isTerminal } from '../task-state';

export interface NewTask {
    kind: string;
    payload: TaskPayload;
    priority?: taskPriority;
    maxAttempts?: number;
}

export interface TaskFilter {
    status?: taskStatus | taskStatus[];
    priority?: taskPriority | taskPriority[];
    kind?: string | string[];
    createdAfter?: Date;
    createdBefore?: Date;
    // every match when omitted
    limit?: number;
    offset?: number;
}

/**
 * Field changes applied by `update`. `result` is cleared when present and undefined.
 * Leaving `running` always drops the claim; entering a terminal state stamps
 * `finished_at` once.
 */
export interface TaskMutation {
    status?: taskStatus;
    priority?: taskPriority;
    attempts?: number;
    maxAttempts?: number;
    result?: unknown;
    error?: TaskErrorDetail | null;
    retryAt?: Date | null;
    cancelRequested?: boolean;
}

export interface QueueStats {
    total: number;
    byStatus: Record<taskStatus, number>;
    byKind: Record<string, number>;
    oldestPendingAt: Date | null;
}

type SqlValue = string | number | null;


// Claim columns shared by claimNext and claim
const CLAIM_SET = `
    status = 'running',
    attempts = attempts + 1,
    lock_owner = @owner,
    lock_expiry = @expiry,
    retry_at = NULL,
    started_at = @now,
    updated_at = @now`;

/**
 * Task Record Store and Queue Index over a single SQLite table.
 * Every write is one statement or one IMMEDIATE transaction, so a record is
 * never observed half-written by another connection.
 */
export class TaskRepository {
    private readonly tx: TransactionManager;

    constructor(
        private readonly db: Db,
        private readonly clock: () => number = Date.now,
    ) {
        this.tx = new TransactionManager(db);
    }

    create(task: NewTask): TaskEntity {
        const maxAttempts = task.maxAttempts ?? 3;
        if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
            throw new ValidationError(`max_attempts must be an integer >= 1, got ${maxAttempts}`);
        }
        let payload: string | null;
        try {
            payload = serialize(task.payload, 'payload');
        } catch (err) {
            if (err instanceof SerializationError) throw new ValidationError(err.message);
            throw err;
        }
        if (payload === null) {
            throw new ValidationError('payload is required');
        }

        try {
            const now = this.clock();
            const row = this.db.prepare<unknown[], TaskRow>(
                `INSERT INTO tasks (id, kind, payload, priority, status, attempts, max_attempts, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, 0, ?, ?, ?)
                 RETURNING *`,
            ).get(
                uuid(),
                task.kind,
                payload,
                rankOf(task.priority ?? taskPriority.NORMAL),
                taskStatus.PENDING,
                maxAttempts,
                now,
                now,
            );
            if (!row) throw new Error('insert returned no row');
            return toEntity(row);
        } catch (err) {
            throw StoreError.wrap('create', err);
        }
    }

    findById(id: string): TaskEntity | null {
        try {
            const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('get', err);
        }
    }

    get(id: string): TaskEntity {
        const task = this.findById(id);
        if (!task) throw new NotFoundError(id);
        return task;
    }

    /**
     * Read-check-write in one transaction. A function mutation sees the current
     * record and may throw to veto the change.
     */
    update(id: string, mutation: TaskMutation | ((current: TaskEntity) => TaskMutation)): TaskEntity {
        try {
            return this.tx.run(() => {
                const current = this.get(id);
                const changes = typeof mutation === 'function' ? mutation(current) : mutation;
                return this.apply(current, changes);
            });
        } catch (err) {
            throw StoreError.wrap('update', err);
        }
    }

    /** Returns false when the id does not exist. `guard` may throw to refuse. */
    delete(id: string, guard?: (current: TaskEntity) => void): boolean {
        try {
            return this.tx.run(() => {
                const current = this.findById(id);
                if (!current) return false;
                guard?.(current);
                return this.db.prepare('DELETE FROM tasks WHERE id = ?').run(id).changes === 1;
            });
        } catch (err) {
            throw StoreError.wrap('delete', err);
        }
    }

    /** Newest first. Filters combine with AND. */
    list(filter: TaskFilter = {}): TaskEntity[] {
        const where: string[] = [];
        const params: SqlValue[] = [];

        const addIn = (column: string, values: SqlValue[]) => {
            if (values.length === 0) return;
            where.push(`${column} IN (${values.map(() => '?').join(', ')})`);
            params.push(...values);
        };

        if (filter.status !== undefined) addIn('status', toArray(filter.status));
        if (filter.priority !== undefined) addIn('priority', toArray(filter.priority).map(rankOf));
        if (filter.kind !== undefined) addIn('kind', toArray(filter.kind));
        if (filter.createdAfter) {
            where.push('created_at >= ?');
            params.push(filter.createdAfter.getTime());
        }
        if (filter.createdBefore) {
            where.push('created_at < ?');
            params.push(filter.createdBefore.getTime());
        }

        // SQLite reads a negative LIMIT as "no limit"
        const limit = filter.limit ?? -1;
        const offset = filter.offset ?? 0;
        if (filter.limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
            throw new ValidationError('limit must be a positive integer and offset a non-negative integer');
        }
        if (!Number.isInteger(offset) || offset < 0) {
            throw new ValidationError('limit must be a positive integer and offset a non-negative integer');
        }

        const sql = `SELECT * FROM tasks
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY created_at DESC, seq DESC
            LIMIT ? OFFSET ?`;

        try {
            return this.db.prepare<SqlValue[], TaskRow>(sql).all(...params, limit, offset).map(toEntity);
        } catch (err) {
            throw StoreError.wrap('list', err);
        }
    }

    /** next_eligible without claiming: highest priority, then oldest. */
    peekNext(): TaskEntity | null {
        try {
            const row = this.db.prepare<[], TaskRow>(
                `SELECT * FROM tasks
                 WHERE status = 'pending' AND attempts < max_attempts
                 ORDER BY priority DESC, created_at ASC, seq ASC
                 LIMIT 1`,
            ).get();
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('peek', err);
        }
    }

    /**
     * Select-and-mark in a single UPDATE: the subquery picks the next eligible task
     * and the outer status guard makes a lost race claim nothing.
     */
    claimNext(owner: string, ttlMs: number): TaskEntity | null {
        const now = this.clock();
        try {
            const row = this.db.prepare<[{ owner: string; expiry: number; now: number }], TaskRow>(
                `UPDATE tasks SET ${CLAIM_SET}
                 WHERE seq = (
                     SELECT seq FROM tasks
                     WHERE status = 'pending' AND attempts < max_attempts
                     ORDER BY priority DESC, created_at ASC, seq ASC
                     LIMIT 1
                 )
                 AND status = 'pending'
                 RETURNING *`,
            ).get({ owner, expiry: now + ttlMs, now });
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('claim', err);
        }
    }

    /** Claims a specific task; null when it is no longer pending. */
    claim(id: string, owner: string, ttlMs: number): TaskEntity | null {
        const now = this.clock();
        try {
            const row = this.db.prepare<[{ id: string; owner: string; expiry: number; now: number }], TaskRow>(
                `UPDATE tasks SET ${CLAIM_SET}
                 WHERE id = @id AND status = 'pending' AND attempts < max_attempts
                 RETURNING *`,
            ).get({ id, owner, expiry: now + ttlMs, now });
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('claim', err);
        }
    }

    /** Extends the claim. Null means the caller no longer owns the task. */
    heartbeat(id: string, owner: string, ttlMs: number): { cancelRequested: boolean } | null {
        const now = this.clock();
        try {
            const row = this.db.prepare<[{ id: string; owner: string; expiry: number; now: number }], { cancel_requested: number }>(
                `UPDATE tasks SET lock_expiry = @expiry, updated_at = @now
                 WHERE id = @id AND status = 'running' AND lock_owner = @owner
                 RETURNING cancel_requested`,
            ).get({ id, owner, expiry: now + ttlMs, now });
            return row ? { cancelRequested: row.cancel_requested === 1 } : null;
        } catch (err) {
            throw StoreError.wrap('heartbeat', err);
        }
    }

    /** running → completed, only for the claim owner. Null when the claim was lost. */
    complete(id: string, owner: string, result: unknown): TaskEntity | null {
        const encoded = serialize(result, 'result');
        const now = this.clock();
        try {
            const row = this.db.prepare<[{ id: string; owner: string; result: string | null; now: number }], TaskRow>(
                `UPDATE tasks
                 SET status = 'completed', result = @result, error = NULL,
                     lock_owner = NULL, lock_expiry = NULL, cancel_requested = 0,
                     finished_at = @now, updated_at = @now
                 WHERE id = @id AND status = 'running' AND lock_owner = @owner
                 RETURNING *`,
            ).get({ id, owner, result: encoded, now });
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('complete', err);
        }
    }

    /**
     * running → failed. With `retryAt` the failure waits for promotion back to
     * pending; without it the failure is terminal.
     */
    fail(id: string, owner: string, error: TaskErrorDetail, retryAt: Date | null): TaskEntity | null {
        const now = this.clock();
        try {
            const row = this.db.prepare<[{ id: string; owner: string; error: string | null; retryAt: number | null; finishedAt: number | null; now: number }], TaskRow>(
                `UPDATE tasks
                 SET status = 'failed', error = @error, retry_at = @retryAt,
                     lock_owner = NULL, lock_expiry = NULL, cancel_requested = 0,
                     finished_at = @finishedAt, updated_at = @now
                 WHERE id = @id AND status = 'running' AND lock_owner = @owner
                 RETURNING *`,
            ).get({
                id,
                owner,
                error: encodeError(error),
                retryAt: retryAt ? retryAt.getTime() : null,
                finishedAt: retryAt ? null : now,
                now,
            });
            return row ? toEntity(row) : null;
        } catch (err) {
            throw StoreError.wrap('fail', err);
        }
    }

    /** failed → pending for every retry whose backoff has elapsed. Returns the promoted ids. */
    promoteDueRetries(now: number = this.clock()): string[] {
        try {
            return this.db.prepare<[number, number], { id: string }>(
                `UPDATE tasks
                 SET status = 'pending', retry_at = NULL, updated_at = ?
                 WHERE status = 'failed' AND retry_at IS NOT NULL AND retry_at <= ?
                   AND attempts < max_attempts
                 RETURNING id`,
            ).all(now, now).map(row => row.id);
        } catch (err) {
            throw StoreError.wrap('promote', err);
        }
    }

    stats(): QueueStats {
        try {
            const byStatus: Record<taskStatus, number> = {
                [taskStatus.PENDING]: 0,
                [taskStatus.RUNNING]: 0,
                [taskStatus.COMPLETED]: 0,
                [taskStatus.FAILED]: 0,
                [taskStatus.CANCELLED]: 0,
            };
            let total = 0;
            const statusRows = this.db.prepare<[], { status: string; count: number }>(
                'SELECT status, COUNT(*) AS count FROM tasks GROUP BY status',
            ).all();
            for (const row of statusRows) {
                total += row.count;
                if (isTaskStatus(row.status)) byStatus[row.status] = row.count;
            }

            const byKind: Record<string, number> = {};
            const kindRows = this.db.prepare<[], { kind: string; count: number }>(
                'SELECT kind, COUNT(*) AS count FROM tasks GROUP BY kind ORDER BY kind',
            ).all();
            for (const row of kindRows) {
                byKind[row.kind] = row.count;
            }

            const oldest = this.db.prepare<[], { created_at: number | null }>(
                "SELECT MIN(created_at) AS created_at FROM tasks WHERE status = 'pending'",
            ).get();

            return {
                total,
                byStatus,
                byKind,
                oldestPendingAt: oldest?.created_at ? new Date(oldest.created_at) : null,
            };
        } catch (err) {
            throw StoreError.wrap('stats', err);
        }
    }

    /** Deletes terminal tasks finished before the cutoff. Never touches live work. */
    purge(finishedBefore: Date): number {
        try {
            return this.db.prepare<[number], unknown>(
                `DELETE FROM tasks
                 WHERE finished_at IS NOT NULL AND finished_at < ?
                   AND (status IN ('completed', 'cancelled') OR (status = 'failed' AND retry_at IS NULL))`,
            ).run(finishedBefore.getTime()).changes;
        } catch (err) {
            throw StoreError.wrap('purge', err);
        }
    }

    private apply(current: TaskEntity, changes: TaskMutation): TaskEntity {
        const now = this.clock();
        const sets: string[] = [];
        const params: SqlValue[] = [];
        const set = (column: string, value: SqlValue) => {
            sets.push(`${column} = ?`);
            params.push(value);
        };

        const status = changes.status ?? current.status;
        const retryAt = changes.retryAt !== undefined ? changes.retryAt : current.retry_at;

        if (changes.status !== undefined) set('status', changes.status);
        if (changes.priority !== undefined) set('priority', rankOf(changes.priority));
        if (changes.attempts !== undefined) set('attempts', changes.attempts);
        if (changes.maxAttempts !== undefined) set('max_attempts', changes.maxAttempts);
        if ('result' in changes) set('result', serialize(changes.result, 'result'));
        if (changes.error !== undefined) set('error', encodeError(changes.error));
        if (changes.retryAt !== undefined) set('retry_at', changes.retryAt ? changes.retryAt.getTime() : null);
        if (changes.cancelRequested !== undefined) set('cancel_requested', changes.cancelRequested ? 1 : 0);

        if (current.status === taskStatus.RUNNING && status !== taskStatus.RUNNING) {
            set('lock_owner', null);
            set('lock_expiry', null);
        }
        if (status === taskStatus.PENDING) {
            set('finished_at', null);
        } else if (!isTerminal(current) && isTerminal({ status, retry_at: retryAt })) {
            set('finished_at', now);
        }
        set('updated_at', now);

        const row = this.db.prepare<SqlValue[], TaskRow>(
            `UPDATE tasks SET ${sets.join(', ')} WHERE id = ? RETURNING *`,
        ).get(...params, current.id);
        if (!row) throw new NotFoundError(current.id);
        return toEntity(row);
    }
}

function toArray<T>(value: T | T[]): T[] {
    return Array.isArray(value) ? value : [value];
}
