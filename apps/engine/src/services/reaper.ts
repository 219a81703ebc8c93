import { Db } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { TaskRepository } from '../repositories/task.repository';
import { encodeError } from '../db/task.mapper';
import { BackoffPolicy, calculateBackOff, DEFAULT_BACKOFF } from '../utils/backoff';

const TAG = '[reaper]';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReapedTask {
    id: string;
    kind: string;
    attempts: number;
    action: 'retry-scheduled' | 'failed';
}

export interface ReaperConfig {
    intervalMs: number;
    // same policy the runner uses for failed attempts
    backoff?: BackoffPolicy;
    // terminal tasks older than this are purged; 0 keeps them forever
    retentionDays?: number;
}

const CLAIM_EXPIRED = encodeError({
    name: 'ClaimExpiredError',
    message: 'Claim expired before the task finished (daemon stopped or crashed); retry scheduled',
    classification: 'transient',
});

const CLAIM_EXPIRED_EXHAUSTED = encodeError({
    name: 'ClaimExpiredError',
    message: 'Claim expired on the final attempt (daemon stopped or crashed)',
    classification: 'transient',
});

// Recovers tasks whose claim expired because the daemon holding them died.
// Runs once at daemon startup, before polling, then on an interval.
export class Reaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private running = false;
    private readonly tx: TransactionManager;

    constructor(
        private readonly db: Db,
        private readonly taskRepo: Pick<TaskRepository, 'purge'>,
        private readonly config: ReaperConfig,
        private readonly clock: () => number = Date.now,
    ) {
        this.tx = new TransactionManager(db);
    }

    start(): ReapedTask[] {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return [];
        }
        this.running = true;
        console.log(`${TAG} started (interval: ${this.config.intervalMs}ms)`);

        // Startup scan, then on schedule
        const reaped = this.reap();
        this.intervalHandle = setInterval(() => this.reap(), this.config.intervalMs);
        return reaped;
    }

    stop(): void {
        this.running = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    reap(): ReapedTask[] {
        const reaped: ReapedTask[] = [];

        try {
            const now = this.clock();
            reaped.push(...this.retryExpiredClaims(now));
            reaped.push(...this.failExhaustedClaims(now));

            if (reaped.length > 0) {
                console.log(`${TAG} reaped ${reaped.length} tasks: ${reaped.map(t => `${t.id}(${t.action})`).join(', ')}`);
            }

            const retentionDays = this.config.retentionDays ?? 0;
            if (retentionDays > 0) {
                const purged = this.taskRepo.purge(new Date(now - retentionDays * DAY_MS));
                if (purged > 0) {
                    console.log(`${TAG} purged ${purged} tasks older than ${retentionDays} days`);
                }
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        }

        return reaped;
    }

    // running → failed with retry_at, so the daemon's retry promotion requeues
    // the task once its backoff elapses.
    private retryExpiredClaims(now: number): ReapedTask[] {
        const backoff = this.config.backoff ?? DEFAULT_BACKOFF;
        const select = this.db.prepare<[{ now: number }], Omit<ReapedTask, 'action'>>(
            `SELECT id, kind, attempts FROM tasks
             WHERE status = 'running'
               AND lock_expiry < @now
               AND attempts < max_attempts`,
        );
        const update = this.db.prepare<[{ id: string; now: number; retryAt: number; error: string | null }]>(
            `UPDATE tasks
             SET status = 'failed', lock_owner = NULL, lock_expiry = NULL, retry_at = @retryAt,
                 cancel_requested = 0, error = @error, updated_at = @now
             WHERE id = @id AND status = 'running' AND lock_expiry < @now`,
        );

        return this.tx.run(() => select.all({ now })
            .filter(row => update.run({
                id: row.id,
                now,
                retryAt: now + calculateBackOff(row.attempts, backoff),
                error: CLAIM_EXPIRED,
            }).changes === 1)
            .map(row => ({ ...row, action: 'retry-scheduled' as const })));
    }

    private failExhaustedClaims(now: number): ReapedTask[] {
        const rows = this.db.prepare<[{ now: number; error: string | null }], Omit<ReapedTask, 'action'>>(
            `UPDATE tasks
             SET status = 'failed', lock_owner = NULL, lock_expiry = NULL, retry_at = NULL,
                 cancel_requested = 0, error = @error, finished_at = @now, updated_at = @now
             WHERE status = 'running'
               AND lock_expiry < @now
               AND attempts >= max_attempts
             RETURNING id, kind, attempts`,
        ).all({ now, error: CLAIM_EXPIRED_EXHAUSTED });

        return rows.map(row => ({ ...row, action: 'failed' as const }));
    }
}
