import { TaskRepository } from '../repositories/task.repository';

const TAG = '[heartbeat]';

export interface HeartbeatConfig {
    workerId: string;
    claimTtlMs: number;
    intervalMs?: number;
}

interface Tracked {
    handle: NodeJS.Timeout;
    controller: AbortController;
}

/**
 * Keeps the claim of running tasks alive by pushing lock_expiry forward.
 * Also the channel for cooperative stops: when a tick sees cancel_requested,
 * or finds the claim taken away, it aborts the task's controller.
 */
export class HeartbeatService {
    private readonly intervalMs: number;
    private readonly tracked = new Map<string, Tracked>();

    constructor(
        private readonly taskRepo: Pick<TaskRepository, 'heartbeat'>,
        private readonly config: HeartbeatConfig,
    ) {
        this.intervalMs = config.intervalMs ?? Math.max(1, Math.floor(config.claimTtlMs / 3));
    }

    start(taskId: string, controller: AbortController): void {
        if (this.tracked.has(taskId)) {
            console.warn(`${TAG} already running for task ${taskId}, restarting`);
            this.stop(taskId);
        }

        const handle = setInterval(() => this.tick(taskId), this.intervalMs);
        this.tracked.set(taskId, { handle, controller });
        console.log(`${TAG} started for task ${taskId} (interval: ${this.intervalMs}ms)`);
    }

    stop(taskId: string): void {
        const entry = this.tracked.get(taskId);
        if (!entry) return;
        clearInterval(entry.handle);
        this.tracked.delete(taskId);
        console.log(`${TAG} stopped for task ${taskId}`);
    }

    stopAll(): void {
        for (const taskId of [...this.tracked.keys()]) {
            this.stop(taskId);
        }
    }

    isTracking(taskId: string): boolean {
        return this.tracked.has(taskId);
    }

    tick(taskId: string): void {
        const entry = this.tracked.get(taskId);
        if (!entry) return;

        try {
            const beat = this.taskRepo.heartbeat(taskId, this.config.workerId, this.config.claimTtlMs);
            if (beat === null) {
                console.warn(`${TAG} lost claim on task ${taskId}`);
                entry.controller.abort(new Error(`Claim on task ${taskId} was lost`));
                this.stop(taskId);
                return;
            }
            if (beat.cancelRequested && !entry.controller.signal.aborted) {
                console.log(`${TAG} stop requested for task ${taskId}`);
                entry.controller.abort(new Error('cancel requested'));
            }
        } catch (err) {
            console.error(`${TAG} failed to update for task ${taskId}:`, err);
        }
    }
}
