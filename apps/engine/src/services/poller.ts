import { TaskRepository } from '../repositories/task.repository';
import { TaskEntity } from '../db/task.entity';

const TAG = '[poller]';

export interface PollerConfig {
    workerId: string;
    claimTtlMs: number;
    // idle wait between empty polls; the latency/efficiency knob
    pollIntervalMs: number;
    onTaskReceived: (task: TaskEntity) => Promise<void>;
    // runs before each claim attempt, e.g. to promote due retries
    beforePoll?: () => void;
}

/**
 * Serialized poll loop: claim one task, run it to the end, then immediately
 * poll again. Sleeps pollIntervalMs only when the queue came back empty.
 */
export class Poller {
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private _lastPollAt: Date | null = null;
    private _processed = 0;

    constructor(
        private readonly taskRepo: Pick<TaskRepository, 'claimNext'>,
        private readonly config: PollerConfig,
    ) { }

    get lastPollAt(): Date | null {
        return this._lastPollAt;
    }

    get processed(): number {
        return this._processed;
    }

    isRunning(): boolean {
        return this.running;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.config.workerId}, interval: ${this.config.pollIntervalMs}ms)`);
        void this.poll();
    }

    /** Stops polling; resolves once the in-flight task, if any, has finished. */
    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        if (this.inFlight) {
            console.log(`${TAG} waiting for in-flight task`);
            await Promise.allSettled([this.inFlight]);
        }
        console.log(`${TAG} stopped`);
    }

    private async poll(): Promise<void> {
        this.currentTimeout = null;
        if (!this.running) return;

        let delay = this.config.pollIntervalMs;

        try {
            this.config.beforePoll?.();
            const task = this.taskRepo.claimNext(this.config.workerId, this.config.claimTtlMs);
            this._lastPollAt = new Date();

            if (task) {
                delay = 0;
                this.inFlight = this.config.onTaskReceived(task);
                try {
                    await this.inFlight;
                } catch (err) {
                    console.error(`${TAG} task ${task.id} callback error:`, err);
                } finally {
                    this.inFlight = null;
                    this._processed++;
                }
            }
        } catch (err) {
            console.error(`${TAG} dequeue error:`, err);
        }

        if (this.running) {
            this.currentTimeout = setTimeout(() => void this.poll(), delay);
        }
    }
}
