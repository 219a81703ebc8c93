import { v7 as uuid } from 'uuid';
import { HandlerRegistry } from '@promptqueue/sdk';
import { Db } from '../db';
import { QueueConfig } from '../config';
import { ProcessMarker } from '../daemon/process-marker';
import { TaskRepository } from '../repositories/task.repository';
import { runTask } from '../task-runner';
import { HeartbeatService } from './heartbeat.service';
import { Poller } from './poller';
import { Reaper } from './reaper';
import { TaskExecutor } from './task-executor';

const TAG = '[daemon]';

export interface QueueDaemonOptions {
    db: Db;
    registry: HandlerRegistry;
    queue: QueueConfig;
    // singleton lock; omitted for in-process daemons such as tests
    marker?: ProcessMarker;
    workerId?: string;
    version?: string;
    logFile?: string;
    clock?: () => number;
}

export interface DaemonStatus {
    running: boolean;
    workerId: string;
    startedAt: Date | null;
    uptimeMs: number;
    lastPollAt: Date | null;
    processed: number;
}

/**
 * The run loop: startup crash recovery, then poll → claim → execute → record,
 * one task at a time, until stopped.
 */
export class QueueDaemon {
    readonly workerId: string;
    readonly taskRepo: TaskRepository;
    private readonly reaper: Reaper;
    private readonly heartbeat: HeartbeatService;
    private readonly poller: Poller;
    private readonly clock: () => number;
    private markerTimer: NodeJS.Timeout | null = null;
    private startedAt: number | null = null;

    constructor(private readonly options: QueueDaemonOptions) {
        const { db, queue } = options;
        this.clock = options.clock ?? Date.now;
        this.workerId = options.workerId ?? `daemon-${process.pid}-${uuid().slice(-8)}`;
        this.taskRepo = new TaskRepository(db, this.clock);

        const executor = new TaskExecutor(options.registry);
        this.heartbeat = new HeartbeatService(this.taskRepo, {
            workerId: this.workerId,
            claimTtlMs: queue.claimTtlMs,
            intervalMs: queue.heartbeatIntervalMs,
        });
        this.reaper = new Reaper(db, this.taskRepo, {
            intervalMs: queue.reaperIntervalMs,
            backoff: queue.backoff,
            retentionDays: queue.retentionDays,
        }, this.clock);

        this.poller = new Poller(this.taskRepo, {
            workerId: this.workerId,
            claimTtlMs: queue.claimTtlMs,
            pollIntervalMs: queue.pollIntervalMs,
            beforePoll: () => {
                const promoted = this.taskRepo.promoteDueRetries();
                if (promoted.length > 0) {
                    console.log(`${TAG} requeued ${promoted.length} tasks after backoff`);
                }
            },
            onTaskReceived: (task) => runTask({
                taskRepo: this.taskRepo,
                executor,
                heartbeat: this.heartbeat,
                workerId: this.workerId,
                backoff: queue.backoff,
                clock: this.clock,
            }, task),
        });
    }

    /** Returns false when another live daemon holds the marker. */
    start(): boolean {
        if (this.startedAt !== null) {
            console.warn(`${TAG} already running`);
            return true;
        }

        const now = this.clock();
        const { marker } = this.options;
        if (marker) {
            const acquired = marker.acquire({
                pid: process.pid,
                instanceId: this.workerId,
                startedAt: now,
                lastHeartbeat: now,
                lastPollAt: null,
                processed: 0,
                version: this.options.version ?? '0.0.0',
                logFile: this.options.logFile,
            });
            if (!acquired) return false;
        }

        this.startedAt = now;
        console.log(`${TAG} starting (worker: ${this.workerId})`);

        const recovered = this.reaper.start();
        if (recovered.length > 0) {
            console.log(`${TAG} recovered ${recovered.length} tasks left running by a previous daemon`);
        }
        this.poller.start();

        if (marker) {
            this.markerTimer = setInterval(() => this.refreshMarker(), this.options.queue.markerRefreshMs);
        }
        console.log(`${TAG} ready`);
        return true;
    }

    /** Finishes the in-flight task, then releases everything. */
    async stop(): Promise<void> {
        if (this.startedAt === null) return;
        console.log(`${TAG} stopping...`);

        if (this.markerTimer) {
            clearInterval(this.markerTimer);
            this.markerTimer = null;
        }
        await this.poller.stop();
        this.reaper.stop();
        this.heartbeat.stopAll();
        this.options.marker?.release();
        this.startedAt = null;
        console.log(`${TAG} stopped`);
    }

    status(): DaemonStatus {
        return {
            running: this.startedAt !== null,
            workerId: this.workerId,
            startedAt: this.startedAt === null ? null : new Date(this.startedAt),
            uptimeMs: this.startedAt === null ? 0 : this.clock() - this.startedAt,
            lastPollAt: this.poller.lastPollAt,
            processed: this.poller.processed,
        };
    }

    private refreshMarker(): void {
        try {
            this.options.marker?.refresh({
                lastPollAt: this.poller.lastPollAt?.getTime() ?? null,
                processed: this.poller.processed,
            });
        } catch (err) {
            console.error(`${TAG} failed to refresh process marker:`, err);
        }
    }
}
