import { spawn as spawnProcess } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import { dirname, extname, resolve } from 'path';
import { AppConfig } from '../config';
import { DaemonState, isProcessAlive, ProcessMarker } from './process-marker';

const TAG = '[daemon-control]';

export interface SpawnedProcess {
    pid?: number;
    unref(): void;
}

export interface ControllerDeps {
    spawn?: (command: string, args: string[], logFd: number) => SpawnedProcess;
    kill?: (pid: number, signal: NodeJS.Signals) => void;
    isAlive?: (pid: number) => boolean;
    clock?: () => number;
    // how long `start` waits for the child to write its marker
    startTimeoutMs?: number;
    pollMs?: number;
}

export type StartResult =
    | { started: true; pid: number }
    | { started: false; reason: 'already-running' | 'failed'; pid?: number; message: string };

export interface StopOptions {
    // SIGKILL a daemon that outlives the stop timeout, abandoning its task
    force?: boolean;
}

export interface StopResult {
    wasRunning: boolean;
    forced: boolean;
    pid?: number;
    // SIGTERM delivered, the daemon is still finishing its in-flight task
    draining?: boolean;
}

export interface ControllerStatus {
    running: boolean;
    pid?: number;
    startedAt?: Date;
    uptimeMs?: number;
    lastHeartbeat?: Date;
    lastPollAt?: Date | null;
    processed?: number;
    version?: string;
    logFile: string;
    // a marker was found but its daemon is gone
    stale: boolean;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function defaultSpawn(command: string, args: string[], logFd: number): SpawnedProcess {
    return spawnProcess(command, args, {
        detached: true,
        stdio: ['ignore', logFd, logFd],
        env: process.env,
    });
}

// Running from sources needs the tsx loader in the child as well.
function daemonCommand(): { command: string; args: string[] } {
    const isTs = extname(__filename) === '.ts';
    const cli = resolve(__dirname, `../cli${isTs ? '.ts' : '.js'}`);
    return {
        command: process.execPath,
        args: [...(isTs ? ['--import', 'tsx'] : []), cli, 'daemon', 'run'],
    };
}

/**
 * start | stop | restart | status for the detached daemon, driven entirely
 * through the process marker and signals.
 */
export class DaemonController {
    readonly marker: ProcessMarker;
    private readonly spawn: NonNullable<ControllerDeps['spawn']>;
    private readonly kill: NonNullable<ControllerDeps['kill']>;
    private readonly isAlive: (pid: number) => boolean;
    private readonly clock: () => number;
    private readonly startTimeoutMs: number;
    private readonly pollMs: number;

    constructor(private readonly config: AppConfig, deps: ControllerDeps = {}) {
        this.spawn = deps.spawn ?? defaultSpawn;
        this.kill = deps.kill ?? ((pid, signal) => process.kill(pid, signal));
        this.isAlive = deps.isAlive ?? isProcessAlive;
        this.clock = deps.clock ?? Date.now;
        this.startTimeoutMs = deps.startTimeoutMs ?? 10_000;
        this.pollMs = deps.pollMs ?? 100;
        this.marker = new ProcessMarker(config.daemonStateFile, {
            staleAfterMs: config.queue.markerStaleMs,
            isAlive: this.isAlive,
            clock: this.clock,
        });
    }

    async start(): Promise<StartResult> {
        const { state, alive } = this.marker.inspect();
        if (state && alive) {
            return { started: false, reason: 'already-running', pid: state.pid, message: `Daemon already running (pid ${state.pid})` };
        }
        if (state) {
            console.log(`${TAG} clearing stale marker from pid ${state.pid}`);
            this.marker.clear();
        }

        mkdirSync(dirname(this.config.daemonLogFile), { recursive: true });
        const logFd = openSync(this.config.daemonLogFile, 'a');
        let child: SpawnedProcess;
        try {
            const { command, args } = daemonCommand();
            child = this.spawn(command, args, logFd);
            child.unref();
        } finally {
            closeSync(logFd);
        }

        const pid = child.pid;
        if (pid === undefined) {
            return { started: false, reason: 'failed', message: 'Failed to spawn the daemon process' };
        }

        const deadline = this.clock() + this.startTimeoutMs;
        while (this.clock() < deadline) {
            const current = this.marker.inspect();
            if (current.alive && current.state?.pid === pid) {
                return { started: true, pid };
            }
            if (!this.isAlive(pid)) {
                return { started: false, reason: 'failed', pid, message: `Daemon exited during startup; see ${this.config.daemonLogFile}` };
            }
            await sleep(this.pollMs);
        }
        return { started: false, reason: 'failed', pid, message: `Daemon did not report ready within ${this.startTimeoutMs}ms` };
    }

    /**
     * SIGTERM, then wait for the in-flight task. A daemon still busy after the
     * stop timeout is left to finish on its own unless `force` is set.
     */
    async stop(options: StopOptions = {}): Promise<StopResult> {
        const { state, alive } = this.marker.inspect();
        if (!state) {
            return { wasRunning: false, forced: false };
        }
        // a stale marker's pid may have been reused; never signal it
        if (!alive) {
            this.marker.clear();
            return { wasRunning: false, forced: false, pid: state.pid };
        }

        const { pid } = state;
        console.log(`${TAG} stopping daemon (pid ${pid})`);
        this.signal(pid, 'SIGTERM');

        if (await this.waitForExit(pid, this.config.queue.stopTimeoutMs)) {
            this.clearIfOwnedBy(state);
            return { wasRunning: true, forced: false, pid };
        }

        if (!options.force) {
            console.warn(`${TAG} daemon still finishing its task after ${this.config.queue.stopTimeoutMs}ms; it exits when done`);
            return { wasRunning: true, forced: false, pid, draining: true };
        }
        console.warn(`${TAG} daemon did not exit within ${this.config.queue.stopTimeoutMs}ms, killing`);
        this.signal(pid, 'SIGKILL');
        await this.waitForExit(pid, 2000);
        this.clearIfOwnedBy(state);
        return { wasRunning: true, forced: true, pid };
    }

    async restart(options: StopOptions = {}): Promise<StartResult> {
        const stopped = await this.stop(options);
        if (stopped.draining) {
            return {
                started: false,
                reason: 'already-running',
                pid: stopped.pid,
                message: `Daemon (pid ${stopped.pid}) is still finishing its current task; try again later or use --force`,
            };
        }
        return this.start();
    }

    status(): ControllerStatus {
        const { state, alive } = this.marker.inspect();
        if (!state || !alive) {
            return { running: false, logFile: this.config.daemonLogFile, stale: state !== null };
        }
        return {
            running: true,
            pid: state.pid,
            startedAt: new Date(state.startedAt),
            uptimeMs: this.clock() - state.startedAt,
            lastHeartbeat: new Date(state.lastHeartbeat),
            lastPollAt: state.lastPollAt === null ? null : new Date(state.lastPollAt),
            processed: state.processed,
            version: state.version,
            logFile: state.logFile ?? this.config.daemonLogFile,
            stale: false,
        };
    }

    private signal(pid: number, signal: NodeJS.Signals): void {
        try {
            this.kill(pid, signal);
        } catch (err) {
            console.warn(`${TAG} ${signal} to pid ${pid} failed:`, err instanceof Error ? err.message : err);
        }
    }

    private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
        const deadline = this.clock() + timeoutMs;
        while (this.clock() < deadline) {
            if (!this.isAlive(pid)) return true;
            await sleep(this.pollMs);
        }
        return !this.isAlive(pid);
    }

    private clearIfOwnedBy(state: DaemonState): void {
        const current = this.marker.read();
        if (current && current.instanceId === state.instanceId) {
            this.marker.clear();
        }
    }
}
