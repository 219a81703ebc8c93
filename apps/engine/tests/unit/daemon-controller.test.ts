import { existsSync } from 'fs';
import { join } from 'path';
import { AppConfig, loadConfig } from '../../src/config';
import { DaemonController, SpawnedProcess } from '../../src/daemon/controller';
import { DaemonState, ProcessMarker } from '../../src/daemon/process-marker';
import { createTempDir, removeDir } from '../helpers/db';

describe('DaemonController', () => {
    let dir: string;
    let config: AppConfig;
    let alive: Set<number>;
    let spawn: jest.Mock<SpawnedProcess, [string, string[], number]>;
    let kill: jest.Mock<void, [number, NodeJS.Signals]>;

    const writeMarker = (pid: number, overrides: Partial<DaemonState> = {}) => {
        const now = Date.now();
        new ProcessMarker(config.daemonStateFile, { staleAfterMs: 30_000, isAlive: () => true }).acquire({
            pid,
            instanceId: `daemon-${pid}`,
            startedAt: now - 60_000,
            lastHeartbeat: now,
            lastPollAt: now - 1000,
            processed: 7,
            version: '0.1.0',
            logFile: config.daemonLogFile,
            ...overrides,
        });
    };

    const controller = () => new DaemonController(config, {
        spawn,
        kill,
        isAlive: (pid) => alive.has(pid),
        startTimeoutMs: 500,
        pollMs: 5,
    });

    beforeEach(() => {
        dir = createTempDir();
        config = loadConfig({ PROMPTQUEUE_HOME: dir, PROMPTQUEUE_STOP_TIMEOUT_MS: '100' });
        alive = new Set();
        // the fake child comes up and writes its marker straight away
        spawn = jest.fn<SpawnedProcess, [string, string[], number]>().mockImplementation(() => {
            alive.add(5555);
            writeMarker(5555);
            return { pid: 5555, unref: () => undefined };
        });
        kill = jest.fn<void, [number, NodeJS.Signals]>();
    });

    afterEach(() => {
        removeDir(dir);
    });

    describe('start', () => {
        it('spawns a detached daemon run and waits for its marker', async () => {
            await expect(controller().start()).resolves.toEqual({ started: true, pid: 5555 });

            const [command, args] = spawn.mock.calls[0];
            expect(command).toBe(process.execPath);
            expect(args.slice(-2)).toEqual(['daemon', 'run']);
            expect(args[args.length - 3]).toMatch(/cli\.(ts|js)$/);
            expect(existsSync(config.daemonLogFile)).toBe(true);
        });

        it('refuses when a daemon is already running', async () => {
            alive.add(4000);
            writeMarker(4000);

            await expect(controller().start()).resolves.toEqual({
                started: false,
                reason: 'already-running',
                pid: 4000,
                message: 'Daemon already running (pid 4000)',
            });
            expect(spawn).not.toHaveBeenCalled();
        });

        it('clears a stale marker before starting', async () => {
            writeMarker(4000);

            await expect(controller().start()).resolves.toEqual({ started: true, pid: 5555 });
            expect(spawn).toHaveBeenCalledTimes(1);
        });

        it('reports a child that died during startup', async () => {
            spawn.mockImplementation(() => ({ pid: 6000, unref: () => undefined }));

            await expect(controller().start()).resolves.toEqual({
                started: false,
                reason: 'failed',
                pid: 6000,
                message: `Daemon exited during startup; see ${config.daemonLogFile}`,
            });
        });

        it('reports a spawn without a pid', async () => {
            spawn.mockImplementation(() => ({ unref: () => undefined }));

            await expect(controller().start()).resolves.toEqual({
                started: false,
                reason: 'failed',
                message: 'Failed to spawn the daemon process',
            });
        });
    });

    describe('stop', () => {
        it('does nothing without a marker', async () => {
            await expect(controller().stop()).resolves.toEqual({ wasRunning: false, forced: false });
            expect(kill).not.toHaveBeenCalled();
        });

        it('sends SIGTERM and waits for the exit', async () => {
            alive.add(4000);
            writeMarker(4000);
            kill.mockImplementation((pid) => alive.delete(pid));

            await expect(controller().stop()).resolves.toEqual({ wasRunning: true, forced: false, pid: 4000 });
            expect(kill.mock.calls).toEqual([[4000, 'SIGTERM']]);
            expect(existsSync(config.daemonStateFile)).toBe(false);
        });

        it('leaves a busy daemon to finish its task after the stop timeout', async () => {
            alive.add(4000);
            writeMarker(4000);

            await expect(controller().stop()).resolves.toEqual({ wasRunning: true, forced: false, pid: 4000, draining: true });
            expect(kill.mock.calls).toEqual([[4000, 'SIGTERM']]);
            expect(existsSync(config.daemonStateFile)).toBe(true);
        });

        it('falls back to SIGKILL after the stop timeout when forced', async () => {
            alive.add(4000);
            writeMarker(4000);
            kill.mockImplementation((pid, signal) => {
                if (signal === 'SIGKILL') alive.delete(pid);
            });

            await expect(controller().stop({ force: true })).resolves.toEqual({ wasRunning: true, forced: true, pid: 4000 });
            expect(kill.mock.calls).toEqual([[4000, 'SIGTERM'], [4000, 'SIGKILL']]);
            expect(existsSync(config.daemonStateFile)).toBe(false);
        });

        it('never signals the pid of a stale marker', async () => {
            writeMarker(4000);

            await expect(controller().stop()).resolves.toEqual({ wasRunning: false, forced: false, pid: 4000 });
            expect(kill).not.toHaveBeenCalled();
            expect(existsSync(config.daemonStateFile)).toBe(false);
        });
    });

    describe('status', () => {
        it('reports a running daemon from its marker', () => {
            alive.add(4000);
            writeMarker(4000);

            const status = controller().status();

            expect(status.running).toBe(true);
            expect(status.pid).toBe(4000);
            expect(status.processed).toBe(7);
            expect(status.version).toBe('0.1.0');
            expect(status.logFile).toBe(config.daemonLogFile);
            expect(status.uptimeMs).toBeGreaterThanOrEqual(60_000);
            expect(status.stale).toBe(false);
        });

        it('reports a stale marker as not running', () => {
            writeMarker(4000);
            expect(controller().status()).toEqual({ running: false, logFile: config.daemonLogFile, stale: true });
        });

        it('reports no daemon', () => {
            expect(controller().status()).toEqual({ running: false, logFile: join(dir, 'logs', 'daemon.log'), stale: false });
        });
    });

    it('restart stops the old daemon and starts a new one', async () => {
        alive.add(4000);
        writeMarker(4000);
        kill.mockImplementation((pid) => alive.delete(pid));

        await expect(controller().restart()).resolves.toEqual({ started: true, pid: 5555 });
        expect(kill).toHaveBeenCalledWith(4000, 'SIGTERM');
    });

    it('restart does not start a second daemon while the old one drains', async () => {
        alive.add(4000);
        writeMarker(4000);

        await expect(controller().restart()).resolves.toEqual({
            started: false,
            reason: 'already-running',
            pid: 4000,
            message: 'Daemon (pid 4000) is still finishing its current task; try again later or use --force',
        });
        expect(spawn).not.toHaveBeenCalled();
    });
});
