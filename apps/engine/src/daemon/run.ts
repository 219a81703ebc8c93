import { AppConfig } from '../config';
import { createRuntime, RuntimeOverrides } from '../runtime';
import { QueueDaemon } from '../services/daemon';
import { VERSION } from '../version';
import { ProcessMarker } from './process-marker';

const TAG = '[daemon]';

/**
 * Foreground daemon: holds the process marker, runs the loop until SIGINT or
 * SIGTERM, then lets the in-flight task finish. Resolves with the exit code.
 */
export async function runDaemon(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<number> {
    const runtime = createRuntime(config, overrides);
    const marker = new ProcessMarker(config.daemonStateFile, { staleAfterMs: config.queue.markerStaleMs });
    const daemon = new QueueDaemon({
        db: runtime.db,
        registry: runtime.registry,
        queue: config.queue,
        marker,
        version: VERSION,
        logFile: config.daemonLogFile,
    });

    console.log(`${TAG} promptqueue ${VERSION} (pid ${process.pid}, store ${config.databaseFile})`);
    console.log(`${TAG} kinds: ${runtime.registry.list().join(', ')}`);

    if (!daemon.start()) {
        console.error(`${TAG} another daemon is already running, exiting`);
        runtime.close();
        return 1;
    }

    const signal = await new Promise<NodeJS.Signals>((resolve) => {
        process.once('SIGTERM', () => resolve('SIGTERM'));
        process.once('SIGINT', () => resolve('SIGINT'));
    });

    console.log(`${TAG} ${signal} received, shutting down...`);
    await daemon.stop();
    runtime.close();
    console.log(`${TAG} shutdown complete`);
    return 0;
}
