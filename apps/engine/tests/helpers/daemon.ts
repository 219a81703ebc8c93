import { z } from 'zod';
import { createRegistry, defineHandler, HandlerDefinition, HandlerRegistry } from '@promptqueue/sdk';
import { QueueConfig } from '../../src/config';

/** Fast timings so daemon tests finish in milliseconds. */
export function testQueueConfig(overrides: Partial<QueueConfig> = {}): QueueConfig {
    return {
        pollIntervalMs: 10,
        claimTtlMs: 1000,
        heartbeatIntervalMs: 20,
        defaultMaxAttempts: 3,
        backoff: { initialIntervalMs: 10, multiplier: 2, maxIntervalMs: 100, jitter: 0 },
        reaperIntervalMs: 60_000,
        stopTimeoutMs: 1000,
        retentionDays: 0,
        markerRefreshMs: 50,
        markerStaleMs: 30_000,
        ...overrides,
    };
}

export interface Recorder {
    registry: HandlerRegistry;
    // ids in the order their handler ran
    ran: string[];
}

/** A registry whose `record` kind logs the task id and returns its label. */
export function recordingRegistry(extra: HandlerDefinition[] = []): Recorder {
    const ran: string[] = [];
    const registry = createRegistry([
        defineHandler({
            kind: 'record',
            schema: z.object({ label: z.string().default('') }),
            handler: async ({ taskId, payload }) => {
                ran.push(taskId);
                return payload.label;
            },
        }),
        ...extra,
    ]);
    return { registry, ran };
}
