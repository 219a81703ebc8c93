import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors/queue.errors';
import { BackoffPolicy } from './utils/backoff';

const positiveInt = z.coerce.number().int().positive();
const STOP_GRACE_MS = 30_000;

const envSchema = z.object({
    PROMPTQUEUE_DATABASE_PATH: z.string().optional(),
    PROMPTQUEUE_DAEMON_LOGFILE_PATH: z.string().optional(),

    PROMPTQUEUE_POLL_INTERVAL_MS: positiveInt.default(2000),
    PROMPTQUEUE_CLAIM_TTL_MS: positiveInt.default(60_000),
    PROMPTQUEUE_HEARTBEAT_INTERVAL_MS: positiveInt.optional(),
    PROMPTQUEUE_MAX_ATTEMPTS: positiveInt.default(3),
    PROMPTQUEUE_BACKOFF_BASE_MS: positiveInt.default(1000),
    PROMPTQUEUE_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
    PROMPTQUEUE_BACKOFF_MAX_MS: positiveInt.default(5 * 60_000),
    PROMPTQUEUE_BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.1),
    PROMPTQUEUE_REAPER_INTERVAL_MS: positiveInt.default(30_000),
    PROMPTQUEUE_STOP_TIMEOUT_MS: positiveInt.optional(),
    PROMPTQUEUE_RETENTION_DAYS: z.coerce.number().min(0).default(0),
    PROMPTQUEUE_MARKER_REFRESH_MS: positiveInt.default(5000),
    PROMPTQUEUE_MARKER_STALE_MS: positiveInt.default(30_000),

    PROMPTQUEUE_LLM_ENDPOINT: z.string().url().default('http://localhost:1234/v1'),
    PROMPTQUEUE_LLM_API_KEY: z.string().default('notrequired'),
    PROMPTQUEUE_LLM_MODEL: z.string().default('qwen/qwen3-8b'),
    PROMPTQUEUE_LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    PROMPTQUEUE_LLM_TIMEOUT_MS: positiveInt.default(10 * 60_000),
});

export interface QueueConfig {
    pollIntervalMs: number;
    claimTtlMs: number;
    heartbeatIntervalMs: number;
    defaultMaxAttempts: number;
    backoff: BackoffPolicy;
    reaperIntervalMs: number;
    stopTimeoutMs: number;
    retentionDays: number;
    markerRefreshMs: number;
    markerStaleMs: number;
}

export interface LlmConfig {
    endpoint: string;
    apiKey: string;
    model: string;
    temperature: number;
    timeoutMs: number;
}

export interface AppConfig {
    homeDir: string;
    envFile: string;
    databaseFile: string;
    daemonStateFile: string;
    logsDir: string;
    daemonLogFile: string;
    queue: QueueConfig;
    llm: LlmConfig;
}

type Env = Record<string, string | undefined>;

function expandHome(path: string): string {
    if (path === '~') return homedir();
    if (path.startsWith('~/')) return join(homedir(), path.slice(2));
    return resolve(path);
}

// Blank variables count as unset.
function definedOnly(env: Env): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value;
    }
    return out;
}

function readEnvFile(file: string): Record<string, string> {
    if (!existsSync(file)) return {};
    try {
        return parseDotenv(readFileSync(file));
    } catch (err) {
        throw new ConfigError(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Resolves paths and tunables. `<home>/.env` supplies defaults, the process
 * environment wins over it.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const homeDir = expandHome(env.PROMPTQUEUE_HOME?.trim() || '~/.promptqueue');
    const envFile = join(homeDir, '.env');
    const merged = { ...readEnvFile(envFile), ...definedOnly(env) };

    const parsed = envSchema.safeParse(merged);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${detail}`);
    }
    const vars = parsed.data;
    const logsDir = join(homeDir, 'logs');

    return {
        homeDir,
        envFile,
        databaseFile: vars.PROMPTQUEUE_DATABASE_PATH
            ? expandHome(vars.PROMPTQUEUE_DATABASE_PATH)
            : join(homeDir, 'promptqueue.sqlite'),
        daemonStateFile: join(homeDir, 'daemon.state.json'),
        logsDir,
        daemonLogFile: vars.PROMPTQUEUE_DAEMON_LOGFILE_PATH
            ? expandHome(vars.PROMPTQUEUE_DAEMON_LOGFILE_PATH)
            : join(logsDir, 'daemon.log'),
        queue: {
            pollIntervalMs: vars.PROMPTQUEUE_POLL_INTERVAL_MS,
            claimTtlMs: vars.PROMPTQUEUE_CLAIM_TTL_MS,
            heartbeatIntervalMs: vars.PROMPTQUEUE_HEARTBEAT_INTERVAL_MS
                ?? Math.max(1, Math.floor(vars.PROMPTQUEUE_CLAIM_TTL_MS / 3)),
            defaultMaxAttempts: vars.PROMPTQUEUE_MAX_ATTEMPTS,
            backoff: {
                initialIntervalMs: vars.PROMPTQUEUE_BACKOFF_BASE_MS,
                multiplier: vars.PROMPTQUEUE_BACKOFF_MULTIPLIER,
                maxIntervalMs: vars.PROMPTQUEUE_BACKOFF_MAX_MS,
                jitter: vars.PROMPTQUEUE_BACKOFF_JITTER,
            },
            reaperIntervalMs: vars.PROMPTQUEUE_REAPER_INTERVAL_MS,
            // long enough for an in-flight LLM request to finish
            stopTimeoutMs: vars.PROMPTQUEUE_STOP_TIMEOUT_MS ?? vars.PROMPTQUEUE_LLM_TIMEOUT_MS + STOP_GRACE_MS,
            retentionDays: vars.PROMPTQUEUE_RETENTION_DAYS,
            markerRefreshMs: vars.PROMPTQUEUE_MARKER_REFRESH_MS,
            markerStaleMs: vars.PROMPTQUEUE_MARKER_STALE_MS,
        },
        llm: {
            endpoint: vars.PROMPTQUEUE_LLM_ENDPOINT,
            apiKey: vars.PROMPTQUEUE_LLM_API_KEY,
            model: vars.PROMPTQUEUE_LLM_MODEL,
            temperature: vars.PROMPTQUEUE_LLM_TEMPERATURE,
            timeoutMs: vars.PROMPTQUEUE_LLM_TIMEOUT_MS,
        },
    };
}
