import { linkSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { v7 as uuid } from 'uuid';
import { z } from 'zod';

const TAG = '[marker]';

/**
 * Daemon state persisted locally, next to the task store.
 * Doubles as the singleton lock: whoever creates the file owns the daemon slot.
 */
export const daemonStateSchema = z.object({
    pid: z.number().int().positive(),
    instanceId: z.string(),
    startedAt: z.number(),
    // refreshed while the loop is alive
    lastHeartbeat: z.number(),
    lastPollAt: z.number().nullable(),
    processed: z.number().int().nonnegative(),
    version: z.string(),
    logFile: z.string().optional(),
});

export type DaemonState = z.infer<typeof daemonStateSchema>;

export interface MarkerInspection {
    state: DaemonState | null;
    alive: boolean;
}

export interface ProcessMarkerOptions {
    // a marker whose heartbeat is older than this belongs to a dead or hung daemon
    staleAfterMs: number;
    isAlive?: (pid: number) => boolean;
    clock?: () => number;
}

// fs errors come from Node's own context, where `instanceof Error` can fail
function errnoCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null) return undefined;
    const code: unknown = Reflect.get(err, 'code');
    return typeof code === 'string' ? code : undefined;
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0); // signal 0 only checks existence
        return true;
    } catch (err) {
        // EPERM: the pid exists but belongs to someone else
        return errnoCode(err) === 'EPERM';
    }
}

export class ProcessMarker {
    private readonly isAlive: (pid: number) => boolean;
    private readonly clock: () => number;
    private owned: DaemonState | null = null;

    constructor(
        readonly file: string,
        private readonly options: ProcessMarkerOptions,
    ) {
        this.isAlive = options.isAlive ?? isProcessAlive;
        this.clock = options.clock ?? Date.now;
    }

    /** Null when there is no marker or it cannot be parsed. */
    read(): DaemonState | null {
        return this.parse(this.file);
    }

    private parse(path: string): DaemonState | null {
        let raw: string;
        try {
            raw = readFileSync(path, 'utf-8');
        } catch (err) {
            if (errnoCode(err) === 'ENOENT') return null;
            throw err;
        }

        try {
            return daemonStateSchema.parse(JSON.parse(raw));
        } catch (err) {
            console.warn(`${TAG} ignoring unreadable marker ${path}:`, err instanceof Error ? err.message : err);
            return null;
        }
    }

    /** Alive means the recorded pid exists AND its heartbeat is fresh. */
    inspect(): MarkerInspection {
        const state = this.read();
        if (!state) return { state: null, alive: false };
        const fresh = this.clock() - state.lastHeartbeat <= this.options.staleAfterMs;
        return { state, alive: fresh && this.isAlive(state.pid) };
    }

    /**
     * Takes the daemon slot with an exclusive create. A stale marker left by a
     * crashed daemon is removed and the create retried once. Removal only
     * succeeds on the exact marker judged stale, so two contenders cannot
     * both delete their way in.
     */
    acquire(state: DaemonState): boolean {
        mkdirSync(dirname(this.file), { recursive: true });

        for (let attempt = 1; attempt <= 2; attempt++) {
            try {
                writeFileSync(this.file, JSON.stringify(state, null, 2), { flag: 'wx' });
                this.owned = state;
                return true;
            } catch (err) {
                if (errnoCode(err) !== 'EEXIST') throw err;
            }

            const { state: existing, alive } = this.inspect();
            if (alive) {
                console.warn(`${TAG} daemon already running (pid ${existing?.pid})`);
                return false;
            }
            console.log(`${TAG} removing stale marker${existing ? ` from pid ${existing.pid}` : ''}`);
            this.removeStale(existing);
        }
        return false;
    }

    /** Rewrites the owned marker with new liveness fields. */
    refresh(patch: Partial<Pick<DaemonState, 'lastHeartbeat' | 'lastPollAt' | 'processed'>>): void {
        if (!this.owned) return;
        const current = this.read();
        if (current && current.instanceId !== this.owned.instanceId) {
            console.warn(`${TAG} marker now belongs to instance ${current.instanceId}, no longer refreshing`);
            this.owned = null;
            return;
        }

        const next: DaemonState = { ...this.owned, lastHeartbeat: this.clock(), ...patch };
        const tmp = `${this.file}.${process.pid}.tmp`;
        writeFileSync(tmp, JSON.stringify(next, null, 2));
        renameSync(tmp, this.file);
        this.owned = next;
    }

    /** Removes the marker, but only if this process still owns it. */
    release(): void {
        if (!this.owned) return;
        const current = this.read();
        if (!current || current.instanceId === this.owned.instanceId) {
            this.clear();
        }
        this.owned = null;
    }

    // Moves the marker aside, then checks it is still the one judged stale.
    // Anything else was written in between and goes back in place.
    private removeStale(expected: DaemonState | null): void {
        const aside = `${this.file}.${uuid()}.stale`;
        try {
            renameSync(this.file, aside);
        } catch (err) {
            if (errnoCode(err) === 'ENOENT') return;
            throw err;
        }

        const moved = this.parse(aside);
        const same = expected === null
            ? moved === null
            : moved !== null && moved.instanceId === expected.instanceId && moved.lastHeartbeat === expected.lastHeartbeat;
        if (!same) {
            try {
                linkSync(aside, this.file);
            } catch (err) {
                if (errnoCode(err) !== 'EEXIST') throw err;
                console.warn(`${TAG} marker from instance ${moved?.instanceId} was replaced while being checked`);
            }
        }
        unlinkSync(aside);
    }

    clear(): void {
        try {
            unlinkSync(this.file);
        } catch (err) {
            if (errnoCode(err) !== 'ENOENT') throw err;
        }
    }
}
