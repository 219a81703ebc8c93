import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { dirname, extname, join, resolve } from 'path';
import { z } from 'zod';
import { PermanentTaskError } from '@promptqueue/sdk';

/**
 * Payload fields that point at files. Paths are resolved when the task runs,
 * not when it is queued, so the daemon sees the files as they are then.
 */
export const fileContextFields = {
    contextFiles: z.array(z.string().min(1)).optional(),
    // every regular file directly inside, in name order
    contextDirectories: z.array(z.string().min(1)).optional(),
};

export interface FileContext {
    context?: string[];
    contextFiles?: string[];
    contextDirectories?: string[];
}

function errnoCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null) return undefined;
    const code: unknown = Reflect.get(err, 'code');
    return typeof code === 'string' ? code : undefined;
}

function reasonOf(err: unknown): string {
    return errnoCode(err) ?? (err instanceof Error ? err.message : String(err));
}

/** Reads a file the payload names. A missing or unreadable file will not fix itself on retry. */
export async function readPayloadFile(path: string, what: string): Promise<string> {
    try {
        return (await readFile(resolve(path), 'utf-8')).trim();
    } catch (err) {
        throw new PermanentTaskError(`Cannot read ${what} ${path}: ${reasonOf(err)}`);
    }
}

async function listFiles(directory: string): Promise<string[]> {
    try {
        const entries = await readdir(resolve(directory), { withFileTypes: true });
        return entries
            .filter(entry => entry.isFile())
            .map(entry => join(resolve(directory), entry.name))
            .sort();
    } catch (err) {
        throw new PermanentTaskError(`Cannot read context directory ${directory}: ${reasonOf(err)}`);
    }
}

/** Inline context first, then files, then directory contents. */
export async function collectContext(payload: FileContext): Promise<string[] | undefined> {
    const context = [...(payload.context ?? [])];
    for (const file of payload.contextFiles ?? []) {
        context.push(await readPayloadFile(file, 'context file'));
    }
    for (const directory of payload.contextDirectories ?? []) {
        for (const file of await listFiles(directory)) {
            context.push(await readPayloadFile(file, 'context file'));
        }
    }
    return context.length > 0 ? context : undefined;
}

/**
 * Writes `content` to `path`, creating parent directories. An existing file is
 * kept: the new one gets a numeric suffix (`result_2.md`, `result_3.md`, ...).
 * Returns the path written.
 */
export async function writeResultFile(path: string, content: string): Promise<string> {
    const target = resolve(path);
    await mkdir(dirname(target), { recursive: true });

    const ext = extname(target);
    const base = target.slice(0, target.length - ext.length);
    for (let n = 1; ; n++) {
        const candidate = n === 1 ? target : `${base}_${n}${ext}`;
        try {
            await writeFile(candidate, `${content}\n`, { flag: 'wx' });
            return candidate;
        } catch (err) {
            if (errnoCode(err) !== 'EEXIST') {
                throw new PermanentTaskError(`Cannot write ${candidate}: ${reasonOf(err)}`);
            }
        }
    }
}
