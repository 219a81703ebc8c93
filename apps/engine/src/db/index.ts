/**
 * SQLite connection management for the task store.
 * The store is a single file in the per-user home directory.
 */
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { runMigrations } from './migrations';
import { StoreError } from '../errors/queue.errors';

export type Db = BetterSqlite3.Database;

export interface OpenDatabaseOptions {
    /** How long a writer waits on a locked database before failing, in ms. */
    busyTimeoutMs?: number;
}

/**
 * Opens (creating if needed) the task database and brings its schema up to date.
 * Pass ':memory:' for a throwaway store.
 */
export function openDatabase(file: string, options: OpenDatabaseOptions = {}): Db {
    try {
        if (file !== ':memory:') {
            mkdirSync(dirname(file), { recursive: true });
        }

        const db = new Database(file, { timeout: options.busyTimeoutMs ?? 5000 });

        // WAL lets the CLI read while the daemon writes
        if (file !== ':memory:') {
            db.pragma('journal_mode = WAL');
        }
        db.pragma('synchronous = NORMAL');
        db.pragma('foreign_keys = ON');

        runMigrations(db);
        return db;
    } catch (err) {
        throw StoreError.wrap('open', err);
    }
}

export function closeDatabase(db: Db): void {
    if (db.open) {
        db.close();
    }
}
