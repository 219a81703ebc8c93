// Migration registry
import type BetterSqlite3 from 'better-sqlite3';
import migration001 from './001_tasks';

const TAG = '[migrations]';

export interface Migration {
    version: number;
    description: string;
    up: (db: BetterSqlite3.Database) => void;
    down: (db: BetterSqlite3.Database) => void;
}

export const migrations: Migration[] = [
    migration001,
];

/**
 * Applies every migration newer than the recorded schema version, each in its own transaction.
 * Returns the versions applied.
 */
export function runMigrations(db: BetterSqlite3.Database): number[] {
    db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
            version INTEGER PRIMARY KEY,
            applied_at INTEGER NOT NULL,
            description TEXT
        );
    `);

    const row = db
        .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
        .get();
    const current = row?.version ?? 0;
    const applied: number[] = [];

    for (const migration of migrations) {
        if (migration.version <= current) continue;

        db.transaction(() => {
            migration.up(db);
            db.prepare('INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)')
                .run(migration.version, Date.now(), migration.description);
        })();

        // stderr: every CLI command opens the store and its stdout carries results
        console.error(`${TAG} applied ${migration.version}: ${migration.description}`);
        applied.push(migration.version);
    }

    return applied;
}
