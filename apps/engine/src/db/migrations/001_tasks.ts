// Task queue table for background LLM jobs
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
    version: 1,
    description: 'Create tasks table for the background task queue',

    up(db: BetterSqlite3.Database) {
        db.exec(`
            CREATE TABLE IF NOT EXISTS tasks (
                -- seq never repeats, so it is also the FIFO tie-break
                seq INTEGER PRIMARY KEY AUTOINCREMENT,
                id TEXT NOT NULL UNIQUE,
                kind TEXT NOT NULL,
                payload TEXT NOT NULL,

                priority INTEGER NOT NULL DEFAULT 1 CHECK(priority BETWEEN 0 AND 3),
                status TEXT NOT NULL DEFAULT 'pending'
                    CHECK(status IN ('pending', 'running', 'completed', 'failed', 'cancelled')),

                attempts INTEGER NOT NULL DEFAULT 0,
                max_attempts INTEGER NOT NULL DEFAULT 3 CHECK(max_attempts >= 1),

                result TEXT,
                error TEXT,

                -- Claim marker
                lock_owner TEXT,
                lock_expiry INTEGER,

                retry_at INTEGER,
                cancel_requested INTEGER NOT NULL DEFAULT 0,

                created_at INTEGER NOT NULL,
                updated_at INTEGER NOT NULL,
                started_at INTEGER,
                finished_at INTEGER,

                CHECK(attempts <= max_attempts)
            );

            CREATE INDEX IF NOT EXISTS idx_tasks_eligible
                ON tasks(priority DESC, created_at ASC, seq ASC)
                WHERE status = 'pending';

            CREATE INDEX IF NOT EXISTS idx_tasks_status
                ON tasks(status, created_at DESC);

            CREATE INDEX IF NOT EXISTS idx_tasks_kind
                ON tasks(kind, status);

            CREATE INDEX IF NOT EXISTS idx_tasks_claim
                ON tasks(lock_expiry)
                WHERE status = 'running';

            CREATE INDEX IF NOT EXISTS idx_tasks_retry
                ON tasks(retry_at)
                WHERE status = 'failed' AND retry_at IS NOT NULL;
        `);
    },

    down(db: BetterSqlite3.Database) {
        db.exec(`
            DROP INDEX IF EXISTS idx_tasks_retry;
            DROP INDEX IF EXISTS idx_tasks_claim;
            DROP INDEX IF EXISTS idx_tasks_kind;
            DROP INDEX IF EXISTS idx_tasks_status;
            DROP INDEX IF EXISTS idx_tasks_eligible;
            DROP TABLE IF EXISTS tasks;
        `);
    },
};

export default migration;
