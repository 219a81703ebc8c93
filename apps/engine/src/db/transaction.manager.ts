import { Db } from './index';

/**
 * Runs a unit of work inside an IMMEDIATE transaction so the write lock is
 * taken up front; two connections can never interleave a read-modify-write.
 */
export class TransactionManager {
    constructor(private readonly db: Db) { }

    /**
     * Commits on return, rolls back and re-throws on error.
     *
     * @example
     * txManager.run(() => {
     *   const row = findStmt.get(id);
     *   updateStmt.run(next, id);
     *   return row;
     * });
     */
    run<T>(callback: () => T): T {
        return this.db.transaction(callback).immediate();
    }
}
