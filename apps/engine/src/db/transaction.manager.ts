import { Pool, PoolClient } from 'pg';

/**
 * Scoped use of pooled connections: atomic transactions, and plain
 * checkouts that give one unit of work a client nobody else touches.
 */
export class TransactionManager {
    constructor(private readonly pool: Pool) { }

    /**
     * Executes a callback within a database transaction.
     * Automatically commits on success, rolls back on error.
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO workflows ...');
     *   await client.query('INSERT INTO workflow_steps ...');
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }

    /** Checks a client out for the callback and always releases it. */
    async checkout<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            return await callback(client);
        } finally {
            client.release();
        }
    }
}
