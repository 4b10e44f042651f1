/**
 * Connection factories for Postgres and Redis.
 * Lifetimes are owned by the engine entry point, which ends both on shutdown.
 */
import Redis from 'ioredis';
import { Pool, PoolClient } from 'pg';

/** Anything that can run a query: the pool itself or a checked-out client. */
export type Queryable = Pick<PoolClient, 'query'>;

/**
 * Postgres connection pool:
 * - max: 20 connections by default (a parallel step holds one for its duration)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 0 by default, so a checkout waits for a busy
 *   pool instead of failing; step deadlines bound how long clients are held
 */
export interface PoolOptions {
    max?: number;
    connectionTimeoutMillis?: number;
}

export function createPool(connectionString = process.env.DATABASE_URL, options: PoolOptions = {}): Pool {
    return new Pool({
        connectionString,
        max: options.max ?? 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: options.connectionTimeoutMillis ?? 0,
    });
}

/** Redis client for leader election and health checks */
export function createRedis(url = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
    return new Redis(url);
}
