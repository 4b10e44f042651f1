import { sendUnaryData } from '@grpc/grpc-js';
import { Redis } from 'ioredis';
import { Queryable } from '../db';

export type ServingStatus = 'UNKNOWN' | 'SERVING' | 'NOT_SERVING' | 'SERVICE_UNKNOWN';

export interface HealthCheckResponse {
    status: ServingStatus;
}

interface HealthWatchStream {
    write(message: HealthCheckResponse): boolean;
    end(): void;
}

/**
 * Standard gRPC health check service implementation.
 * Verifies Postgres and Redis connectivity.
 */
export class HealthService {
    constructor(
        private readonly db: Queryable,
        private readonly redis: Pick<Redis, 'ping'>,
    ) { }

    async status(): Promise<ServingStatus> {
        try {
            await this.db.query('SELECT 1');
            await this.redis.ping();
            return 'SERVING';
        } catch (error) {
            console.error('[health] check failed:', error);
            return 'NOT_SERVING';
        }
    }

    check(_call: unknown, callback: sendUnaryData<HealthCheckResponse>): void {
        void this.status().then(status => callback(null, { status }));
    }

    watch(call: HealthWatchStream): void {
        void this.status().then(status => {
            call.write({ status });
            call.end();
        });
    }
}
