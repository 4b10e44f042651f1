import { Redis } from 'ioredis';

export const LEADER_KEY = 'agentchain:reaper:leader';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

export class LeaderElector {
    private readonly workerId: string;
    private renewalInterval: NodeJS.Timeout | null = null;

    constructor(
        private readonly redis: Redis,
        private readonly ttlSeconds = 30,
        workerId?: string,
    ) {
        this.workerId = workerId || `worker-${process.pid}-${Date.now()}`;
    }

    get id(): string {
        return this.workerId;
    }

    async tryBecomeLeader(): Promise<boolean> {
        // SET NX EX: one atomic claim
        const result = await this.redis.set(LEADER_KEY, this.workerId, 'EX', this.ttlSeconds, 'NX');

        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // Re-election after restart with the same id
        const currentLeader = await this.redis.get(LEADER_KEY);
        if (currentLeader === this.workerId) {
            this.startRenewal();
            return true;
        }
        return false;
    }

    async releaseLeadership(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, LEADER_KEY, this.workerId);
    }

    async isLeader(): Promise<boolean> {
        const currentLeader = await this.redis.get(LEADER_KEY);
        return currentLeader === this.workerId;
    }

    async renewLock(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, LEADER_KEY, this.workerId, this.ttlSeconds);
        return result === 1;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;

        // half the TTL, so one missed renewal does not lose the lock
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renewLock()
                .then(stillLeader => {
                    if (!stillLeader) this.stopRenewal();
                })
                .catch(err => console.error('[leader] lock renewal failed:', err));
        }, renewalMs);
        this.renewalInterval.unref();
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }
}
