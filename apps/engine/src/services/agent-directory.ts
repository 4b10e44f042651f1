import { AgentEntity } from '../db/agent.entity';
import { AgentStore } from '../repositories/agent.repository';

const TAG = '[agents]';

interface CacheEntry {
    agent: AgentEntity;
    expiresAt: number;
}

/**
 * Owner-scoped lookup of agent records with a short-lived cache in front of
 * the agents table. Created at engine startup and cleared on shutdown.
 * Misses are not cached, so a newly created agent is visible immediately.
 * Expired entries are swept at most once per TTL while resolving.
 */
export class AgentDirectory {
    private readonly entries = new Map<string, CacheEntry>();
    private lastSweep = 0;

    constructor(
        private readonly agents: AgentStore,
        private readonly ttlMs = 30_000,
        private readonly now: () => number = Date.now,
    ) { }

    async resolve(agentIds: readonly string[], userId: string): Promise<Map<string, AgentEntity>> {
        const resolved = new Map<string, AgentEntity>();
        const misses: string[] = [];
        const now = this.now();
        this.sweep(now);

        for (const id of new Set(agentIds)) {
            const entry = this.entries.get(this.key(userId, id));
            if (entry && entry.expiresAt > now) {
                resolved.set(id, entry.agent);
            } else {
                misses.push(id);
            }
        }

        if (misses.length > 0) {
            const found = await this.agents.findOwned(misses, userId);
            for (const agent of found) {
                this.entries.set(this.key(userId, agent.id), { agent, expiresAt: now + this.ttlMs });
                resolved.set(agent.id, agent);
            }
        }

        return resolved;
    }

    clear(): void {
        const count = this.entries.size;
        this.entries.clear();
        console.log(`${TAG} cache cleared (${count} entries)`);
    }

    get size(): number {
        return this.entries.size;
    }

    private sweep(now: number): void {
        if (now - this.lastSweep < this.ttlMs) return;
        this.lastSweep = now;
        for (const [key, entry] of this.entries) {
            if (entry.expiresAt <= now) this.entries.delete(key);
        }
    }

    private key(userId: string, agentId: string): string {
        return `${userId}:${agentId}`;
    }
}
