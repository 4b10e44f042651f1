import { Queryable } from '../db';
import { AgentEntity } from '../db/agent.entity';

export interface AgentStore {
    /** Agents among `ids` that belong to `userId`; unknown or foreign ids are absent. */
    findOwned(ids: readonly string[], userId: string): Promise<AgentEntity[]>;
}

export class AgentRepository implements AgentStore {
    constructor(private readonly db: Queryable) { }

    async findOwned(ids: readonly string[], userId: string): Promise<AgentEntity[]> {
        if (ids.length === 0) return [];

        const res = await this.db.query<AgentEntity>(
            `SELECT id::text AS id, user_id::text AS user_id, name, status
             FROM agents
             WHERE id::text = ANY($1::text[]) AND user_id::text = $2`,
            [[...ids], userId],
        );
        return res.rows;
    }
}
