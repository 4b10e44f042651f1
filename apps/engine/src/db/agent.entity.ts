/**
 * Operational states of an agent owned by a user.
 * Only ACTIVE agents can take part in a workflow.
 */
export enum agentStatus {
    CREATING = 'creating',
    ACTIVE = 'active',
    ERROR = 'error',
    PAUSED = 'paused',
    DELETED = 'deleted'
}

export interface AgentEntity {
    id: string;
    user_id: string;
    name: string;
    status: agentStatus;
}
