import { WorkflowStatus } from '@agentchain/sdk';

/**
 * One orchestration run. Created `running`, moved to a terminal status once.
 */
export interface WorkflowEntity {
    id: string;
    name: string;
    description: string | null;
    conversation_id: string;
    user_id: string;
    status: WorkflowStatus;
    total_execution_time: number | null;  // seconds
    heartbeat_at: Date | null;  // liveness of the orchestrating process
    created_at: Date;
    updated_at: Date;
}

/** History row: workflow columns plus its step count. */
export interface WorkflowHeaderRow extends Pick<WorkflowEntity,
    'id' | 'name' | 'status' | 'total_execution_time' | 'created_at' | 'conversation_id'> {
    step_count: number;
}
