import { StepStatus } from '@agentchain/sdk';

/**
 * Persisted state of one step. Inserted `pending` with its workflow and
 * updated in place as the step runs; deleted only with the workflow.
 */
export interface WorkflowStepEntity {
    id: string;
    workflow_id: string;
    step_index: number;  // declaration position
    step_name: string;
    agent_id: string;
    message: string;  // original, before dependency context
    response: string | null;
    tools_used: string[] | null;
    execution_time: number | null;  // seconds
    status: StepStatus;
    error_message: string | null;
    depends_on: string[] | null;
    pass_result_to: string[] | null;
    created_at: Date;
    updated_at: Date;
}
