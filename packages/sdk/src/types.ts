export const MAX_WORKFLOW_STEPS = 50;

/**
 * Workflow lifecycle: created as `running`, then exactly one transition to a
 * terminal status once every scheduled step has been attempted.
 */
export type WorkflowStatus = 'running' | 'completed' | 'failed' | 'partial_success';

export type AggregateStatus = Exclude<WorkflowStatus, 'running'>;

/** Steps progress: pending → running → success | error | skipped */
export type StepStatus = 'pending' | 'running' | 'success' | 'error' | 'skipped';

export type StepOutcome = Extract<StepStatus, 'success' | 'error' | 'skipped'>;

export interface StepDefinition {
    agentId: string;
    message: string;
    /** Defaults to `step_<position>` (1-based) when omitted. */
    stepName?: string;
    dependsOn?: string[];
    /** Forward-declared consumers. Advisory only, never used for scheduling. */
    passResultTo?: string[];
}

export interface WorkflowDefinition {
    name: string;
    description?: string;
    steps: StepDefinition[];
    parallel: boolean;
}

/** A step after positional name defaulting. */
export interface ResolvedStep {
    index: number;
    stepName: string;
    agentId: string;
    message: string;
    dependsOn: string[];
    passResultTo: string[];
}

export interface StepResult {
    stepName: string;
    agentId: string;
    /** The message actually sent, after dependency context was appended. */
    message: string;
    response: string;
    toolsUsed: string[];
    /** Seconds. */
    executionTime: number;
    status: StepStatus;
    error?: string;
    timestamp: string;
}

export interface WorkflowSummary {
    workflowId: string;
    workflowName: string;
    conversationId: string;
    steps: StepResult[];
    totalExecutionTime: number;
    status: WorkflowStatus;
    timestamp: string;
}

export interface WorkflowHeader {
    workflowId: string;
    name: string;
    status: WorkflowStatus;
    totalExecutionTime: number | null;
    stepCount: number;
    createdAt: string;
    conversationId: string;
}

export interface WorkflowStatusReport {
    workflowId: string;
    status: WorkflowStatus;
    totalExecutionTime: number | null;
    stepCount: number;
    completedCount: number;
    failedCount: number;
    timestamp: string;
}

export interface SimpleChainRequest {
    agentIds: string[];
    message: string;
    workflowName?: string;
    parallel?: boolean;
}
