import { ResolvedStep, StepResult } from '@agentchain/sdk';

/** A resolved step together with the id of its persisted row. */
export interface ScheduledStep extends ResolvedStep {
    id: string;
}

export interface ScheduleContext {
    workflowId: string;
    callerId: string;
    signal?: AbortSignal;
}

export interface Scheduler {
    /** Attempts every step once and returns the results in execution order. */
    run(steps: readonly ScheduledStep[], ctx: ScheduleContext): Promise<StepResult[]>;
}
