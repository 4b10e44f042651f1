import { performance } from 'perf_hooks';
import { ResolvedStep, StepOutcome, StepResult } from '@agentchain/sdk';
import { AgentInvocationError } from '../errors/agent-invocation.error';
import { StepStore } from '../repositories/step.repository';
import { AgentInvoker } from './agent-invoker';

const TAG = '[executor]';

export interface StepExecution {
    stepId: string;
    step: ResolvedStep;
    /** Sent to the agent in place of the step's original message. */
    enhancedMessage: string;
    callerId: string;
    signal?: AbortSignal;
}

function outcome(
    step: ResolvedStep,
    message: string,
    status: StepOutcome,
    fields: Partial<Pick<StepResult, 'response' | 'toolsUsed' | 'executionTime' | 'error'>> = {},
): StepResult {
    return {
        stepName: step.stepName,
        agentId: step.agentId,
        message,
        response: fields.response ?? '',
        toolsUsed: fields.toolsUsed ?? [],
        executionTime: fields.executionTime ?? 0,
        status,
        error: fields.error,
        timestamp: new Date().toISOString(),
    };
}

/**
 * Runs one step against its agent. Agent failures become an `error` result;
 * persistence failures propagate to the scheduler.
 */
export class StepExecutor {
    constructor(private readonly invoker: AgentInvoker) { }

    async execute(store: StepStore, exec: StepExecution): Promise<StepResult> {
        const { stepId, step, enhancedMessage, callerId, signal } = exec;

        if (signal?.aborted) {
            const result = outcome(step, enhancedMessage, 'error', {
                error: 'Workflow cancelled before step started',
            });
            await store.saveOutcome(stepId, result);
            return result;
        }

        await store.markRunning(stepId);

        const startedAt = performance.now();
        let result: StepResult;
        try {
            const reply = await this.invoker.invoke({
                agentId: step.agentId,
                message: enhancedMessage,
                callerId,
                signal,
            });
            result = outcome(step, enhancedMessage, 'success', {
                response: reply.response,
                toolsUsed: reply.toolsUsed,
                executionTime: (performance.now() - startedAt) / 1000,
            });
        } catch (err) {
            const failure = AgentInvocationError.from(step.agentId, err, signal?.aborted ?? false);
            const error = failure.aborted ? `Step aborted: ${failure.message}` : failure.message;
            console.warn(`${TAG} step ${step.stepName} (agent ${step.agentId}) failed: ${error}`);
            result = outcome(step, enhancedMessage, 'error', {
                executionTime: (performance.now() - startedAt) / 1000,
                error,
            });
        }

        await store.saveOutcome(stepId, result);
        return result;
    }

    /** Records a step that will not run because some dependencies did not succeed. */
    async skip(store: StepStore, stepId: string, step: ResolvedStep, unmet: readonly string[]): Promise<StepResult> {
        const result = outcome(step, step.message, 'skipped', {
            error: `Dependencies not met: ${unmet.join(', ')}`,
        });
        await store.saveOutcome(stepId, result);
        return result;
    }
}
