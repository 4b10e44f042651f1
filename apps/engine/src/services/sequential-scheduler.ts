import { StepResult } from '@agentchain/sdk';
import { StepStore } from '../repositories/step.repository';
import { enhanceMessage } from './dependency-context';
import { ScheduleContext, ScheduledStep, Scheduler } from './scheduler';
import { StepExecutor } from './step-executor';

const TAG = '[scheduler]';

// Declaration order, one step at a time. A step runs only when every
// dependency already has a `success` result; otherwise it is skipped.
export class SequentialScheduler implements Scheduler {
    constructor(
        private readonly executor: StepExecutor,
        private readonly steps: StepStore,
    ) { }

    async run(steps: readonly ScheduledStep[], ctx: ScheduleContext): Promise<StepResult[]> {
        const results: StepResult[] = [];
        const byName = new Map<string, StepResult>();

        for (const step of steps) {
            const unmet = step.dependsOn.filter(dep => byName.get(dep)?.status !== 'success');

            let result: StepResult;
            if (unmet.length > 0) {
                console.log(`${TAG} workflow ${ctx.workflowId}: skipping ${step.stepName}, unmet: ${unmet.join(', ')}`);
                result = await this.executor.skip(this.steps, step.id, step, unmet);
            } else {
                result = await this.executor.execute(this.steps, {
                    stepId: step.id,
                    step,
                    enhancedMessage: enhanceMessage(step.message, step.dependsOn, byName),
                    callerId: ctx.callerId,
                    signal: ctx.signal,
                });
            }

            results.push(result);
            byName.set(step.stepName, result);
        }

        return results;
    }
}
