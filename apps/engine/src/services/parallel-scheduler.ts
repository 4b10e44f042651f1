import { groupByLevel, StepResult, UnschedulableStepsError } from '@agentchain/sdk';
import { OrchestrationError } from '../errors/orchestration.error';
import { StepSessions } from '../repositories/step.repository';
import { enhanceMessage } from './dependency-context';
import { ScheduleContext, ScheduledStep, Scheduler } from './scheduler';
import { StepExecutor } from './step-executor';

const TAG = '[scheduler]';

export const DEFAULT_STEP_CONCURRENCY = 10;

/**
 * allSettled over `items`, with at most `limit` callbacks in flight.
 * Results keep the order of `items`.
 */
async function settleBounded<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
    const settled = new Array<PromiseSettledResult<R>>(items.length);
    let next = 0;

    const lane = async (): Promise<void> => {
        while (next < items.length) {
            const i = next++;
            try {
                settled[i] = { status: 'fulfilled', value: await fn(items[i]) };
            } catch (reason) {
                settled[i] = { status: 'rejected', reason };
            }
        }
    };

    await Promise.all(Array.from({ length: Math.min(limit, items.length) }, lane));
    return settled;
}

/**
 * Runs topological generations one after another, and every step of a
 * generation concurrently on its own store session. Failed dependencies do
 * not block a step here; they reach it as warning blocks in its message.
 *
 * At most `concurrency` steps of a level are in flight at once; the rest
 * wait for a free lane. Results are merged into the shared map only once the
 * whole level settled.
 */
export class LevelParallelScheduler implements Scheduler {
    constructor(
        private readonly executor: StepExecutor,
        private readonly sessions: StepSessions,
        private readonly concurrency = DEFAULT_STEP_CONCURRENCY,
    ) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`step concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    async run(steps: readonly ScheduledStep[], ctx: ScheduleContext): Promise<StepResult[]> {
        let levels: ScheduledStep[][];
        try {
            levels = groupByLevel(steps);
        } catch (err) {
            if (err instanceof UnschedulableStepsError) {
                throw new OrchestrationError(err.message, ctx.workflowId, err);
            }
            throw err;
        }

        const results: StepResult[] = [];
        const byName = new Map<string, StepResult>();

        for (const [depth, level] of levels.entries()) {
            console.log(`${TAG} workflow ${ctx.workflowId}: level ${depth} (${level.map(s => s.stepName).join(', ')})`);

            const completed: ReadonlyMap<string, StepResult> = new Map(byName);
            const settled = await settleBounded(level, this.concurrency, step =>
                this.sessions.withSession(store => this.executor.execute(store, {
                    stepId: step.id,
                    step,
                    enhancedMessage: enhanceMessage(step.message, step.dependsOn, completed),
                    callerId: ctx.callerId,
                    signal: ctx.signal,
                })),
            );

            for (const [i, outcome] of settled.entries()) {
                if (outcome.status === 'rejected') {
                    throw new OrchestrationError(
                        `Step ${level[i].stepName} could not be recorded`,
                        ctx.workflowId,
                        outcome.reason,
                    );
                }
                results.push(outcome.value);
                byName.set(outcome.value.stepName, outcome.value);
            }
        }

        return results;
    }
}
