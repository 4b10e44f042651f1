import { ResolvedStep, StepDefinition } from './types';

/** step name -> names of its direct dependencies */
export type DependencyGraph = ReadonlyMap<string, Iterable<string>>;

type VisitState = 'in-progress' | 'done';

export class UnschedulableStepsError extends Error {
    constructor(public readonly remaining: string[]) {
        super(`Cannot schedule steps with unresolved dependencies: ${remaining.join(', ')}`);
        this.name = 'UnschedulableStepsError';
    }
}

export function defaultStepName(index: number): string {
    return `step_${index + 1}`;
}

// Defaulting is strictly positional so references to `step_<n>` resolve the
// same way no matter which other steps carry explicit names.
export function resolveSteps(steps: readonly StepDefinition[]): ResolvedStep[] {
    return steps.map((step, index) => ({
        index,
        stepName: step.stepName && step.stepName.trim() !== '' ? step.stepName : defaultStepName(index),
        agentId: step.agentId,
        message: step.message,
        dependsOn: [...(step.dependsOn ?? [])],
        passResultTo: [...(step.passResultTo ?? [])],
    }));
}

export function toDependencyGraph(steps: readonly Pick<ResolvedStep, 'stepName' | 'dependsOn'>[]): DependencyGraph {
    return new Map(steps.map(step => [step.stepName, step.dependsOn]));
}

/**
 * Three-colour depth-first search. A dependency that is not a key of the
 * graph is a leaf. Iterative, so deep chains cannot overflow the stack.
 */
export function hasCycle(graph: DependencyGraph): boolean {
    const state = new Map<string, VisitState>();

    for (const root of graph.keys()) {
        if (state.has(root)) continue;

        state.set(root, 'in-progress');
        const stack: Array<{ node: string; deps: Iterator<string> }> = [
            { node: root, deps: dependenciesOf(graph, root) },
        ];

        while (stack.length > 0) {
            const frame = stack[stack.length - 1];
            const next = frame.deps.next();

            if (next.done) {
                state.set(frame.node, 'done');
                stack.pop();
                continue;
            }

            const dep = next.value;
            const seen = state.get(dep);
            if (seen === 'in-progress') return true;
            if (seen === 'done') continue;

            state.set(dep, 'in-progress');
            stack.push({ node: dep, deps: dependenciesOf(graph, dep) });
        }
    }

    return false;
}

function dependenciesOf(graph: DependencyGraph, node: string): Iterator<string> {
    return (graph.get(node) ?? [])[Symbol.iterator]();
}

/**
 * Topological generations: level 0 holds steps without dependencies, level k
 * the steps whose dependencies all sit in levels < k. Declaration order is
 * kept inside a level.
 *
 * @throws UnschedulableStepsError when a pass places nothing while steps remain
 */
export function groupByLevel<T extends Pick<ResolvedStep, 'stepName' | 'dependsOn'>>(steps: readonly T[]): T[][] {
    const levels: T[][] = [];
    const placed = new Set<string>();
    let remaining = [...steps];

    while (remaining.length > 0) {
        const level = remaining.filter(step => step.dependsOn.every(dep => placed.has(dep)));

        if (level.length === 0) {
            throw new UnschedulableStepsError(remaining.map(step => step.stepName));
        }

        for (const step of level) placed.add(step.stepName);
        remaining = remaining.filter(step => !placed.has(step.stepName));
        levels.push(level);
    }

    return levels;
}
