import {
    hasCycle,
    MAX_WORKFLOW_STEPS,
    resolveSteps,
    toDependencyGraph,
    ValidationError,
    WorkflowDefinition,
} from '@agentchain/sdk';
import { AgentEntity, agentStatus } from '../db/agent.entity';
import { AgentDirectory } from './agent-directory';

export function checkStepCount(definition: WorkflowDefinition): void {
    if (definition.steps.length === 0) {
        throw new ValidationError('Workflow must have at least one step');
    }
    if (definition.steps.length > MAX_WORKFLOW_STEPS) {
        throw new ValidationError(`Workflow cannot have more than ${MAX_WORKFLOW_STEPS} steps`);
    }
}

/**
 * Structural gate run before anything is persisted. `agents` holds the
 * caller's agents keyed by id; anything missing from it is foreign or unknown.
 *
 * @throws ValidationError on the first violated rule
 */
export function validateDefinition(
    definition: WorkflowDefinition,
    agents: ReadonlyMap<string, AgentEntity>,
): void {
    checkStepCount(definition);

    const steps = resolveSteps(definition.steps);

    for (const step of steps) {
        const agent = agents.get(step.agentId);
        if (!agent) {
            throw new ValidationError(`Agent ${step.agentId} not found or not accessible`);
        }
        if (agent.status !== agentStatus.ACTIVE) {
            throw new ValidationError(`Agent ${step.agentId} is not active (status: ${agent.status})`);
        }
        if (!step.message || step.message.trim() === '') {
            throw new ValidationError(`Step ${step.stepName} message cannot be empty`);
        }
    }

    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const { stepName } of steps) {
        if (seen.has(stepName)) duplicates.add(stepName);
        seen.add(stepName);
    }
    if (duplicates.size > 0) {
        throw new ValidationError(`Step names must be unique (duplicated: ${[...duplicates].join(', ')})`);
    }

    for (const step of steps) {
        for (const dep of step.dependsOn) {
            if (dep === step.stepName) {
                throw new ValidationError(`Step ${step.stepName} cannot depend on itself`);
            }
            if (!seen.has(dep)) {
                throw new ValidationError(`Dependency '${dep}' of step ${step.stepName} not found in workflow steps`);
            }
        }
    }

    if (hasCycle(toDependencyGraph(steps))) {
        throw new ValidationError('Circular dependencies detected in workflow');
    }
}

export class WorkflowValidator {
    constructor(private readonly directory: AgentDirectory) { }

    async validate(definition: WorkflowDefinition, userId: string): Promise<void> {
        // Cheap bounds first so oversized requests never reach the agents table
        checkStepCount(definition);
        const agents = await this.directory.resolve(definition.steps.map(s => s.agentId), userId);
        validateDefinition(definition, agents);
    }
}
