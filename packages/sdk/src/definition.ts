import { ValidationError } from './errors';
import { defaultStepName } from './graph';
import { SimpleChainRequest, StepDefinition, WorkflowDefinition } from './types';

export const DEFAULT_WORKFLOW_NAME = 'Multi-Step Workflow';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
    return value;
}

function optionalNames(value: unknown, field: string): string[] | undefined {
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ValidationError(`${field} must be a list of step names`);
    }
    return value;
}

function parseStep(value: unknown, index: number): StepDefinition {
    const label = `Step ${index + 1}`;
    if (!isRecord(value)) throw new ValidationError(`${label} must be an object`);

    const { agentId, message } = value;
    if (typeof agentId !== 'string' || typeof message !== 'string') {
        throw new ValidationError(`${label} must have 'agentId' and 'message' fields`);
    }

    return {
        agentId,
        message,
        stepName: optionalString(value.stepName, `${label} stepName`),
        dependsOn: optionalNames(value.dependsOn, `${label} dependsOn`),
        passResultTo: optionalNames(value.passResultTo, `${label} passResultTo`),
    };
}

/**
 * Shape-checks an untrusted payload. Structural rules (step limits, unique
 * names, cycles, agent ownership) are left to the engine's validator.
 */
export function parseWorkflowDefinition(input: unknown): WorkflowDefinition {
    if (!isRecord(input)) throw new ValidationError('Workflow definition must be an object');

    const { steps, parallel } = input;
    if (!Array.isArray(steps)) throw new ValidationError('Workflow definition must contain a list of steps');
    if (parallel !== undefined && typeof parallel !== 'boolean') {
        throw new ValidationError('parallel must be a boolean');
    }

    const name = optionalString(input.name, 'name');

    return {
        name: name && name.trim() !== '' ? name : DEFAULT_WORKFLOW_NAME,
        description: optionalString(input.description, 'description'),
        steps: steps.map(parseStep),
        parallel: parallel ?? false,
    };
}

/**
 * Same message to every agent. Sequential chains make each step depend on
 * all earlier ones; parallel chains have no dependencies at all.
 */
export function buildSimpleChain(request: SimpleChainRequest): WorkflowDefinition {
    const { agentIds, message } = request;
    const parallel = request.parallel ?? false;

    if (agentIds.length === 0 || message.trim() === '') {
        throw new ValidationError('agentIds and message are required');
    }

    const steps = agentIds.map((agentId, i) => ({
        agentId,
        message,
        stepName: defaultStepName(i),
        dependsOn: parallel ? [] : agentIds.slice(0, i).map((_, j) => defaultStepName(j)),
    }));

    return {
        name: request.workflowName || `Simple Chain - ${agentIds.length} agents`,
        steps,
        parallel,
    };
}
