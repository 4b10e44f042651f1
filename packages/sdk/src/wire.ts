import { TemplateInfo } from './templates';
import {
    StepResult,
    StepStatus,
    WorkflowHeader,
    WorkflowStatus,
    WorkflowStatusReport,
    WorkflowSummary,
} from './types';

export const OWNER_METADATA_KEY = 'x-owner-id';

/** A gRPC message did not have the shape its proto promises. */
export class MalformedMessageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedMessageError';
    }
}

/** Wire shapes (snake_case, as loaded with keepCase). */
export interface StepResultMessage {
    step_name: string;
    agent_id: string;
    message: string;
    response: string;
    tools_used: string[];
    execution_time: number;
    status: string;
    error: string;
    timestamp: string;
}

export interface WorkflowSummaryMessage {
    workflow_id: string;
    workflow_name: string;
    conversation_id: string;
    steps: StepResultMessage[];
    total_execution_time: number;
    status: string;
    timestamp: string;
}

export interface WorkflowHeaderMessage {
    workflow_id: string;
    name: string;
    status: string;
    total_execution_time: number;
    step_count: number;
    created_at: string;
    conversation_id: string;
}

export interface WorkflowStatusMessage {
    workflow_id: string;
    status: string;
    total_execution_time: number;
    step_count: number;
    completed_count: number;
    failed_count: number;
    timestamp: string;
}

export interface TemplateInfoMessage {
    name: string;
    display_name: string;
    description: string;
    required_params: string[];
}

const WORKFLOW_STATUSES: readonly WorkflowStatus[] = ['running', 'completed', 'failed', 'partial_success'];
const STEP_STATUSES: readonly StepStatus[] = ['pending', 'running', 'success', 'error', 'skipped'];

export function asWorkflowStatus(value: string): WorkflowStatus {
    const status = WORKFLOW_STATUSES.find(s => s === value);
    if (!status) throw new MalformedMessageError(`unknown workflow status "${value}"`);
    return status;
}

export function asStepStatus(value: string): StepStatus {
    const status = STEP_STATUSES.find(s => s === value);
    if (!status) throw new MalformedMessageError(`unknown step status "${value}"`);
    return status;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function field(value: unknown, key: string): unknown {
    return isRecord(value) ? value[key] : undefined;
}

export function readString(value: unknown, key: string): string {
    const v = field(value, key);
    if (typeof v !== 'string') throw new MalformedMessageError(`${key} is not a string`);
    return v;
}

export function readNumber(value: unknown, key: string): number {
    const v = field(value, key);
    if (typeof v !== 'number') throw new MalformedMessageError(`${key} is not a number`);
    return v;
}

export function readBoolean(value: unknown, key: string): boolean {
    const v = field(value, key);
    if (typeof v !== 'boolean') throw new MalformedMessageError(`${key} is not a boolean`);
    return v;
}

export function readBytes(value: unknown, key: string): Uint8Array {
    const v = field(value, key);
    if (!(v instanceof Uint8Array)) throw new MalformedMessageError(`${key} is not bytes`);
    return v;
}

export function readList(value: unknown, key: string): unknown[] {
    const v = field(value, key);
    if (!Array.isArray(v)) throw new MalformedMessageError(`${key} is not a list`);
    return v;
}

export function readStrings(value: unknown, key: string): string[] {
    return readList(value, key).map(v => {
        if (typeof v !== 'string') throw new MalformedMessageError(`${key} holds a non-string`);
        return v;
    });
}

/** proto `map<string, string>` fields arrive as plain objects. */
export function readStringMap(value: unknown, key: string): Record<string, string> {
    const v = field(value, key);
    if (!isRecord(v) || Array.isArray(v)) throw new MalformedMessageError(`${key} is not a map`);
    const out: Record<string, string> = {};
    for (const [k, entry] of Object.entries(v)) {
        if (typeof entry !== 'string') throw new MalformedMessageError(`${key}.${k} is not a string`);
        out[k] = entry;
    }
    return out;
}

export function toStepResultMessage(step: StepResult): StepResultMessage {
    return {
        step_name: step.stepName,
        agent_id: step.agentId,
        message: step.message,
        response: step.response,
        tools_used: step.toolsUsed,
        execution_time: step.executionTime,
        status: step.status,
        error: step.error ?? '',
        timestamp: step.timestamp,
    };
}

export function toSummaryMessage(summary: WorkflowSummary): WorkflowSummaryMessage {
    return {
        workflow_id: summary.workflowId,
        workflow_name: summary.workflowName,
        conversation_id: summary.conversationId,
        steps: summary.steps.map(toStepResultMessage),
        total_execution_time: summary.totalExecutionTime,
        status: summary.status,
        timestamp: summary.timestamp,
    };
}

export function toHeaderMessage(header: WorkflowHeader): WorkflowHeaderMessage {
    return {
        workflow_id: header.workflowId,
        name: header.name,
        status: header.status,
        total_execution_time: header.totalExecutionTime ?? 0,
        step_count: header.stepCount,
        created_at: header.createdAt,
        conversation_id: header.conversationId,
    };
}

export function toStatusMessage(report: WorkflowStatusReport): WorkflowStatusMessage {
    return {
        workflow_id: report.workflowId,
        status: report.status,
        total_execution_time: report.totalExecutionTime ?? 0,
        step_count: report.stepCount,
        completed_count: report.completedCount,
        failed_count: report.failedCount,
        timestamp: report.timestamp,
    };
}

export function toTemplateInfoMessage(info: TemplateInfo): TemplateInfoMessage {
    return {
        name: info.name,
        display_name: info.displayName,
        description: info.description,
        required_params: info.requiredParams,
    };
}

export function parseSummaryMessage(value: unknown): WorkflowSummary {
    return {
        workflowId: readString(value, 'workflow_id'),
        workflowName: readString(value, 'workflow_name'),
        conversationId: readString(value, 'conversation_id'),
        steps: readList(value, 'steps').map(step => ({
            stepName: readString(step, 'step_name'),
            agentId: readString(step, 'agent_id'),
            message: readString(step, 'message'),
            response: readString(step, 'response'),
            toolsUsed: readStrings(step, 'tools_used'),
            executionTime: readNumber(step, 'execution_time'),
            status: asStepStatus(readString(step, 'status')),
            error: readString(step, 'error') || undefined,
            timestamp: readString(step, 'timestamp'),
        })),
        totalExecutionTime: readNumber(value, 'total_execution_time'),
        status: asWorkflowStatus(readString(value, 'status')),
        timestamp: readString(value, 'timestamp'),
    };
}

export function parseHeaderMessage(value: unknown): WorkflowHeader {
    return {
        workflowId: readString(value, 'workflow_id'),
        name: readString(value, 'name'),
        status: asWorkflowStatus(readString(value, 'status')),
        totalExecutionTime: readNumber(value, 'total_execution_time'),
        stepCount: readNumber(value, 'step_count'),
        createdAt: readString(value, 'created_at'),
        conversationId: readString(value, 'conversation_id'),
    };
}

export function parseStatusMessage(value: unknown): WorkflowStatusReport {
    return {
        workflowId: readString(value, 'workflow_id'),
        status: asWorkflowStatus(readString(value, 'status')),
        totalExecutionTime: readNumber(value, 'total_execution_time'),
        stepCount: readNumber(value, 'step_count'),
        completedCount: readNumber(value, 'completed_count'),
        failedCount: readNumber(value, 'failed_count'),
        timestamp: readString(value, 'timestamp'),
    };
}

export function parseTemplateInfoMessage(value: unknown): TemplateInfo {
    return {
        name: readString(value, 'name'),
        displayName: readString(value, 'display_name'),
        description: readString(value, 'description'),
        requiredParams: readStrings(value, 'required_params'),
    };
}
