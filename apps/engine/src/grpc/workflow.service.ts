import * as grpc from '@grpc/grpc-js';
import { sendUnaryData } from '@grpc/grpc-js';
import {
    decodePayload,
    MalformedMessageError,
    NotFoundError,
    OWNER_METADATA_KEY,
    parseWorkflowDefinition,
    readBoolean,
    readBytes,
    readNumber,
    readString,
    readStringMap,
    readStrings,
    SerializationError,
    TemplateInfoMessage,
    toHeaderMessage,
    toStatusMessage,
    toSummaryMessage,
    toTemplateInfoMessage,
    ValidationError,
    WorkflowHeaderMessage,
    WorkflowStatusMessage,
    WorkflowSummaryMessage,
} from '@agentchain/sdk';
import { OrchestrationError } from '../errors/orchestration.error';
import { WorkflowOrchestrator } from '../services/workflow-orchestrator';

const TAG = '[WorkflowService]';

/** The parts of a grpc-js unary call the handlers use. */
export interface UnaryCall {
    request: unknown;
    metadata: grpc.Metadata;
    on(event: 'cancelled', listener: () => void): unknown;
}

export class MissingCallerError extends Error {
    constructor() {
        super(`missing ${OWNER_METADATA_KEY} metadata`);
        this.name = 'MissingCallerError';
    }
}

export function ownerOf(call: UnaryCall): string {
    const [value] = call.metadata.get(OWNER_METADATA_KEY);
    if (typeof value !== 'string' || value.trim() === '') {
        throw new MissingCallerError();
    }
    return value;
}

export function toStatus(err: unknown): Partial<grpc.StatusObject> {
    const details = err instanceof Error ? err.message : 'Unknown error';

    if (err instanceof MissingCallerError) return { code: grpc.status.UNAUTHENTICATED, details };
    if (err instanceof ValidationError || err instanceof SerializationError || err instanceof MalformedMessageError) {
        return { code: grpc.status.INVALID_ARGUMENT, details };
    }
    if (err instanceof NotFoundError) return { code: grpc.status.NOT_FOUND, details };
    return { code: grpc.status.INTERNAL, details };
}

/** Aborted when the client cancels the call or its deadline passes. */
function cancellationOf(call: UnaryCall): AbortSignal {
    const controller = new AbortController();
    call.on('cancelled', () => controller.abort());
    return controller.signal;
}

/**
 * gRPC handlers for `agentchain.v1.WorkflowService`. Requests are narrowed
 * from their loaded shape, the caller is read from metadata, and errors are
 * mapped onto status codes.
 */
export class WorkflowServiceImpl {
    constructor(private readonly orchestrator: WorkflowOrchestrator) { }

    executeWorkflow(call: UnaryCall, callback: sendUnaryData<WorkflowSummaryMessage>): void {
        this.respond('executeWorkflow', callback, async () => {
            const userId = ownerOf(call);
            const definition = parseWorkflowDefinition(decodePayload(readBytes(call.request, 'definition')));
            const summary = await this.orchestrator.executeWorkflow(definition, userId, cancellationOf(call));
            return toSummaryMessage(summary);
        });
    }

    executeSimpleChain(call: UnaryCall, callback: sendUnaryData<WorkflowSummaryMessage>): void {
        this.respond('executeSimpleChain', callback, async () => {
            const userId = ownerOf(call);
            const summary = await this.orchestrator.executeSimpleChain({
                agentIds: readStrings(call.request, 'agent_ids'),
                message: readString(call.request, 'message'),
                workflowName: readString(call.request, 'workflow_name') || undefined,
                parallel: readBoolean(call.request, 'parallel'),
            }, userId, cancellationOf(call));
            return toSummaryMessage(summary);
        });
    }

    executeTemplate(call: UnaryCall, callback: sendUnaryData<WorkflowSummaryMessage>): void {
        this.respond('executeTemplate', callback, async () => {
            const userId = ownerOf(call);
            const summary = await this.orchestrator.executeTemplate(
                readString(call.request, 'template_name'),
                readStringMap(call.request, 'params'),
                userId,
                readString(call.request, 'workflow_name') || undefined,
                cancellationOf(call),
            );
            return toSummaryMessage(summary);
        });
    }

    listTemplates(call: UnaryCall, callback: sendUnaryData<{ templates: TemplateInfoMessage[] }>): void {
        this.respond('listTemplates', callback, async () => {
            ownerOf(call);
            return { templates: this.orchestrator.listTemplates().map(toTemplateInfoMessage) };
        });
    }

    getWorkflowDetails(call: UnaryCall, callback: sendUnaryData<WorkflowSummaryMessage>): void {
        this.respond('getWorkflowDetails', callback, async () => {
            const userId = ownerOf(call);
            const summary = await this.orchestrator.getWorkflowDetails(readString(call.request, 'workflow_id'), userId);
            return toSummaryMessage(summary);
        });
    }

    getWorkflowHistory(call: UnaryCall, callback: sendUnaryData<{ workflows: WorkflowHeaderMessage[] }>): void {
        this.respond('getWorkflowHistory', callback, async () => {
            const userId = ownerOf(call);
            const headers = await this.orchestrator.getWorkflowHistory(userId, readNumber(call.request, 'limit') || undefined);
            return { workflows: headers.map(toHeaderMessage) };
        });
    }

    getWorkflowStatus(call: UnaryCall, callback: sendUnaryData<WorkflowStatusMessage>): void {
        this.respond('getWorkflowStatus', callback, async () => {
            const userId = ownerOf(call);
            const report = await this.orchestrator.getWorkflowStatus(readString(call.request, 'workflow_id'), userId);
            return toStatusMessage(report);
        });
    }

    private respond<T>(method: string, callback: sendUnaryData<T>, work: () => Promise<T>): void {
        void work().then(
            res => callback(null, res),
            (err: unknown) => {
                const status = toStatus(err);
                if (status.code === grpc.status.INTERNAL) {
                    const workflow = err instanceof OrchestrationError ? ` (workflow ${err.workflowId})` : '';
                    console.error(`${TAG} ${method} error${workflow}:`, err);
                }
                callback(status);
            },
        );
    }
}
