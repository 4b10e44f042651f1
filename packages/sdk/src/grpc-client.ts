import * as grpc from '@grpc/grpc-js';
import { loadProto, methodDefinition, serviceDefinition, unaryCall, WORKFLOW_SERVICE } from './proto';
import { TemplateInfo } from './templates';
import {
    SimpleChainRequest,
    WorkflowDefinition,
    WorkflowHeader,
    WorkflowStatusReport,
    WorkflowSummary,
} from './types';
import { encodePayload } from './utils/serialization';
import {
    OWNER_METADATA_KEY,
    parseHeaderMessage,
    parseStatusMessage,
    parseSummaryMessage,
    parseTemplateInfoMessage,
    readList,
} from './wire';

export interface CallOptions {
    ownerId: string;
    signal?: AbortSignal;
    deadlineMs?: number;
}

/**
 * Thin client over `agentchain.v1.WorkflowService`.
 *
 * @example
 * const client = new WorkflowClient('localhost:50051');
 * const summary = await client.executeWorkflow(definition, { ownerId: 'user-1' });
 */
export class WorkflowClient {
    private readonly client: grpc.Client;
    private readonly service: grpc.ServiceDefinition;

    constructor(address: string, credentials = grpc.credentials.createInsecure()) {
        this.client = new grpc.Client(address, credentials);
        this.service = serviceDefinition(loadProto('workflow.service.proto'), WORKFLOW_SERVICE);
    }

    async executeWorkflow(definition: WorkflowDefinition, opts: CallOptions): Promise<WorkflowSummary> {
        const res = await this.call('ExecuteWorkflow', { definition: encodePayload(definition) }, opts);
        return parseSummaryMessage(res);
    }

    async executeSimpleChain(request: SimpleChainRequest, opts: CallOptions): Promise<WorkflowSummary> {
        const res = await this.call('ExecuteSimpleChain', {
            agent_ids: request.agentIds,
            message: request.message,
            workflow_name: request.workflowName ?? '',
            parallel: request.parallel ?? false,
        }, opts);
        return parseSummaryMessage(res);
    }

    async executeTemplate(
        templateName: string,
        params: Record<string, string>,
        opts: CallOptions & { workflowName?: string },
    ): Promise<WorkflowSummary> {
        const res = await this.call('ExecuteTemplate', {
            template_name: templateName,
            params,
            workflow_name: opts.workflowName ?? '',
        }, opts);
        return parseSummaryMessage(res);
    }

    async listTemplates(opts: CallOptions): Promise<TemplateInfo[]> {
        const res = await this.call('ListTemplates', {}, opts);
        return readList(res, 'templates').map(parseTemplateInfoMessage);
    }

    async getWorkflowDetails(workflowId: string, opts: CallOptions): Promise<WorkflowSummary> {
        const res = await this.call('GetWorkflowDetails', { workflow_id: workflowId }, opts);
        return parseSummaryMessage(res);
    }

    async getWorkflowHistory(limit: number, opts: CallOptions): Promise<WorkflowHeader[]> {
        const res = await this.call('GetWorkflowHistory', { limit }, opts);
        return readList(res, 'workflows').map(parseHeaderMessage);
    }

    async getWorkflowStatus(workflowId: string, opts: CallOptions): Promise<WorkflowStatusReport> {
        const res = await this.call('GetWorkflowStatus', { workflow_id: workflowId }, opts);
        return parseStatusMessage(res);
    }

    close(): void {
        this.client.close();
    }

    private call(method: string, request: object, opts: CallOptions): Promise<unknown> {
        const metadata = new grpc.Metadata();
        metadata.set(OWNER_METADATA_KEY, opts.ownerId);
        const callOptions: grpc.CallOptions = opts.deadlineMs ? { deadline: Date.now() + opts.deadlineMs } : {};
        return unaryCall(this.client, methodDefinition(this.service, method), request, metadata, callOptions, opts.signal);
    }
}
