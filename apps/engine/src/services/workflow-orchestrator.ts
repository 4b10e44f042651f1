import { performance } from 'perf_hooks';
import { v7 as uuid } from 'uuid';
import {
    buildSimpleChain,
    NotFoundError,
    resolveSteps,
    SimpleChainRequest,
    StepResult,
    TemplateInfo,
    TemplateRegistry,
    WorkflowDefinition,
    WorkflowHeader,
    WorkflowStatusReport,
    WorkflowSummary,
} from '@agentchain/sdk';
import { WorkflowEntity } from '../db/workflow.entity';
import { WorkflowStepEntity } from '../db/workflow_step.entity';
import { OrchestrationError } from '../errors/orchestration.error';
import { StepSessions, StepStore } from '../repositories/step.repository';
import { WorkflowStore } from '../repositories/workflow.repository';
import { HeartbeatService } from './heartbeat.service';
import { LevelParallelScheduler } from './parallel-scheduler';
import { aggregateStatus } from './result-aggregator';
import { ScheduledStep, Scheduler } from './scheduler';
import { SequentialScheduler } from './sequential-scheduler';
import { StepExecutor } from './step-executor';
import { WorkflowValidator } from './workflow-validator';

const TAG = '[orchestrator]';

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 100;

export interface OrchestratorDeps {
    validator: WorkflowValidator;
    workflows: WorkflowStore;
    steps: StepStore;
    sessions: StepSessions;
    executor: StepExecutor;
    heartbeat: HeartbeatService;
    templates: TemplateRegistry;
    /** Steps of one parallel level in flight at once. */
    stepConcurrency?: number;
    newId?: () => string;
}

export function conversationIdFor(workflowId: string): string {
    return `workflow_${workflowId}`;
}

export function clampHistoryLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return DEFAULT_HISTORY_LIMIT;
    return Math.min(Math.floor(limit), MAX_HISTORY_LIMIT);
}

function toStepResult(row: WorkflowStepEntity): StepResult {
    return {
        stepName: row.step_name,
        agentId: row.agent_id,
        message: row.message,
        response: row.response ?? '',
        toolsUsed: row.tools_used ?? [],
        executionTime: row.execution_time ?? 0,
        status: row.status,
        error: row.error_message ?? undefined,
        timestamp: row.updated_at.toISOString(),
    };
}

/**
 * Entry point for workflow runs and lookups. A run goes
 * validate → persist (running, steps pending) → schedule → aggregate → finish.
 * Agent failures stay inside step results; anything that breaks the run
 * itself fails the workflow and surfaces as an OrchestrationError.
 */
export class WorkflowOrchestrator {
    private readonly sequential: Scheduler;
    private readonly parallel: Scheduler;
    private readonly newId: () => string;

    constructor(private readonly deps: OrchestratorDeps) {
        this.sequential = new SequentialScheduler(deps.executor, deps.steps);
        this.parallel = new LevelParallelScheduler(deps.executor, deps.sessions, deps.stepConcurrency);
        this.newId = deps.newId ?? uuid;
    }

    async executeWorkflow(definition: WorkflowDefinition, userId: string, signal?: AbortSignal): Promise<WorkflowSummary> {
        const { validator, workflows, heartbeat } = this.deps;

        await validator.validate(definition, userId);

        const workflowId = this.newId();
        const conversationId = conversationIdFor(workflowId);
        const startedAt = performance.now();
        const elapsed = () => (performance.now() - startedAt) / 1000;
        const resolved = resolveSteps(definition.steps);

        let scheduled: ScheduledStep[];
        try {
            const created = await workflows.createWithSteps({
                id: workflowId,
                name: definition.name,
                description: definition.description ?? null,
                conversationId,
                userId,
            }, resolved);
            scheduled = resolved.map((step, i) => ({ ...step, id: created.steps[i].id }));
        } catch (err) {
            throw new OrchestrationError(`Failed to create workflow: ${errorMessage(err)}`, workflowId, err);
        }

        const mode = definition.parallel ? 'parallel' : 'sequential';
        console.log(`${TAG} workflow ${workflowId} "${definition.name}" started (${resolved.length} steps, ${mode})`);

        heartbeat.start(workflowId);
        try {
            const scheduler = definition.parallel ? this.parallel : this.sequential;
            const results = await scheduler.run(scheduled, { workflowId, callerId: userId, signal });

            const status = aggregateStatus(results);
            const totalExecutionTime = elapsed();
            const finished = await workflows.finish(workflowId, status, totalExecutionTime);
            if (!finished) {
                console.warn(`${TAG} workflow ${workflowId} was already closed, keeping stored status`);
            }

            console.log(`${TAG} workflow ${workflowId} ${status} in ${totalExecutionTime.toFixed(3)}s`);

            return {
                workflowId,
                workflowName: definition.name,
                conversationId,
                steps: results,
                totalExecutionTime,
                status: finished ? status : 'failed',
                timestamp: new Date().toISOString(),
            };
        } catch (err) {
            console.error(`${TAG} workflow ${workflowId} failed:`, err);
            await this.markFailed(workflowId, elapsed());
            throw err instanceof OrchestrationError
                ? err
                : new OrchestrationError(`Workflow execution failed: ${errorMessage(err)}`, workflowId, err);
        } finally {
            heartbeat.stop(workflowId);
        }
    }

    async executeSimpleChain(request: SimpleChainRequest, userId: string, signal?: AbortSignal): Promise<WorkflowSummary> {
        return this.executeWorkflow(buildSimpleChain(request), userId, signal);
    }

    async executeTemplate(
        templateName: string,
        params: Readonly<Record<string, string>>,
        userId: string,
        workflowName?: string,
        signal?: AbortSignal,
    ): Promise<WorkflowSummary> {
        const definition = this.deps.templates.instantiate(templateName, params, workflowName);
        return this.executeWorkflow(definition, userId, signal);
    }

    listTemplates(): TemplateInfo[] {
        return this.deps.templates.list();
    }

    async getWorkflowDetails(workflowId: string, userId: string): Promise<WorkflowSummary> {
        const workflow = await this.findOwned(workflowId, userId);
        const rows = await this.deps.steps.findByWorkflowId(workflow.id);

        return {
            workflowId: workflow.id,
            workflowName: workflow.name,
            conversationId: workflow.conversation_id,
            steps: rows.map(toStepResult),
            totalExecutionTime: workflow.total_execution_time ?? 0,
            status: workflow.status,
            timestamp: workflow.created_at.toISOString(),
        };
    }

    async getWorkflowHistory(userId: string, limit?: number): Promise<WorkflowHeader[]> {
        const rows = await this.deps.workflows.listByOwner(userId, clampHistoryLimit(limit));
        return rows.map(row => ({
            workflowId: row.id,
            name: row.name,
            status: row.status,
            totalExecutionTime: row.total_execution_time,
            stepCount: row.step_count,
            createdAt: row.created_at.toISOString(),
            conversationId: row.conversation_id,
        }));
    }

    async getWorkflowStatus(workflowId: string, userId: string): Promise<WorkflowStatusReport> {
        const workflow = await this.findOwned(workflowId, userId);
        const rows = await this.deps.steps.findByWorkflowId(workflow.id);

        return {
            workflowId: workflow.id,
            status: workflow.status,
            totalExecutionTime: workflow.total_execution_time,
            stepCount: rows.length,
            completedCount: rows.filter(r => r.status === 'success').length,
            failedCount: rows.filter(r => r.status === 'error').length,
            timestamp: workflow.updated_at.toISOString(),
        };
    }

    private async findOwned(workflowId: string, userId: string): Promise<WorkflowEntity> {
        const workflow = await this.deps.workflows.findByIdAndOwner(workflowId, userId);
        if (!workflow) {
            throw new NotFoundError('Workflow', workflowId);
        }
        return workflow;
    }

    private async markFailed(workflowId: string, totalExecutionTime: number): Promise<void> {
        try {
            await this.deps.workflows.finish(workflowId, 'failed', totalExecutionTime);
        } catch (err) {
            // the reaper closes it once the heartbeat goes stale
            console.error(`${TAG} could not mark workflow ${workflowId} failed:`, err);
        }
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
