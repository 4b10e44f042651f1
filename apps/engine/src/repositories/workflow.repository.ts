import { AggregateStatus, ResolvedStep } from '@agentchain/sdk';
import { Queryable } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { WorkflowEntity, WorkflowHeaderRow } from '../db/workflow.entity';
import { WorkflowStepEntity } from '../db/workflow_step.entity';
import { StepRepository } from './step.repository';

export interface NewWorkflow {
    id: string;
    name: string;
    description: string | null;
    conversationId: string;
    userId: string;
}

export interface CreatedWorkflow {
    workflow: WorkflowEntity;
    steps: WorkflowStepEntity[];
}

export interface AbandonedWorkflow {
    id: string;
    name: string;
}

export interface WorkflowStore {
    /** Inserts the workflow (`running`) and every step (`pending`) atomically. */
    createWithSteps(workflow: NewWorkflow, steps: readonly ResolvedStep[]): Promise<CreatedWorkflow>;
    /** Terminal transition; false when the workflow had already left `running`. */
    finish(id: string, status: AggregateStatus, totalExecutionTime: number): Promise<boolean>;
    touchHeartbeat(id: string): Promise<void>;
    findByIdAndOwner(id: string, userId: string): Promise<WorkflowEntity | null>;
    listByOwner(userId: string, limit: number): Promise<WorkflowHeaderRow[]>;
    failAbandoned(staleSeconds: number, reason: string): Promise<AbandonedWorkflow[]>;
}

export class WorkflowRepository implements WorkflowStore {
    constructor(
        private readonly db: Queryable,
        private readonly tx: TransactionManager,
    ) { }

    async createWithSteps(workflow: NewWorkflow, steps: readonly ResolvedStep[]): Promise<CreatedWorkflow> {
        return this.tx.run(async (client) => {
            const res = await client.query<WorkflowEntity>(
                `INSERT INTO workflows (id, name, description, conversation_id, user_id, status, heartbeat_at)
                 VALUES ($1, $2, $3, $4, $5, 'running', NOW())
                 RETURNING *`,
                [workflow.id, workflow.name, workflow.description, workflow.conversationId, workflow.userId],
            );

            const stepRepo = new StepRepository(client);
            const created: WorkflowStepEntity[] = [];
            for (const step of steps) {
                created.push(await stepRepo.create(workflow.id, step));
            }

            return { workflow: res.rows[0], steps: created };
        });
    }

    async finish(id: string, status: AggregateStatus, totalExecutionTime: number): Promise<boolean> {
        const res = await this.db.query(
            `UPDATE workflows
             SET status = $1, total_execution_time = $2, updated_at = NOW()
             WHERE id = $3 AND status = 'running'`,
            [status, totalExecutionTime, id],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async touchHeartbeat(id: string): Promise<void> {
        await this.db.query('UPDATE workflows SET heartbeat_at = NOW() WHERE id = $1', [id]);
    }

    async findByIdAndOwner(id: string, userId: string): Promise<WorkflowEntity | null> {
        // text comparison: a malformed id is simply not found
        const res = await this.db.query<WorkflowEntity>(
            'SELECT * FROM workflows WHERE id::text = $1 AND user_id::text = $2',
            [id, userId],
        );
        return res.rows[0] || null;
    }

    async listByOwner(userId: string, limit: number): Promise<WorkflowHeaderRow[]> {
        const res = await this.db.query<WorkflowHeaderRow>(
            `SELECT w.id, w.name, w.status, w.total_execution_time, w.created_at, w.conversation_id,
                    COUNT(s.id)::int AS step_count
             FROM workflows w
             LEFT JOIN workflow_steps s ON s.workflow_id = w.id
             WHERE w.user_id::text = $1
             GROUP BY w.id
             ORDER BY w.created_at DESC
             LIMIT $2`,
            [userId, limit],
        );
        return res.rows;
    }

    async failAbandoned(staleSeconds: number, reason: string): Promise<AbandonedWorkflow[]> {
        const res = await this.db.query<AbandonedWorkflow>(
            `WITH stale AS (
                UPDATE workflows
                SET status = 'failed',
                    total_execution_time = EXTRACT(EPOCH FROM (NOW() - created_at))::float8,
                    updated_at = NOW()
                WHERE status = 'running'
                  AND COALESCE(heartbeat_at, created_at) < NOW() - (INTERVAL '1 second' * $1)
                RETURNING id, name
             ), abandoned_steps AS (
                UPDATE workflow_steps
                SET status = 'error', error_message = $2, updated_at = NOW()
                WHERE workflow_id IN (SELECT id FROM stale)
                  AND status IN ('pending', 'running')
             )
             SELECT id, name FROM stale`,
            [staleSeconds, reason],
        );
        return res.rows;
    }
}
