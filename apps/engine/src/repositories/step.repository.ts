import { ResolvedStep, StepResult } from '@agentchain/sdk';
import { Queryable } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { WorkflowStepEntity } from '../db/workflow_step.entity';

export interface StepStore {
    markRunning(stepId: string): Promise<void>;
    /** Writes the terminal status together with response, tools, timing and error. */
    saveOutcome(stepId: string, result: StepResult): Promise<void>;
    findByWorkflowId(workflowId: string): Promise<WorkflowStepEntity[]>;
}

/** Hands out a step store bound to a resource no concurrent caller shares. */
export interface StepSessions {
    withSession<T>(fn: (steps: StepStore) => Promise<T>): Promise<T>;
}

export class StepRepository implements StepStore {
    constructor(private readonly db: Queryable) { }

    async create(workflowId: string, step: ResolvedStep): Promise<WorkflowStepEntity> {
        const res = await this.db.query<WorkflowStepEntity>(
            `INSERT INTO workflow_steps
                (workflow_id, step_index, step_name, agent_id, message, status, depends_on, pass_result_to)
             VALUES ($1, $2, $3, $4, $5, 'pending', $6, $7)
             RETURNING *`,
            [
                workflowId,
                step.index,
                step.stepName,
                step.agentId,
                step.message,
                JSON.stringify(step.dependsOn),
                JSON.stringify(step.passResultTo),
            ],
        );
        return res.rows[0];
    }

    async markRunning(stepId: string): Promise<void> {
        await this.db.query(
            "UPDATE workflow_steps SET status = 'running', updated_at = NOW() WHERE id = $1",
            [stepId],
        );
    }

    async saveOutcome(stepId: string, result: StepResult): Promise<void> {
        await this.db.query(
            `UPDATE workflow_steps
             SET status = $1, response = $2, tools_used = $3, execution_time = $4,
                 error_message = $5, updated_at = NOW()
             WHERE id = $6`,
            [
                result.status,
                result.response,
                JSON.stringify(result.toolsUsed),
                result.executionTime,
                result.error ?? null,
                stepId,
            ],
        );
    }

    async findByWorkflowId(workflowId: string): Promise<WorkflowStepEntity[]> {
        const res = await this.db.query<WorkflowStepEntity>(
            'SELECT * FROM workflow_steps WHERE workflow_id = $1 ORDER BY step_index ASC',
            [workflowId],
        );
        return res.rows;
    }
}

/**
 * One pooled connection per session, held for the whole step and released
 * when the session ends. Callers bound how many sessions are open at once.
 */
export class PooledStepSessions implements StepSessions {
    constructor(private readonly tx: TransactionManager) { }

    withSession<T>(fn: (steps: StepStore) => Promise<T>): Promise<T> {
        return this.tx.checkout(client => fn(new StepRepository(client)));
    }
}
