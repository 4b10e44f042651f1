import { WorkflowStore } from '../repositories/workflow.repository';

const TAG = '[heartbeat]';

/**
 * Keeps heartbeat_at fresh for every workflow this process is orchestrating,
 * so the reaper can tell a slow run from an abandoned one.
 */
export class HeartbeatService {
    private readonly handles = new Map<string, NodeJS.Timeout>();

    constructor(
        private readonly workflows: Pick<WorkflowStore, 'touchHeartbeat'>,
        private readonly intervalMs: number = 5000,
    ) { }

    start(workflowId: string): void {
        if (this.handles.has(workflowId)) {
            console.warn(`${TAG} already running for workflow ${workflowId}`);
            return;
        }

        const handle = setInterval(() => {
            void this.tick(workflowId);
        }, this.intervalMs);
        handle.unref();
        this.handles.set(workflowId, handle);
    }

    stop(workflowId: string): void {
        const handle = this.handles.get(workflowId);
        if (!handle) return;
        clearInterval(handle);
        this.handles.delete(workflowId);
    }

    stopAll(): void {
        for (const handle of this.handles.values()) clearInterval(handle);
        if (this.handles.size > 0) {
            console.log(`${TAG} stopped ${this.handles.size} heartbeats`);
        }
        this.handles.clear();
    }

    isTracking(workflowId: string): boolean {
        return this.handles.has(workflowId);
    }

    private async tick(workflowId: string): Promise<void> {
        try {
            await this.workflows.touchHeartbeat(workflowId);
        } catch (err) {
            console.error(`${TAG} failed to update for workflow ${workflowId}:`, err);
        }
    }
}
