import { AbandonedWorkflow, WorkflowStore } from '../repositories/workflow.repository';
import { LeaderElector } from './leaderelector';

const TAG = '[reaper]';

export const ABANDONED_REASON = 'Workflow abandoned by its orchestrator';

export interface ReaperOptions {
    staleThresholdSeconds?: number;
    intervalMs?: number;
}

// Closes workflows whose orchestrating process stopped heartbeating. Only the
// Redis-elected leader reaps, so a workflow is never closed twice. Instances
// that are not leader keep contending on every interval, so a standby takes
// over once a dead leader's key expires.
export class Reaper {
    private readonly intervalMs: number;
    private readonly staleThresholdSeconds: number;
    private intervalHandle: NodeJS.Timeout | null = null;
    private leading = false;
    private isReaping = false;

    constructor(
        private readonly workflows: Pick<WorkflowStore, 'failAbandoned'>,
        private readonly leaderElector: LeaderElector,
        options: ReaperOptions = {},
    ) {
        this.staleThresholdSeconds = options.staleThresholdSeconds ?? 300;
        this.intervalMs = options.intervalMs ?? 10_000;
    }

    async start(): Promise<void> {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }

        console.log(`${TAG} started (interval: ${this.intervalMs}ms, stale threshold: ${this.staleThresholdSeconds}s)`);
        this.intervalHandle = setInterval(() => {
            void this.tick();
        }, this.intervalMs);

        await this.tick();
    }

    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        if (this.leading) {
            this.leading = false;
            await this.leaderElector.releaseLeadership();
        }
        console.log(`${TAG} stopped`);
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    isLeader(): boolean {
        return this.leading;
    }

    /** One cycle: claim or confirm leadership, then reap while leading. */
    async tick(): Promise<void> {
        try {
            if (this.leading) {
                this.leading = await this.leaderElector.isLeader();
                if (!this.leading) console.warn(`${TAG} lost leadership`);
            } else {
                this.leading = await this.leaderElector.tryBecomeLeader();
                if (this.leading) console.log(`${TAG} became leader (${this.leaderElector.id})`);
            }
        } catch (err) {
            console.error(`${TAG} leader election failed:`, err);
            return;
        }

        if (this.leading && !this.intervalHandle) {
            // stopped while the election was in flight
            this.leading = false;
            await this.leaderElector.releaseLeadership()
                .catch(err => console.error(`${TAG} failed to release leadership:`, err));
            return;
        }

        if (this.leading) await this.reap();
    }

    async reap(): Promise<AbandonedWorkflow[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        try {
            const reaped = await this.workflows.failAbandoned(this.staleThresholdSeconds, ABANDONED_REASON);
            if (reaped.length > 0) {
                console.log(`${TAG} failed ${reaped.length} abandoned workflows: ${reaped.map(w => w.id).join(', ')}`);
            }
            return reaped;
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
            return [];
        } finally {
            this.isReaping = false;
        }
    }
}
