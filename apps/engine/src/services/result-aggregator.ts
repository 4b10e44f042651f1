import { AggregateStatus, StepResult } from '@agentchain/sdk';

/**
 * Workflow status from the multiset of step statuses, first match wins:
 * nothing ran or everything errored → failed; any error → partial_success;
 * all success → completed; anything else (skips) → partial_success.
 */
export function aggregateStatus(results: readonly Pick<StepResult, 'status'>[]): AggregateStatus {
    if (results.length === 0) return 'failed';

    const errors = results.filter(r => r.status === 'error').length;
    const successes = results.filter(r => r.status === 'success').length;

    if (errors === results.length) return 'failed';
    if (errors > 0) return 'partial_success';
    if (successes === results.length) return 'completed';
    return 'partial_success';
}
