/**
 * The scheduler itself failed (persistence error mid-run, broken internal
 * invariant). Fatal to the run: the workflow is marked failed.
 */
export class OrchestrationError extends Error {
    constructor(
        message: string,
        public readonly workflowId: string,
        public readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'OrchestrationError';
    }
}
