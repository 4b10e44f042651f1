/** One agent call failed. Recovered into the step's `error` status, never rethrown by the executor. */
export class AgentInvocationError extends Error {
    constructor(
        public readonly agentId: string,
        message: string,
        public readonly aborted = false,
    ) {
        super(message);
        this.name = 'AgentInvocationError';
    }

    static from(agentId: string, err: unknown, aborted = false): AgentInvocationError {
        if (err instanceof AgentInvocationError) return err;
        const message = err instanceof Error ? err.message : String(err);
        return new AgentInvocationError(agentId, message, aborted);
    }
}
