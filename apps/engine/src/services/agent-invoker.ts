export interface AgentInvocation {
    agentId: string;
    message: string;
    callerId: string;
    /** Omitted: the agent runtime opens a fresh conversation. */
    conversationId?: string;
    signal?: AbortSignal;
}

export interface AgentReply {
    response: string;
    toolsUsed: string[];
    conversationId?: string;
}

/**
 * The conversational agent backend. One call per step; failures surface as
 * rejections and are never retried by the engine.
 */
export interface AgentInvoker {
    invoke(invocation: AgentInvocation): Promise<AgentReply>;
}
