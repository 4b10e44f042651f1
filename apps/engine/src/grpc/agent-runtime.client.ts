import * as grpc from '@grpc/grpc-js';
import {
    AGENT_RUNTIME_SERVICE,
    loadProto,
    methodDefinition,
    readString,
    readStrings,
    serviceDefinition,
    unaryCall,
} from '@agentchain/sdk';
import { AgentInvocationError } from '../errors/agent-invocation.error';
import { AgentInvocation, AgentInvoker, AgentReply } from '../services/agent-invoker';

/**
 * AgentInvoker over `agentchain.runtime.v1.AgentRuntime/Invoke`. Every call
 * gets its own deadline and is cancelled when the invocation's signal aborts.
 */
export class GrpcAgentInvoker implements AgentInvoker {
    private readonly client: grpc.Client;
    private readonly invokeMethod: grpc.MethodDefinition<unknown, unknown>;

    constructor(
        address: string,
        private readonly timeoutMs = 120_000,
        credentials = grpc.credentials.createInsecure(),
    ) {
        this.client = new grpc.Client(address, credentials);
        const service = serviceDefinition(loadProto('agent_runtime.proto'), AGENT_RUNTIME_SERVICE);
        this.invokeMethod = methodDefinition(service, 'Invoke');
    }

    async invoke(invocation: AgentInvocation): Promise<AgentReply> {
        const { agentId, message, callerId, conversationId, signal } = invocation;

        try {
            const res = await unaryCall(
                this.client,
                this.invokeMethod,
                {
                    agent_id: agentId,
                    message,
                    caller_id: callerId,
                    conversation_id: conversationId ?? '',
                },
                new grpc.Metadata(),
                { deadline: Date.now() + this.timeoutMs },
                signal,
            );

            return {
                response: readString(res, 'response'),
                toolsUsed: readStrings(res, 'tools_used'),
                conversationId: readString(res, 'conversation_id') || undefined,
            };
        } catch (err) {
            throw AgentInvocationError.from(agentId, err, signal?.aborted ?? false);
        }
    }

    close(): void {
        this.client.close();
    }
}
