import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

export const PROTO_DIR = path.resolve(__dirname, '../../proto');

export const WORKFLOW_SERVICE = 'agentchain.v1.WorkflowService';
export const AGENT_RUNTIME_SERVICE = 'agentchain.runtime.v1.AgentRuntime';
export const HEALTH_SERVICE = 'grpc.health.v1.Health';

export const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export function protoPath(file: string): string {
    return path.join(PROTO_DIR, file);
}

export function loadProto(file: string): protoLoader.PackageDefinition {
    return protoLoader.loadSync(protoPath(file), protoOptions);
}

export function serviceDefinition(
    packageDef: protoLoader.PackageDefinition,
    serviceName: string,
): grpc.ServiceDefinition {
    const def = packageDef[serviceName];
    if (!def || 'format' in def) {
        throw new Error(`service ${serviceName} not found in proto package`);
    }
    return def;
}

export function methodDefinition(
    service: grpc.ServiceDefinition,
    method: string,
): grpc.MethodDefinition<unknown, unknown> {
    const def = service[method];
    if (!def) throw new Error(`method ${method} not defined`);
    return def;
}

/** Promise wrapper over a unary call, cancelled when `signal` aborts. */
export function unaryCall<Req>(
    client: grpc.Client,
    method: grpc.MethodDefinition<unknown, unknown>,
    request: Req,
    metadata: grpc.Metadata,
    options: grpc.CallOptions = {},
    signal?: AbortSignal,
): Promise<unknown> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('call aborted before it was sent'));
            return;
        }

        const call = client.makeUnaryRequest<Req, unknown>(
            method.path,
            value => method.requestSerialize(value),
            buffer => method.responseDeserialize(buffer),
            request,
            metadata,
            options,
            (err, res) => {
                signal?.removeEventListener('abort', onAbort);
                if (err) reject(err);
                else resolve(res);
            },
        );

        function onAbort(): void {
            call.cancel();
        }
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
