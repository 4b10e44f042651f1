import * as grpc from '@grpc/grpc-js';
import { ReflectionService } from '@grpc/reflection';
import { HEALTH_SERVICE, loadProto, serviceDefinition, WORKFLOW_SERVICE } from '@agentchain/sdk';
import { HealthService } from './health.service';
import { WorkflowServiceImpl } from './workflow.service';

const healthPackageDef = loadProto('health.service.proto');
const workflowPackageDef = loadProto('workflow.service.proto');

export function createGrpcServer(workflows: WorkflowServiceImpl, health: HealthService): grpc.Server {
    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    server.addService(serviceDefinition(healthPackageDef, HEALTH_SERVICE), {
        check: health.check.bind(health),
        watch: health.watch.bind(health),
    });

    server.addService(serviceDefinition(workflowPackageDef, WORKFLOW_SERVICE), {
        executeWorkflow: workflows.executeWorkflow.bind(workflows),
        executeSimpleChain: workflows.executeSimpleChain.bind(workflows),
        executeTemplate: workflows.executeTemplate.bind(workflows),
        listTemplates: workflows.listTemplates.bind(workflows),
        getWorkflowDetails: workflows.getWorkflowDetails.bind(workflows),
        getWorkflowHistory: workflows.getWorkflowHistory.bind(workflows),
        getWorkflowStatus: workflows.getWorkflowStatus.bind(workflows),
    });

    // reflection for grpcurl debugging
    const reflection = new ReflectionService({ ...healthPackageDef, ...workflowPackageDef });
    reflection.addToServer(server);

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
            } else {
                console.log(`[agentchain] grpc server listening on port ${boundPort}`);
                resolve(boundPort);
            }
        });
    });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
    return new Promise((resolve) => {
        server.tryShutdown(() => resolve());
    });
}
