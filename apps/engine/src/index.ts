import "dotenv/config";
import { TemplateRegistry } from "@agentchain/sdk";
import { createPool, createRedis } from "./db";
import { TransactionManager } from "./db/transaction.manager";
import { GrpcAgentInvoker } from "./grpc/agent-runtime.client";
import { HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { WorkflowServiceImpl } from "./grpc/workflow.service";
import { AgentRepository } from "./repositories/agent.repository";
import { PooledStepSessions, StepRepository } from "./repositories/step.repository";
import { WorkflowRepository } from "./repositories/workflow.repository";
import {
  AgentDirectory,
  HeartbeatService,
  LeaderElector,
  Reaper,
  StepExecutor,
  WorkflowOrchestrator,
  WorkflowValidator,
} from "./services";
import { registerBuiltinTemplates } from "./templates";

const TAG = "[agentchain]";

// Central Configuration
const config = {
  port: parseInt(process.env.PORT || "50051", 10),
  agentRuntimeUrl: process.env.AGENT_RUNTIME_URL || "localhost:50061",
  stepTimeoutMs: parseInt(process.env.STEP_TIMEOUT_MS || "120000", 10),
  agentCacheTtlMs: parseInt(process.env.AGENT_CACHE_TTL_MS || "30000", 10),
  heartbeatIntervalMs: parseInt(process.env.HEARTBEAT_INTERVAL_MS || "5000", 10),
  reaperStale: parseInt(process.env.REAPER_STALE_THRESHOLD || "300", 10),
  reaperInterval: parseInt(process.env.REAPER_INTERVAL || "10000", 10),
  leaderTtlSeconds: parseInt(process.env.LEADER_TTL_SECONDS || "30", 10),
  dbPoolMax: parseInt(process.env.DB_POOL_MAX || "20", 10),
  dbConnectTimeoutMs: parseInt(process.env.DB_CONNECT_TIMEOUT_MS || "0", 10),
  stepConcurrency: parseInt(process.env.STEP_CONCURRENCY || "10", 10),
};

// Wiring
// Parallel steps hold a client each; leave the rest of the pool for other writes
const stepConcurrency = Math.max(1, Math.min(config.stepConcurrency, config.dbPoolMax - 2));
if (stepConcurrency !== config.stepConcurrency) {
  console.warn(`${TAG} STEP_CONCURRENCY ${config.stepConcurrency} lowered to ${stepConcurrency} for a pool of ${config.dbPoolMax}`);
}

const pool = createPool(process.env.DATABASE_URL, {
  max: config.dbPoolMax,
  connectionTimeoutMillis: config.dbConnectTimeoutMs,
});
const redis = createRedis();

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const tx = new TransactionManager(pool);
const workflowRepo = new WorkflowRepository(pool, tx);
const stepRepo = new StepRepository(pool);
const directory = new AgentDirectory(new AgentRepository(pool), config.agentCacheTtlMs);
const invoker = new GrpcAgentInvoker(config.agentRuntimeUrl, config.stepTimeoutMs);
const heartbeat = new HeartbeatService(workflowRepo, config.heartbeatIntervalMs);

const orchestrator = new WorkflowOrchestrator({
  validator: new WorkflowValidator(directory),
  workflows: workflowRepo,
  steps: stepRepo,
  sessions: new PooledStepSessions(tx),
  executor: new StepExecutor(invoker),
  heartbeat,
  templates: registerBuiltinTemplates(new TemplateRegistry()),
  stepConcurrency,
});

const reaper = new Reaper(workflowRepo, new LeaderElector(redis, config.leaderTtlSeconds), {
  staleThresholdSeconds: config.reaperStale,
  intervalMs: config.reaperInterval,
});

const grpcServer = createGrpcServer(
  new WorkflowServiceImpl(orchestrator),
  new HealthService(pool, redis),
);

async function main() {
  console.log(`${TAG} starting engine... (agent runtime: ${config.agentRuntimeUrl})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  await startGrpcServer(grpcServer, config.port);
  await reaper.start();

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  await stopGrpcServer(grpcServer);
  heartbeat.stopAll();
  await reaper.stop();
  directory.clear();
  invoker.close();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
