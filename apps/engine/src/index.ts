import "dotenv/config";
import { Pool } from "pg";
import Redis from "ioredis";
import { KnowledgeStore, ToolRegistry, registerBuiltinTools } from "@sagaloop/sdk";
import { loadConfig } from "./config";
import { createPool, createRedis, migrate } from "./db";
import { AiSdkModelProvider } from "./agent/ai-provider";
import { ReasoningLoop } from "./agent/reasoning-loop";
import { InMemoryKnowledgeStore } from "./knowledge/in-memory.store";
import { PostgresKnowledgeStore } from "./repositories/knowledge.repository";
import { PostgresSnapshotStore } from "./repositories/snapshot.repository";
import { InMemorySnapshotStore, SnapshotStore } from "./snapshots/store";
import {
  ActionRunner,
  InProcessWorkflowLock,
  RedisWorkflowLock,
  WorkflowLock,
  WorkflowManager,
} from "./services";
import { AgentServiceImpl } from "./grpc/agent.service";
import { HealthProbe, HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { defaultRetryPolicy } from "./utils/retry";
import { registerExampleSagas } from "./sagas";

const TAG = "[sagaloop]";

const config = loadConfig();

// Wiring
const pool: Pool | null = config.database.url ? createPool(config.database.url) : null;
const redis: Redis | null = config.redis.url ? createRedis(config.redis.url) : null;

function requirePool(): Pool {
  if (!pool) throw new Error("DATABASE_URL is not set");
  return pool;
}

const store: SnapshotStore =
  config.storage.driver === "postgres"
    ? new PostgresSnapshotStore(requirePool())
    : new InMemorySnapshotStore();

const knowledge: KnowledgeStore = config.memory.persistent
  ? new PostgresKnowledgeStore(requirePool())
  : new InMemoryKnowledgeStore();

const lock: WorkflowLock = redis
  ? new RedisWorkflowLock(redis, config.lock.ttlMs)
  : new InProcessWorkflowLock();

const retry = { ...defaultRetryPolicy, budget: config.agent.retryBudget };
const tools = registerBuiltinTools(new ToolRegistry());
const model = new AiSdkModelProvider(config.llm);
const loop = new ReasoningLoop(model, tools, knowledge, {
  systemPrompt: config.agent.systemPrompt,
  useMemory: config.agent.useMemory,
  useTools: config.agent.useTools,
  maxMemoryResults: config.memory.maxSearchResults,
  retry,
});

const manager = new WorkflowManager(store, new ActionRunner(loop, tools, retry), lock, {
  maxThinkingSteps: config.agent.maxThinkingSteps,
  enableSuspendResume: config.workflow.enableSuspendResume,
  maxSnapshots: config.workflow.maxSnapshots,
});

const probes: HealthProbe[] = [() => store.ping()];
if (redis) probes.push(() => redis.ping());

const grpcServer = createGrpcServer(new AgentServiceImpl(manager), new HealthService(probes));

async function main() {
  console.log(`${TAG} starting daemon (store: ${config.storage.driver}, model: ${config.llm.model})`);

  if (pool) {
    await pool.query("SELECT 1");
    console.log(`${TAG} postgres connected`);
    await migrate(pool);
  }

  if (redis) {
    await redis.ping();
    console.log(`${TAG} redis connected`);
  }

  registerExampleSagas();
  await manager.start();

  await startGrpcServer(grpcServer, config.server.port);
  console.log(`${TAG} daemon ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  await stopGrpcServer(grpcServer);
  await manager.shutdown();
  if (lock instanceof RedisWorkflowLock) lock.stop();

  if (pool) await pool.end();
  if (redis) await redis.quit();
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
