import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import { HealthService } from "./health.service";
import { AgentServiceImpl } from "./agent.service";

const PROTO_DIR = path.join(__dirname, "../../../..", "packages/proto");
const HEALTH_PROTO_PATH = path.join(PROTO_DIR, "health.service.proto");
const AGENT_PROTO_PATH = path.join(PROTO_DIR, "agent.service.proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export function loadProtos(): {
  health: protoLoader.PackageDefinition;
  agent: protoLoader.PackageDefinition;
} {
  return {
    health: protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions),
    agent: protoLoader.loadSync(AGENT_PROTO_PATH, protoOptions),
  };
}

type ProtoNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

// Walk a loaded package ("grpc.health.v1.Health") down to its service definition.
export function lookupService(
  root: grpc.GrpcObject,
  qualifiedName: string,
): grpc.ServiceDefinition {
  let node: ProtoNode = root;
  for (const part of qualifiedName.split(".")) {
    const next: ProtoNode | undefined = typeof node === "function" || "format" in node ? undefined : node[part];
    if (!next) {
      throw new Error(`service ${qualifiedName} not found in proto definition`);
    }
    node = next;
  }
  if (typeof node !== "function") {
    throw new Error(`service ${qualifiedName} not found in proto definition`);
  }
  return node.service;
}

export function createGrpcServer(
  agentService: AgentServiceImpl,
  healthService: HealthService,
): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const protos = loadProtos();

  const healthProto = grpc.loadPackageDefinition(protos.health);
  const agentProto = grpc.loadPackageDefinition(protos.agent);

  server.addService(lookupService(healthProto, "grpc.health.v1.Health"), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  server.addService(lookupService(agentProto, "sagaloop.AgentService"), {
    processMessage: agentService.processMessage.bind(agentService),
    createWorkflow: agentService.createWorkflow.bind(agentService),
    getWorkflow: agentService.getWorkflow.bind(agentService),
    suspendWorkflow: agentService.suspendWorkflow.bind(agentService),
    resumeWorkflow: agentService.resumeWorkflow.bind(agentService),
    listSnapshots: agentService.listSnapshots.bind(agentService),
    deleteSnapshots: agentService.deleteSnapshots.bind(agentService),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...protos.health,
    ...protos.agent,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[sagaloop] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error("[sagaloop] graceful grpc shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
