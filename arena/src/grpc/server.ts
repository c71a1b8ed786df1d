import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import type { Logger } from "../../../packages/intercept-core/src/index.ts";
import type { ArenaDefaults } from "../config/arena-config.ts";
import { asNumber, asString } from "../lib/parse-values.ts";
import { MatchSpecError } from "../match/match-spec.ts";
import { ArenaSessionManager, SessionNotFoundError, type SessionStepResponse } from "./session-manager.ts";

type GrpcRequest = Record<string, unknown>;

type GrpcStatus = NonNullable<Parameters<grpc.sendUnaryData<unknown>>[0]>;

type CloseSessionResponse = {
  ok: boolean;
  error: string;
};

export const ARENA_SERVICE_NAME = "intercept.arena.v1.ArenaService";

export function toStatus(err: unknown): GrpcStatus {
  const details = err instanceof Error ? err.message : String(err);
  if (err instanceof SessionNotFoundError) {
    return { code: grpc.status.NOT_FOUND, details };
  }
  if (err instanceof MatchSpecError || err instanceof SyntaxError) {
    return { code: grpc.status.INVALID_ARGUMENT, details };
  }
  return { code: grpc.status.INTERNAL, details };
}

function parseConfig(raw: string): unknown {
  return JSON.parse(raw.trim().length > 0 ? raw : "{}");
}

export function createService(manager: ArenaSessionManager): grpc.UntypedServiceImplementation {
  const createSession: grpc.handleUnaryCall<GrpcRequest, SessionStepResponse> = (call, callback) => {
    try {
      callback(null, manager.createSession(parseConfig(asString(call.request.config_json, "{}"))));
    } catch (err) {
      callback(toStatus(err));
    }
  };
  const stepSession: grpc.handleUnaryCall<GrpcRequest, SessionStepResponse> = (call, callback) => {
    try {
      const sessionId = asString(call.request.session_id, "");
      callback(null, manager.stepSession(sessionId, asNumber(call.request.n_steps) ?? 1));
    } catch (err) {
      callback(toStatus(err));
    }
  };
  const getSession: grpc.handleUnaryCall<GrpcRequest, SessionStepResponse> = (call, callback) => {
    try {
      callback(null, manager.getSession(asString(call.request.session_id, "")));
    } catch (err) {
      callback(toStatus(err));
    }
  };
  const closeSession: grpc.handleUnaryCall<GrpcRequest, CloseSessionResponse> = (call, callback) => {
    const sessionId = asString(call.request.session_id, "");
    const ok = manager.closeSession(sessionId);
    callback(null, ok ? { ok: true, error: "" } : { ok: false, error: `session not found: ${sessionId}` });
  };
  return {
    CreateSession: createSession,
    StepSession: stepSession,
    GetSession: getSession,
    CloseSession: closeSession,
  };
}

export function resolveProtoPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const protoFromCwd = resolve(process.cwd(), "proto", "arena_service.proto");
  const protoFromRepoSource = resolve(here, "..", "..", "..", "proto", "arena_service.proto");
  return existsSync(protoFromCwd) ? protoFromCwd : protoFromRepoSource;
}

export function loadArenaService(protoPath: string = resolveProtoPath()): grpc.ServiceDefinition {
  const packageDef = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });
  const service = packageDef[ARENA_SERVICE_NAME];
  if (!service || "format" in service) {
    throw new Error(`${ARENA_SERVICE_NAME} missing from ${protoPath}`);
  }
  return service;
}

export async function startGrpcServer(port: number, defaults: ArenaDefaults, logger: Logger): Promise<grpc.Server> {
  const manager = new ArenaSessionManager(defaults, logger.child("session"));
  const server = new grpc.Server();
  server.addService(loadArenaService(), createService(manager));

  const boundPort = await new Promise<number>((resolveBind, rejectBind) => {
    server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, actualPort) => {
      if (err) {
        rejectBind(err);
        return;
      }
      resolveBind(actualPort);
    });
  });
  logger.info(`listening on 0.0.0.0:${boundPort}`);
  return server;
}
