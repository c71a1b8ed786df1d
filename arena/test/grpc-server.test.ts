import * as grpc from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import { createService, loadArenaService, resolveProtoPath, toStatus } from "../src/grpc/server.ts";
import { ArenaSessionManager, SessionNotFoundError } from "../src/grpc/session-manager.ts";
import { MatchSpecError } from "../src/match/match-spec.ts";

describe("arena gRPC service", () => {
  it("loads the service definition from the proto file", () => {
    const service = loadArenaService(resolveProtoPath());
    expect(Object.keys(service)).toEqual(["CreateSession", "StepSession", "GetSession", "CloseSession"]);
    expect(service.StepSession?.path).toBe("/intercept.arena.v1.ArenaService/StepSession");
  });

  it("implements every method of the definition", () => {
    const service = loadArenaService(resolveProtoPath());
    const impl = createService(new ArenaSessionManager());
    expect(Object.keys(impl).sort()).toEqual(Object.keys(service).sort());
  });

  it("maps errors to status codes", () => {
    expect(toStatus(new SessionNotFoundError("abc"))).toEqual({ code: grpc.status.NOT_FOUND, details: "session not found: abc" });
    expect(toStatus(new MatchSpecError("drones must be a non-negative integer")).code).toBe(grpc.status.INVALID_ARGUMENT);
    expect(toStatus(new SyntaxError("bad json")).code).toBe(grpc.status.INVALID_ARGUMENT);
    expect(toStatus("boom")).toEqual({ code: grpc.status.INTERNAL, details: "boom" });
  });

  it("reports a refused guidance override as an invalid argument", () => {
    const manager = new ArenaSessionManager();
    let caught: unknown = null;
    try {
      manager.createSession({ seed: 1, drones: 0, guidance: { gateSize: -5 } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MatchSpecError);
    expect(toStatus(caught).code).toBe(grpc.status.INVALID_ARGUMENT);
  });
});
