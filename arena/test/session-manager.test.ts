import { describe, expect, it } from "vitest";
import { ArenaSessionManager, SessionNotFoundError } from "../src/grpc/session-manager.ts";

describe("ArenaSessionManager", () => {
  it("creates, steps and closes a session", () => {
    const manager = new ArenaSessionManager();
    const created = manager.createSession({ seed: 7, drones: 2, maxSimSeconds: 1 });

    expect(created.tick).toBe(0);
    expect(created.terminal).toBe(false);
    expect(created.outcome).toBeUndefined();
    const snapshot: unknown = JSON.parse(created.snapshot_json);
    expect(snapshot).toMatchObject({ schema_version: "arena.v1", seed: 7, tick: 0 });

    expect(manager.stepSession(created.session_id, 30).tick).toBe(30);

    const last = manager.stepSession(created.session_id, 100);
    expect(last.tick).toBe(60);
    expect(last.terminal).toBe(true);
    expect(last.outcome).toEqual({
      all_drones_destroyed: false,
      drones_destroyed: 0,
      drones_remaining: 2,
      reason: "time-limit",
    });

    expect(manager.getSession(created.session_id).tick).toBe(60);
    expect(manager.closeSession(created.session_id)).toBe(true);
    expect(manager.closeSession(created.session_id)).toBe(false);
    expect(manager.size).toBe(0);
  });

  it("steps once and reports an out-of-range step count", () => {
    const manager = new ArenaSessionManager();
    const { session_id } = manager.createSession({ seed: 1, drones: 1, maxSimSeconds: 5 });
    const response = manager.stepSession(session_id, 0);
    expect(response.tick).toBe(1);
    expect(response.errors).toEqual(["n_steps 0 out of range, stepping once"]);
  });

  it("rejects unknown session ids", () => {
    const manager = new ArenaSessionManager();
    expect(() => manager.getSession("nope")).toThrowError(SessionNotFoundError);
    expect(() => manager.stepSession("nope", 1)).toThrowError("session not found: nope");
  });

  it("drops sessions left idle past the timeout", () => {
    let clock = 0;
    const minute = 60_000;
    const manager = new ArenaSessionManager({}, undefined, { idleTimeoutMs: 10 * minute, now: () => clock });
    const first = manager.createSession({ seed: 1, drones: 1 }).session_id;
    clock = 6 * minute;
    const second = manager.createSession({ seed: 2, drones: 1 }).session_id;

    clock = 12 * minute;
    expect(manager.pruneIdle()).toEqual([first]);
    expect(() => manager.getSession(first)).toThrowError(SessionNotFoundError);
    expect(manager.getSession(second).tick).toBe(0);

    clock = 30 * minute;
    manager.createSession({ seed: 3, drones: 1 });
    expect(manager.size).toBe(1);
    expect(() => manager.stepSession(second, 1)).toThrowError(`session not found: ${second}`);
  });

  it("rejects guidance overrides the core would refuse", () => {
    const manager = new ArenaSessionManager();
    expect(() => manager.createSession({ seed: 1, guidance: { gateSize: -5 } })).toThrowError(
      "invalid guidance config: gateSize must be a positive finite number (got -5)",
    );
    expect(manager.size).toBe(0);
  });
});
