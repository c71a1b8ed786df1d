import { silentLogger, type Logger } from "../../../packages/intercept-core/src/index.ts";
import type { ArenaDefaults } from "../config/arena-config.ts";
import { clampInt } from "../lib/parse-values.ts";
import { normalizeMatchSpec } from "../match/match-spec.ts";
import { MatchRunner } from "../match/run-match.ts";

export type SessionStepResponse = {
  session_id: string;
  tick: number;
  sim_seconds: number;
  terminal: boolean;
  snapshot_json: string;
  outcome?: {
    all_drones_destroyed: boolean;
    drones_destroyed: number;
    drones_remaining: number;
    reason: string;
  };
  errors: string[];
};

type Session = {
  id: string;
  updatedAtMs: number;
  runner: MatchRunner;
};

export type SessionManagerOptions = {
  /** Sessions untouched for longer than this are dropped on the next create or prune. */
  idleTimeoutMs?: number;
  now?: () => number;
};

export const MAX_STEPS_PER_CALL = 60;
export const DEFAULT_IDLE_TIMEOUT_MS = 10 * 60 * 1000;

export class SessionNotFoundError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/** Stepwise matches driven by a remote client, keyed by session id. */
export class ArenaSessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly defaults: ArenaDefaults;
  private readonly logger: Logger;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;

  constructor(defaults: ArenaDefaults = {}, logger: Logger = silentLogger, options: SessionManagerOptions = {}) {
    this.defaults = defaults;
    this.logger = logger;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  public get size(): number {
    return this.sessions.size;
  }

  public createSession(config: unknown): SessionStepResponse {
    this.pruneIdle();
    const spec = normalizeMatchSpec(config, this.defaults);
    const id = `s_${this.now().toString(36)}_${Math.random().toString(36).slice(2, 10)}`;
    const session: Session = {
      id,
      updatedAtMs: this.now(),
      runner: new MatchRunner(spec, this.logger.child(id)),
    };
    this.sessions.set(id, session);
    this.logger.info("session created", { session: id, seed: spec.seed, drones: spec.drones });
    return this.buildResponse(session, []);
  }

  public getSession(sessionId: string): SessionStepResponse {
    const session = this.require(sessionId);
    session.updatedAtMs = this.now();
    return this.buildResponse(session, []);
  }

  /** Advances up to `nSteps` ticks (clamped to 1..60), stopping early once the match ends. */
  public stepSession(sessionId: string, nSteps: number): SessionStepResponse {
    const session = this.require(sessionId);
    const errors: string[] = [];
    if (!Number.isFinite(nSteps) || nSteps < 1) {
      errors.push(`n_steps ${String(nSteps)} out of range, stepping once`);
    }
    const steps = clampInt(Number.isFinite(nSteps) ? nSteps : 1, 1, MAX_STEPS_PER_CALL);
    for (let i = 0; i < steps; i += 1) {
      if (session.runner.step() === null) {
        break;
      }
    }
    session.updatedAtMs = this.now();
    return this.buildResponse(session, errors);
  }

  public closeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Drops sessions idle past the timeout and returns their ids. */
  public pruneIdle(): string[] {
    const cutoff = this.now() - this.idleTimeoutMs;
    const expired: string[] = [];
    for (const session of this.sessions.values()) {
      if (session.updatedAtMs < cutoff) {
        expired.push(session.id);
      }
    }
    for (const id of expired) {
      this.sessions.delete(id);
      this.logger.info("session expired", { session: id });
    }
    return expired;
  }

  private require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private buildResponse(session: Session, errors: string[]): SessionStepResponse {
    const runner = session.runner;
    const snapshot = runner.snapshot();
    const terminal = runner.terminal;
    const response: SessionStepResponse = {
      session_id: session.id,
      tick: snapshot.tick,
      sim_seconds: snapshot.simSeconds,
      terminal,
      snapshot_json: JSON.stringify({ schema_version: "arena.v1", seed: runner.spec.seed, ...snapshot }),
      errors,
    };
    if (terminal) {
      const { outcome } = runner.result();
      response.outcome = {
        all_drones_destroyed: outcome.allDronesDestroyed,
        drones_destroyed: outcome.dronesDestroyed,
        drones_remaining: outcome.dronesRemaining,
        reason: outcome.reason,
      };
    }
    return response;
  }
}
