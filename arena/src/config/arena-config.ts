import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseLogLevel, type LogLevel } from "../../../packages/intercept-core/src/index.ts";
import { asNumber, asRecord } from "../lib/parse-values.ts";

export type ArenaDefaults = {
  seed?: number;
  maxSimSeconds?: number;
  drones?: number;
  droneSpeed?: number;
  radarNoise?: number;
  port?: number;
  grpcPort?: number;
  logLevel?: LogLevel;
};

export const ARENA_CONFIG_FILE = "arena.config.json";

function readJsonFile(path: string): unknown {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw);
}

/**
 * Arena defaults from `arena.config.json` in `cwd`, each overridden by its
 * `ARENA_*` environment variable. CLI flags override both.
 */
export function loadArenaDefaults(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): ArenaDefaults {
  const configPath = resolve(cwd, ARENA_CONFIG_FILE);
  const cfg = existsSync(configPath) ? asRecord(readJsonFile(configPath)) : {};

  const pick = (key: Exclude<keyof ArenaDefaults, "logLevel">, envName: string): number | undefined => {
    return asNumber(env[envName]) ?? asNumber(cfg[key]);
  };

  const logLevelRaw = env.ARENA_LOG_LEVEL ?? cfg.logLevel;
  return {
    seed: pick("seed", "ARENA_SEED"),
    maxSimSeconds: pick("maxSimSeconds", "ARENA_MAX_SIM_SECONDS"),
    drones: pick("drones", "ARENA_DRONES"),
    droneSpeed: pick("droneSpeed", "ARENA_DRONE_SPEED"),
    radarNoise: pick("radarNoise", "ARENA_RADAR_NOISE"),
    port: pick("port", "ARENA_PORT"),
    grpcPort: pick("grpcPort", "ARENA_GRPC_PORT"),
    logLevel: logLevelRaw === undefined ? undefined : parseLogLevel(logLevelRaw, "warn"),
  };
}
