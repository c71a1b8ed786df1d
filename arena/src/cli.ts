import { writeFileSync } from "node:fs";
import {
  createLogger,
  iterateIntercept,
  resolveAimPoint,
  resolveGuidanceConfig,
  solveInterceptPerTick,
  type Logger,
} from "../../packages/intercept-core/src/index.ts";
import { loadArenaDefaults, type ArenaDefaults } from "./config/arena-config.ts";
import { startGrpcServer } from "./grpc/server.ts";
import { asNumber, asString } from "./lib/parse-values.ts";
import { normalizeMatchSpec } from "./match/match-spec.ts";
import { runMatch } from "./match/run-match.ts";
import { runReplay } from "./replay/run-replay.ts";
import { startHttpServer } from "./server.ts";

type Args = Record<string, string | boolean>;

function parseArgs(argv: string[]): { cmd: string; args: Args } {
  const [cmd = ""] = argv;
  const args: Args = {};
  for (let i = 1; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      args[key] = true;
      continue;
    }
    args[key] = next;
    i += 1;
  }
  return { cmd, args };
}

function numberArg(args: Args, key: string, fallback: number): number {
  return asNumber(args[key]) ?? fallback;
}

function print(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}

function runMatchCommand(args: Args, defaults: ArenaDefaults, logger: Logger): void {
  const spec = normalizeMatchSpec(
    {
      seed: asNumber(args.seed),
      maxSimSeconds: asNumber(args.maxSimSeconds),
      drones: asNumber(args.drones),
      droneSpeed: asNumber(args.droneSpeed),
      radarNoise: asNumber(args.radarNoise),
      guidance: {
        stickyTargetTicks: asNumber(args.stickyTargetTicks),
        launchMissiles: args.noMissiles === true ? false : undefined,
      },
    },
    defaults,
  );
  const result = runMatch(spec, logger.child("match"));
  const outPath = typeof args.out === "string" ? args.out : null;
  if (outPath) {
    writeFileSync(outPath, `${JSON.stringify(result, null, 2)}\n`, "utf8");
    logger.info(`wrote ${outPath}`);
  }
  print(result);
}

function runSolveCommand(args: Args): void {
  const p = { x: numberArg(args, "px", 1000), y: numberArg(args, "py", 0) };
  const v = { x: numberArg(args, "vx", 0), y: numberArg(args, "vy", 0) };
  const speed = asNumber(args.speed);
  const tps = asNumber(args.tps);
  const iterations = asNumber(args.iterations);
  const config = resolveGuidanceConfig({
    ...(speed === undefined ? {} : { projectileSpeed: speed }),
    ...(tps === undefined ? {} : { ticksPerSecond: tps }),
    ...(iterations === undefined ? {} : { interceptIterations: iterations }),
  });
  print({
    aim: resolveAimPoint(p, v, config),
    perTick: solveInterceptPerTick(p, v, config.projectileSpeed, config.ticksPerSecond),
    iterative: iterateIntercept(p, v, config.projectileSpeed, config.interceptIterations),
  });
}

async function main(): Promise<void> {
  const { cmd, args } = parseArgs(process.argv.slice(2));
  const defaults = loadArenaDefaults();
  const logger = createLogger("arena", defaults.logLevel ?? "warn");
  if (cmd === "match") {
    runMatchCommand(args, defaults, logger);
    return;
  }
  if (cmd === "replay") {
    const replayPath = asString(args.file, "");
    if (!replayPath) {
      throw new Error("replay requires --file <path>");
    }
    const report = runReplay({ replayPath, logger: logger.child("replay") });
    print(report);
    if (!report.reproduced) {
      process.exitCode = 1;
    }
    return;
  }
  if (cmd === "solve") {
    runSolveCommand(args);
    return;
  }
  if (cmd === "serve") {
    await startHttpServer(numberArg(args, "port", defaults.port ?? 8787), defaults, logger.child("http"));
    return;
  }
  if (cmd === "grpc") {
    await startGrpcServer(numberArg(args, "port", defaults.grpcPort ?? 50051), defaults, logger.child("grpc"));
    return;
  }
  // eslint-disable-next-line no-console
  console.log(
    [
      "arena cli",
      "",
      "Commands:",
      "  match --seed 123 --drones 3 --maxSimSeconds 120 --out match.json",
      "  match --seed 123 --noMissiles --stickyTargetTicks 30",
      "  replay --file match.json",
      "  solve --px 1000 --py 0 --vx 0 --vy 100 --speed 1000",
      "  serve --port 8787",
      "  grpc --port 50051",
      "",
      "Global defaults:",
      "  arena.config.json in the working directory (and/or env vars like ARENA_DRONES, ARENA_LOG_LEVEL)",
    ].join("\n"),
  );
}

await main();
