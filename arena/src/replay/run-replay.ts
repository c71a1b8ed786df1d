import { readFileSync } from "node:fs";
import type { Logger } from "../../../packages/intercept-core/src/index.ts";
import { normalizeMatchSpec } from "../match/match-spec.ts";
import type { MatchResult } from "../match/match-types.ts";
import { runMatch } from "../match/run-match.ts";
import { asRecord } from "../lib/parse-values.ts";

export type ReplayReport = {
  result: MatchResult;
  /** True when the re-run reproduced the stored outcome and stats exactly. */
  reproduced: boolean;
};

/** Re-runs the spec stored in a match result file; matches are deterministic per seed. */
export function replayMatch(raw: string, logger: Logger): ReplayReport {
  const stored = asRecord(JSON.parse(raw));
  const spec = normalizeMatchSpec(stored.spec);
  const result = runMatch(spec, logger);
  const reproduced =
    JSON.stringify(stored.outcome) === JSON.stringify(result.outcome) &&
    JSON.stringify(stored.stats) === JSON.stringify(result.stats) &&
    stored.ticks === result.ticks;
  if (!reproduced) {
    logger.warn("replay diverged from stored result", { seed: spec.seed });
  }
  return { result, reproduced };
}

export function runReplay(opts: { replayPath: string; logger: Logger }): ReplayReport {
  const raw = readFileSync(opts.replayPath, "utf8");
  return replayMatch(raw, opts.logger);
}
