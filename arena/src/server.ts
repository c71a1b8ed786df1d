import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { Logger } from "../../packages/intercept-core/src/index.ts";
import type { ArenaDefaults } from "./config/arena-config.ts";
import { MatchSpecError, normalizeMatchSpec } from "./match/match-spec.ts";
import { runMatch } from "./match/run-match.ts";

export type HttpReply = {
  status: number;
  payload: unknown;
};

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.on("data", (chunk: Buffer) => {
      data += chunk.toString("utf8");
    });
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });
}

function json(res: ServerResponse, reply: HttpReply): void {
  res.statusCode = reply.status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(reply.payload));
}

/** Routes one request. `POST /match` runs a match synchronously and returns its result. */
export function handleArenaRequest(method: string, pathname: string, body: string, defaults: ArenaDefaults, logger: Logger): HttpReply {
  if (method !== "POST" || pathname !== "/match") {
    return { status: 404, payload: { error: "not found" } };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(body || "{}");
  } catch (err) {
    return { status: 400, payload: { error: `invalid JSON body: ${err instanceof Error ? err.message : String(err)}` } };
  }
  try {
    const spec = normalizeMatchSpec(raw, defaults);
    return { status: 200, payload: runMatch(spec, logger) };
  } catch (err) {
    if (err instanceof MatchSpecError) {
      return { status: 400, payload: { error: err.message } };
    }
    logger.error("match failed", { error: err instanceof Error ? err.message : String(err) });
    return { status: 500, payload: { error: err instanceof Error ? err.message : String(err) } };
  }
}

export function createArenaHttpServer(defaults: ArenaDefaults, logger: Logger): Server {
  return createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    void readBody(req).then(
      (body) => json(res, handleArenaRequest(req.method ?? "GET", url.pathname, body, defaults, logger)),
      (err: unknown) => json(res, { status: 500, payload: { error: err instanceof Error ? err.message : String(err) } }),
    );
  });
}

export function startHttpServer(port: number, defaults: ArenaDefaults, logger: Logger): Promise<Server> {
  const server = createArenaHttpServer(defaults, logger);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      logger.info(`listening on http://localhost:${port}`);
      resolve(server);
    });
  });
}
