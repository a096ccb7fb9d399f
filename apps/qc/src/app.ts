import Fastify, { type FastifyInstance } from "fastify";

import type { QcConfigV1 } from "./config/schema";
import { loadDefaultConfig } from "./config/ssot";
import { normalizeLevel } from "./logger";
import { registerQcRoutes } from "./routes";
import { QcRuntime } from "./runtime";

export type BuildServerOptions = {
  config?: QcConfigV1;
  // false disables request logging (tests)
  logger?: boolean;
};

export function buildServer(opts: BuildServerOptions = {}): FastifyInstance {
  const cfg = opts.config ?? loadDefaultConfig();
  const app = Fastify({
    logger: opts.logger === false ? false : { level: normalizeLevel(process.env.WAVEQC_LOG_LEVEL ?? cfg.logging.level) },
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  registerQcRoutes(app, new QcRuntime(cfg));
  return app;
}
