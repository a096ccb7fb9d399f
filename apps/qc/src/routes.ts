import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { StationMetadataV1Schema, TimeSeriesV1Schema } from "@waveqc/contracts";

import { QcInputError } from "./errors";
import type { QcRuntime } from "./runtime";

const ParametersZ = z.array(z.string().min(1)).min(1).optional();

export const LongTermRunBodySchema = z
  .object({
    series: TimeSeriesV1Schema,
    parameters: ParametersZ,
    metadata: StationMetadataV1Schema.optional(),
  })
  .strict();

export const ShortTermRunBodySchema = z
  .object({
    series: TimeSeriesV1Schema,
    parameters: ParametersZ,
  })
  .strict();

function sendZodError(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    ok: false,
    errors: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
  });
}

function sendInputError(reply: FastifyReply, e: QcInputError): FastifyReply {
  return reply.code(e.status).send({ ok: false, code: e.code, message: e.message });
}

export function registerQcRoutes(app: FastifyInstance, runtime: QcRuntime): void {

  app.post("/api/qc/long_term/run", async (req, reply) => {
    const parsed = LongTermRunBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendZodError(reply, parsed.error);

    try {
      const out = runtime.runLongTerm(parsed.data, req.log);
      return reply.send(out);
    } catch (e) {
      if (e instanceof QcInputError) return sendInputError(reply, e);
      throw e;
    }
  });

  app.post("/api/qc/short_term/run", async (req, reply) => {
    const parsed = ShortTermRunBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendZodError(reply, parsed.error);

    try {
      const results = runtime.runShortTerm(parsed.data, req.log);
      return reply.send({ results });
    } catch (e) {
      if (e instanceof QcInputError) return sendInputError(reply, e);
      throw e;
    }
  });

  app.get("/api/qc/config", async (_req, reply) => {
    return reply.send(runtime.describeConfig());
  });
}
