import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { Planner } from "../orchestrator/planner.js";
import { buildErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { log } from "../utils/telemetry.js";

export const MAX_MESSAGE_CHARS = 4_000;

export const TurnRequest = z.object({
  farmer_id: z.string().trim().min(1).max(128),
  message: z.string().min(1).max(MAX_MESSAGE_CHARS),
});

export type TurnRequestT = z.infer<typeof TurnRequest>;

export interface AdvisorRouteOptions {
  planner: Planner;
}

const turnRoute: FastifyPluginAsync<AdvisorRouteOptions> = async (app, opts) => {
  app.post("/advisor/v1/turn", async (req, reply) => {
    const requestId = getRequestId(req);

    const parsed = TurnRequest.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid input", { field_errors: parsed.error.flatten().fieldErrors }, requestId),
      );
    }

    const result = await opts.planner.runTurn(parsed.data.farmer_id, parsed.data.message, { requestId });
    if (result.diagnostics.degraded) {
      log.info(
        {
          request_id: requestId,
          issues: result.diagnostics.issues.map((i) => `${i.stage}:${i.kind}`),
        },
        "Advisor turn completed degraded",
      );
    }
    return reply.code(200).send(result);
  });
};

export default turnRoute;
