import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { buildErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import type { AdvisorRouteOptions } from "./advisor.turn.js";

const FarmerQuery = z.object({
  farmer_id: z.string().trim().min(1).optional(),
});

const LogsQuery = FarmerQuery.extend({
  limit: z.coerce.number().int().positive().max(1_000).default(50),
});

/**
 * Read-only inspection of in-memory state.
 */
const inspectRoutes: FastifyPluginAsync<AdvisorRouteOptions> = async (app, opts) => {
  const { planner } = opts;

  app.get("/advisor/v1/inspect/profiles", async (req, reply) => {
    const query = FarmerQuery.safeParse(req.query);
    if (!query.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid query", undefined, getRequestId(req)));
    }
    const farmerId = query.data.farmer_id;
    const profiles = planner.memoryBank
      .listProfiles()
      .filter((profile) => farmerId === undefined || profile.farmerId === farmerId);
    return {
      profiles: profiles.map((profile) => ({
        ...profile,
        scenario_count: planner.memoryBank.listScenarios(profile.farmerId).length,
      })),
    };
  });

  app.get("/advisor/v1/inspect/sessions", async (req, reply) => {
    const query = FarmerQuery.safeParse(req.query);
    if (!query.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid query", undefined, getRequestId(req)));
    }
    const farmerId = query.data.farmer_id;
    if (farmerId !== undefined) {
      return { sessions: [{ farmerId, turns: planner.sessionStore.getSession(farmerId) }] };
    }
    return { sessions: planner.sessionStore.listSessions() };
  });

  app.get("/advisor/v1/inspect/logs", async (req, reply) => {
    const query = LogsQuery.safeParse(req.query);
    if (!query.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid query", { field_errors: query.error.flatten().fieldErrors }, getRequestId(req)),
      );
    }
    return {
      entries: planner.interactionLog.entries({ farmerId: query.data.farmer_id, limit: query.data.limit }),
    };
  });
};

export default inspectRoutes;
