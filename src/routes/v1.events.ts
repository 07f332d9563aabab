/**
 * Calendar workflow routes
 *
 * - POST /v1/events/draft     gate-checked chain: extract → details → confirmation
 * - POST /v1/events/validate  parallel calendar and security checks
 * - POST /v1/events/route     new_event / modify_event router
 *
 * Gateway errors are not caught here; the server error handler maps them to
 * error.v1 responses.
 */

import type { FastifyInstance } from "fastify";
import { WorkflowInput } from "../schemas/workflows.js";
import { buildErrorV1 } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import type { WorkflowDeps } from "./deps.js";

export default async function route(app: FastifyInstance, deps: WorkflowDeps) {
  app.post("/v1/events/draft", async (req, reply) => {
    const parsed = WorkflowInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid input", parsed.error.flatten(), req.id));
    }

    const outcome = await deps.eventChain.run(deps.gateway, parsed.data.input, { requestId: req.id });
    if (outcome.status === "rejected") {
      log.info({ request_id: req.id, confidence: outcome.gate.confidence }, "event draft rejected at gate");
      return { status: outcome.status, reason: outcome.reason, gate: outcome.gate };
    }
    return { status: outcome.status, response: outcome.result, gate: outcome.gate };
  });

  app.post("/v1/events/validate", async (req, reply) => {
    const parsed = WorkflowInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid input", parsed.error.flatten(), req.id));
    }

    return deps.calendarValidator.validate(deps.gateway, parsed.data.input, { requestId: req.id });
  });

  app.post("/v1/events/route", async (req, reply) => {
    const parsed = WorkflowInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid input", parsed.error.flatten(), req.id));
    }

    return deps.calendarRouter.route(deps.gateway, parsed.data.input, { requestId: req.id });
  });
}
