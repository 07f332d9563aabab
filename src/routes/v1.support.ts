/**
 * POST /v1/support/ask
 *
 * Classifies a support message and answers knowledge questions from the
 * knowledge base corpus.
 */

import type { FastifyInstance } from "fastify";
import { WorkflowInput } from "../schemas/workflows.js";
import { buildErrorV1 } from "../utils/errors.js";
import type { WorkflowDeps } from "./deps.js";

export default async function route(app: FastifyInstance, deps: WorkflowDeps) {
  app.post("/v1/support/ask", async (req, reply) => {
    const parsed = WorkflowInput.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400);
      return reply.send(buildErrorV1("BAD_INPUT", "invalid input", parsed.error.flatten(), req.id));
    }

    return deps.supportRouter.route(deps.gateway, parsed.data.input, { requestId: req.id });
  });
}
