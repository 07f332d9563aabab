// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { config } from "./config/index.js";
import { createGenerationService } from "./adapters/llm/router.js";
import { StructuredCallGateway, type GatewayOptions } from "./adapters/llm/gateway.js";
import type { GenerationService } from "./adapters/llm/types.js";
import { createEventChain } from "./workflows/calendar/chain.js";
import { createCalendarValidator } from "./workflows/calendar/validator.js";
import { createCalendarRouter } from "./workflows/calendar/router.js";
import type { Clock } from "./workflows/calendar/prompts.js";
import { FileKnowledgeBase, type KnowledgeBase } from "./workflows/support/knowledge-base.js";
import { createSupportRouter } from "./workflows/support/router.js";
import eventRoutes from "./routes/v1.events.js";
import supportRoutes from "./routes/v1.support.js";
import type { WorkflowDeps } from "./routes/deps.js";
import { SERVICE_VERSION } from "./version.js";
import { REQUEST_ID_HEADER, requestIdFromHeaders } from "./utils/request-id.js";
import { buildErrorV1, toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";

export interface BuildOptions {
  /** Generation service; defaults to the provider named by LLM_PROVIDER */
  service?: GenerationService;
  gateway?: GatewayOptions;
  knowledgeBase?: KnowledgeBase;
  clock?: Clock;
}

/**
 * Construct the generation client and every workflow once, then hand them
 * to the routes.
 */
export function createWorkflowDeps(options: BuildOptions = {}): WorkflowDeps {
  const service = options.service ?? createGenerationService(config.llm);
  const knowledgeBase = options.knowledgeBase ?? new FileKnowledgeBase(config.knowledgeBase.path);

  return {
    gateway: new StructuredCallGateway(service, options.gateway),
    eventChain: createEventChain({ clock: options.clock }),
    calendarValidator: createCalendarValidator(),
    calendarRouter: createCalendarRouter({ clock: options.clock }),
    supportRouter: createSupportRouter(knowledgeBase),
  };
}

export async function build(options: BuildOptions = {}) {
  const deps = createWorkflowDeps(options);

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    // genReqId validates the incoming X-Request-Id itself
    requestIdHeader: false,
    genReqId: requestIdFromHeaders,
  });

  // Security headers: this is a pure JSON API, so CSP is not relevant
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000, // 1 year
      includeSubDomains: true,
    },
  });

  await app.register(rateLimit, {
    global: true,
    max: config.server.globalRateLimitRpm,
    timeWindow: "1 minute",
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request.id);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error(
        { err: error, request_id: request.id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      request.log.warn(
        { request_id: request.id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, request.id));
  });

  app.get("/healthz", async () => ({
    status: "ok",
    version: SERVICE_VERSION,
    provider: deps.gateway.provider,
    model: deps.gateway.model,
  }));

  await eventRoutes(app, deps);
  await supportRoutes(app, deps);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: "structured-workflows-service",
          version: SERVICE_VERSION,
          node_env: config.server.nodeEnv,
          provider: config.llm.provider,
          global_rate_limit_rpm: config.server.globalRateLimitRpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          llm_timeout_ms: config.llm.timeoutMs,
          llm_max_retries: config.llm.maxRetries,
        },
        "Structured workflows service starting",
      );

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
