import type { z } from "zod";
import { config } from "../../config/index.js";
import type { OutputContract } from "../../contracts/contract.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { extractJsonFromResponse, JsonExtractionError } from "../../utils/json-extractor.js";
import { generateRequestId } from "../../utils/request-id.js";
import { retryConfigFor, withRetry, type RetryConfig } from "../../utils/retry.js";
import { isGatewayError, SchemaViolationError } from "./errors.js";
import type { GenerationService, StructuredRequest } from "./types.js";

export interface GatewayOptions {
  /** Per-call timeout; defaults to LLM_TIMEOUT_MS */
  timeoutMs?: number;
  /** Defaults to 1 + LLM_MAX_RETRIES attempts */
  retry?: RetryConfig;
}

export interface GatewayCallOptions {
  requestId?: string;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
}

/**
 * What orchestrators depend on: one typed structured call.
 */
export interface StructuredCaller {
  call<T extends z.AnyZodObject>(
    systemContext: string,
    userContext: string,
    contract: OutputContract<T>,
    opts?: GatewayCallOptions,
  ): Promise<Readonly<z.infer<T>>>;
}

/**
 * Structured Call Gateway
 *
 * The one primitive every orchestrator builds on: send system and user
 * context plus an output contract to the generation service, and return a
 * frozen value that matches the contract. Fails with ServiceUnavailableError,
 * ContentPolicyViolationError or SchemaViolationError.
 */
export class StructuredCallGateway implements StructuredCaller {
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;

  constructor(
    private readonly service: GenerationService,
    options: GatewayOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? config.llm.timeoutMs;
    this.retry = options.retry ?? retryConfigFor(config.llm.maxRetries);
  }

  get provider(): string {
    return this.service.name;
  }

  get model(): string {
    return this.service.model;
  }

  async call<T extends z.AnyZodObject>(
    systemContext: string,
    userContext: string,
    contract: OutputContract<T>,
    opts: GatewayCallOptions = {},
  ): Promise<Readonly<z.infer<T>>> {
    const requestId = opts.requestId ?? generateRequestId();
    const request: StructuredRequest = Object.freeze({ systemContext, userContext, contract });
    const telemetry = {
      contract: contract.name,
      provider: this.service.name,
      model: this.service.model,
      request_id: requestId,
    };
    const startTime = Date.now();

    emit(TelemetryEvents.GatewayCallStarted, telemetry);

    try {
      const output = await withRetry(
        () =>
          this.service.submit(request, {
            requestId,
            timeoutMs: opts.timeoutMs ?? this.timeoutMs,
            abortSignal: opts.abortSignal,
          }),
        { adapter: this.service.name, model: this.service.model, operation: contract.name },
        this.retry,
      );

      const result = this.parse(contract, output.content, requestId);

      emit(TelemetryEvents.GatewayCallSucceeded, {
        ...telemetry,
        latency_ms: Date.now() - startTime,
        input_tokens: output.usage.input_tokens,
        output_tokens: output.usage.output_tokens,
      });
      return result;
    } catch (error) {
      emit(TelemetryEvents.GatewayCallFailed, {
        ...telemetry,
        latency_ms: Date.now() - startTime,
        error_kind: isGatewayError(error) ? error.kind : "unknown",
      });
      throw error;
    }
  }

  private parse<T extends z.AnyZodObject>(
    contract: OutputContract<T>,
    rawOutput: string,
    requestId: string,
  ): Readonly<z.infer<T>> {
    let json: unknown;
    try {
      json = extractJsonFromResponse(rawOutput, {
        contract: contract.name,
        model: this.service.model,
        requestId,
      }).json;
    } catch (error) {
      if (error instanceof JsonExtractionError) {
        throw new SchemaViolationError(
          `${contract.name}: ${error.message}`,
          contract.name,
          rawOutput,
          [error.message],
          error,
        );
      }
      throw error;
    }

    const parseResult = contract.schema.safeParse(json);
    if (!parseResult.success) {
      const issues = parseResult.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );
      log.error(
        { contract: contract.name, request_id: requestId, issues },
        "structured output failed contract validation",
      );
      throw new SchemaViolationError(
        `${contract.name} output does not match its contract`,
        contract.name,
        rawOutput,
        issues,
        parseResult.error,
      );
    }

    return deepFreeze(parseResult.data);
  }
}

/**
 * Freeze a parsed result together with every nested array and object.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (Array.isArray(value)) {
    for (const item of value) {
      deepFreeze(item);
    }
  } else if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
