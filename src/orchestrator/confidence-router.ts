/**
 * Confidence Router
 *
 * One classification call yields a RouteDecision. Below the threshold, or for
 * a category with no handler (the catch-all "other"), the router returns a
 * rejection without running any handler. Otherwise exactly one handler runs.
 *
 * `handlers` must cover every category except "other": adding a category to
 * the classifier's enumeration without a handler is a compile error.
 */

import type { z } from "zod";
import { config } from "../config/index.js";
import type { OutputContract } from "../contracts/contract.js";
import type { GatewayCallOptions, StructuredCaller } from "../adapters/llm/gateway.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { assertThreshold, meetsThreshold } from "./thresholds.js";
import {
  resolveSystemContext,
  type Rejected,
  type ResponseEnvelope,
  type RouteDecision,
  type SystemContext,
} from "./types.js";

export const CATCH_ALL_CATEGORY = "other";

export type SupportedCategory<C extends string> = Exclude<C, typeof CATCH_ALL_CATEGORY>;

export type RouteHandler<K extends string> = (
  decision: RouteDecision<K>,
  caller: StructuredCaller,
  opts: GatewayCallOptions,
) => Promise<ResponseEnvelope>;

export type HandlerMap<C extends string> = {
  readonly [K in SupportedCategory<C>]: RouteHandler<K>;
};

export interface Classifier<T extends z.AnyZodObject> {
  readonly contract: OutputContract<T>;
  readonly systemContext: SystemContext;
}

export interface ConfidenceRouterConfig<C extends string, T extends z.AnyZodObject> {
  readonly name: string;
  readonly classifier: Classifier<T>;
  readonly toDecision: (result: Readonly<z.infer<T>>) => RouteDecision<C>;
  readonly handlers: HandlerMap<C>;
  /** Inclusive; defaults to ROUTER_CONFIDENCE_THRESHOLD */
  readonly threshold?: number;
}

export type RouteOutcome<C extends string> =
  | {
      readonly status: "done";
      readonly category: SupportedCategory<C>;
      readonly decision: RouteDecision<C>;
      readonly response: ResponseEnvelope;
    }
  | (Rejected<"low_confidence" | "unsupported_category"> & {
      readonly decision: RouteDecision<C>;
    });

export class ConfidenceRouter<C extends string, T extends z.AnyZodObject> {
  readonly name: string;
  private readonly classifier: Classifier<T>;
  private readonly toDecision: (result: Readonly<z.infer<T>>) => RouteDecision<C>;
  private readonly handlers: HandlerMap<C>;
  private readonly threshold: number | undefined;

  constructor(routerConfig: ConfidenceRouterConfig<C, T>) {
    this.name = routerConfig.name;
    this.classifier = routerConfig.classifier;
    this.toDecision = routerConfig.toDecision;
    this.handlers = routerConfig.handlers;
    this.threshold =
      routerConfig.threshold === undefined
        ? undefined
        : assertThreshold(routerConfig.threshold, `${routerConfig.name} router`);
  }

  async route(
    caller: StructuredCaller,
    input: string,
    opts: GatewayCallOptions = {},
  ): Promise<RouteOutcome<C>> {
    const threshold = this.threshold ?? config.orchestration.routerConfidenceThreshold;

    const classification = await caller.call(
      resolveSystemContext(this.classifier.systemContext),
      input,
      this.classifier.contract,
      opts,
    );
    const decision = this.toDecision(classification);

    emit(TelemetryEvents.RouterClassified, {
      router: this.name,
      request_id: opts.requestId,
      category: decision.category,
      confidence: decision.confidence,
      threshold,
    });

    if (!meetsThreshold(decision.confidence, threshold)) {
      return this.reject("low_confidence", decision, opts);
    }

    let category: SupportedCategory<C>;
    for (category in this.handlers) {
      if (category !== decision.category) continue;

      const handler = this.handlers[category];
      const response = await handler({ ...decision, category }, caller, opts);

      emit(TelemetryEvents.RouterDispatched, {
        router: this.name,
        request_id: opts.requestId,
        category,
        success: response.success,
      });
      return { status: "done", category, decision, response };
    }

    return this.reject("unsupported_category", decision, opts);
  }

  private reject(
    reason: "low_confidence" | "unsupported_category",
    decision: RouteDecision<C>,
    opts: GatewayCallOptions,
  ): RouteOutcome<C> {
    emit(TelemetryEvents.RouterRejected, {
      router: this.name,
      request_id: opts.requestId,
      reason,
      category: decision.category,
      confidence: decision.confidence,
    });
    return { status: "rejected", reason, decision };
  }
}
