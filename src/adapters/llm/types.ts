/**
 * Provider-agnostic generation service interface.
 *
 * A generation service submits one structured request to a provider and
 * returns the provider's raw text. Parsing into the contract is done by the
 * gateway, so every provider shares one validation path.
 */

import type { OutputContract } from "../../contracts/contract.js";

/**
 * Usage metrics returned by LLM calls for cost tracking and telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export interface StructuredRequest<C extends OutputContract = OutputContract> {
  readonly systemContext: string;
  readonly userContext: string;
  readonly contract: C;
}

export interface GenerationOutput {
  content: string;
  usage: UsageMetrics;
}

/**
 * Call options passed to every submit for request tracking and timeouts.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
  abortSignal?: AbortSignal;
}

export interface GenerationService {
  /**
   * Provider name for telemetry and routing.
   */
  readonly name: "openai" | "anthropic" | string;

  /**
   * Model identifier (provider-specific, e.g. "gpt-4o-mini").
   */
  readonly model: string;

  /**
   * Submit a structured request.
   *
   * Must be safe for concurrent use: the parallel validator has several
   * submits in flight on one service.
   *
   * @throws ServiceUnavailableError on transport or provider failure
   * @throws ContentPolicyViolationError when the provider refuses on policy grounds
   */
  submit(request: StructuredRequest, opts: CallOpts): Promise<GenerationOutput>;
}
