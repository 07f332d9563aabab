import Anthropic from "@anthropic-ai/sdk";
import { log } from "../../utils/telemetry.js";
import { renderContractInstructions } from "../../contracts/contract.js";
import type { CallOpts, GenerationOutput, GenerationService, StructuredRequest } from "./types.js";
import { ContentPolicyViolationError, toUpstreamError } from "./errors.js";
import { armTimeout } from "./timeout.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-latest";
const MAX_TOKENS = 1024;

export interface AnthropicServiceOptions {
  apiKey: string;
  model?: string;
}

/**
 * Anthropic Messages API. There is no JSON mode, so the contract instructions
 * carry the format and the gateway extracts the object from the text.
 */
export class AnthropicGenerationService implements GenerationService {
  readonly name = "anthropic";
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicServiceOptions) {
    this.model = options.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async submit(request: StructuredRequest, opts: CallOpts): Promise<GenerationOutput> {
    const startTime = Date.now();
    const timer = armTimeout(opts.timeoutMs, opts.abortSignal);

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: 0,
          system: `${request.systemContext}\n\n${renderContractInstructions(request.contract)}`,
          messages: [{ role: "user", content: request.userContext }],
        },
        { signal: timer.signal },
      );

      // Newer models report policy refusals as a stop reason the SDK types may not list yet
      const stopReason: string | null = response.stop_reason;
      if (stopReason === "refusal") {
        throw new ContentPolicyViolationError(
          `anthropic refused ${request.contract.name}`,
          this.name,
          ["refusal"],
        );
      }

      const text = response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("");

      return {
        content: text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      const upstream = toUpstreamError(
        this.name,
        request.contract.name,
        error,
        elapsedMs,
        timer.timedOut(),
        opts.abortSignal?.aborted === true,
      );
      log.error(
        {
          contract: request.contract.name,
          request_id: opts.requestId,
          kind: upstream.kind,
          elapsed_ms: elapsedMs,
        },
        "Anthropic structured call failed",
      );
      throw upstream;
    } finally {
      timer.clear();
    }
  }
}
