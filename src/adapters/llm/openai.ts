import OpenAI from "openai";
import { log } from "../../utils/telemetry.js";
import { renderContractInstructions } from "../../contracts/contract.js";
import type { CallOpts, GenerationOutput, GenerationService, StructuredRequest } from "./types.js";
import { ContentPolicyViolationError, toUpstreamError } from "./errors.js";
import { armTimeout } from "./timeout.js";

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";
const MODERATION_MODEL = "omni-moderation-latest";

export interface OpenAIServiceOptions {
  apiKey: string;
  model?: string;
  /** Pre-screen user context with the moderation endpoint before generating. */
  moderationEnabled?: boolean;
}

/**
 * OpenAI chat completions in JSON-object mode.
 *
 * The SDK's own retries are disabled: retrying is the gateway's policy, and
 * its default is not to retry at all.
 */
export class OpenAIGenerationService implements GenerationService {
  readonly name = "openai";
  readonly model: string;
  private readonly client: OpenAI;
  private readonly moderationEnabled: boolean;

  constructor(options: OpenAIServiceOptions) {
    this.model = options.model ?? OPENAI_DEFAULT_MODEL;
    this.moderationEnabled = options.moderationEnabled ?? false;
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async submit(request: StructuredRequest, opts: CallOpts): Promise<GenerationOutput> {
    const startTime = Date.now();
    const timer = armTimeout(opts.timeoutMs, opts.abortSignal);

    try {
      if (this.moderationEnabled) {
        await this.screen(request.userContext, timer.signal);
      }

      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            {
              role: "system",
              content: `${request.systemContext}\n\n${renderContractInstructions(request.contract)}`,
            },
            { role: "user", content: request.userContext },
          ],
          temperature: 0,
          response_format: { type: "json_object" },
        },
        { signal: timer.signal },
      );

      const choice = response.choices[0];
      if (choice?.finish_reason === "content_filter") {
        throw new ContentPolicyViolationError(
          `openai ${request.contract.name} output withheld by content filter`,
          this.name,
          ["content_filter"],
        );
      }
      if (choice?.message.refusal) {
        log.warn(
          { contract: request.contract.name, request_id: opts.requestId },
          "OpenAI refused structured request",
        );
        throw new ContentPolicyViolationError(
          `openai refused ${request.contract.name}: ${choice.message.refusal}`,
          this.name,
          ["refusal"],
        );
      }

      return {
        content: choice?.message.content ?? "",
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
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
        "OpenAI structured call failed",
      );
      throw upstream;
    } finally {
      timer.clear();
    }
  }

  private async screen(input: string, signal: AbortSignal): Promise<void> {
    const moderation = await this.client.moderations.create(
      { model: MODERATION_MODEL, input },
      { signal },
    );
    const result = moderation.results[0];
    if (!result?.flagged) return;

    const flagged = Object.entries(result.categories)
      .filter(([, isFlagged]) => isFlagged === true)
      .map(([category]) => category);

    throw new ContentPolicyViolationError(
      "openai moderation flagged the input",
      this.name,
      flagged,
    );
  }
}
