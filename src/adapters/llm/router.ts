/**
 * Provider selection for the structured call gateway.
 *
 * Precedence: LLM_MODEL env → provider default. One service is constructed per
 * call to `createGenerationService`; the server builds it once at startup.
 */

import { log } from "../../utils/telemetry.js";
import type { Config } from "../../config/index.js";
import type { GenerationService } from "./types.js";
import { OpenAIGenerationService } from "./openai.js";
import { AnthropicGenerationService } from "./anthropic.js";

export class ProviderConfigurationError extends Error {
  readonly name = "ProviderConfigurationError";
}

export function createGenerationService(llm: Config["llm"]): GenerationService {
  switch (llm.provider) {
    case "openai": {
      if (!llm.openaiApiKey) {
        throw new ProviderConfigurationError("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
      }
      const service = new OpenAIGenerationService({
        apiKey: llm.openaiApiKey,
        model: llm.model,
        moderationEnabled: llm.moderationEnabled,
      });
      log.info({ provider: service.name, model: service.model }, "generation service selected");
      return service;
    }
    case "anthropic": {
      if (!llm.anthropicApiKey) {
        throw new ProviderConfigurationError("ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic");
      }
      const service = new AnthropicGenerationService({
        apiKey: llm.anthropicApiKey,
        model: llm.model,
      });
      log.info({ provider: service.name, model: service.model }, "generation service selected");
      return service;
    }
  }
}
