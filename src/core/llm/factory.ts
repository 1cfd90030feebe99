import type { LLMProvider } from "./provider.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAICompatProvider } from "./openai-compat.js";
import type { LlmConfig } from "../../utils/config.js";

/**
 * Create an LLM provider from config.
 * Maps config type to the appropriate adapter class.
 */
export function createProvider(config: LlmConfig): LLMProvider {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicProvider(config.api_key, config.base_url);

    case "openai_compat":
      return new OpenAICompatProvider({
        baseURL: config.base_url,
        apiKey: config.api_key,
        name: "openai_compat",
      });
  }
}
