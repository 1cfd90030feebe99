import OpenAI from "openai";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
}

export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: params.system },
      ...params.messages.map((m): OpenAI.ChatCompletionMessageParam =>
        m.role === "user"
          ? { role: "user", content: m.content }
          : { role: "assistant", content: m.content }
      ),
    ];

    const response = await this.client.chat.completions.create(
      {
        model: params.model,
        messages,
        max_tokens: params.maxTokens ?? 4096,
      },
      { signal: params.signal }
    );

    return this.toResponse(response, params.model);
  }

  private toResponse(response: OpenAI.ChatCompletion, model: string): LLMResponse {
    const choice = response.choices[0];

    return {
      text: choice?.message.content ?? null,
      stopReason: choice?.finish_reason === "length" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? null,
        outputTokens: response.usage?.completion_tokens ?? null,
      },
      model,
      provider: this.name,
    };
  }
}
