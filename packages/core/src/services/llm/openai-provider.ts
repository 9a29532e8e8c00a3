/**
 * OpenAI-compatible provider
 *
 * Serves cloud tiers through the OpenAI API and local tiers through Ollama's
 * OpenAI-compatible endpoint (same client, different baseURL).
 */

import OpenAI, { APIConnectionError, APIError } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { CompletionRequestOptions, LLMProvider } from "../../interfaces/llm-provider";
import type { LLMMessage } from "../../models/model";
import {
  errorMessage,
  ModelError,
  ModelOverloadedError,
  ModelUnavailableError,
} from "../../errors";
import { createModuleLogger } from "../../logger";

const log = createModuleLogger("openai-provider");

export interface OpenAIProviderConfig {
  model: string;
  local: boolean;
  contextWindow: number;
  temperature: number;
  apiKey?: string;
  baseURL?: string;
  availabilityCacheMs?: number;
  timeoutMs?: number;
}

function toMessageParam(message: LLMMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}

/**
 * OpenAI implementation of LLMProvider
 */
export class OpenAIProvider implements LLMProvider {
  private readonly client: OpenAI;
  private availability: { value: boolean; checkedAt: number } | null = null;

  constructor(private readonly config: OpenAIProviderConfig) {
    this.client = new OpenAI({
      // Ollama accepts any key
      apiKey: config.apiKey ?? "ollama",
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 120000,
    });
  }

  getName(): string {
    return this.config.model;
  }

  isLocal(): boolean {
    return this.config.local;
  }

  getContextWindow(): number {
    return this.config.contextWindow;
  }

  async isAvailable(): Promise<boolean> {
    const ttl = this.config.availabilityCacheMs ?? 30000;
    if (this.availability && Date.now() - this.availability.checkedAt < ttl) {
      return this.availability.value;
    }

    let value: boolean;
    try {
      await this.client.models.retrieve(this.config.model);
      value = true;
    } catch (error) {
      log.debug("Model not reachable", {
        model: this.config.model,
        error: errorMessage(error),
      });
      value = false;
    }
    this.availability = { value, checkedAt: Date.now() };
    return value;
  }

  async complete(
    messages: LLMMessage[],
    options: CompletionRequestOptions = {}
  ): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: options.maxTokens,
          messages: messages.map(toMessageParam),
          ...(options.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new ModelError("No content in model response", this.config.model);
      }
      return content;
    } catch (error) {
      throw this.mapError(error);
    }
  }

  async *stream(
    messages: LLMMessage[],
    options: CompletionRequestOptions = {}
  ): AsyncIterable<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: options.maxTokens,
          messages: messages.map(toMessageParam),
          stream: true,
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        const token = chunk.choices[0]?.delta?.content;
        if (token) {
          yield token;
        }
      }
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapError(error: unknown): Error {
    if (error instanceof ModelError) {
      return error;
    }
    const model = this.config.model;
    if (error instanceof APIConnectionError) {
      this.availability = { value: false, checkedAt: Date.now() };
      return new ModelUnavailableError(`${model} is unreachable`, model, { cause: error });
    }
    if (error instanceof APIError) {
      const status = error.status;
      if (status === 429 || status === 503 || status === 529) {
        return new ModelOverloadedError(`${model} is overloaded (${status})`, model, {
          cause: error,
        });
      }
      if (status === 401 || status === 403 || status === 404) {
        return new ModelUnavailableError(`${model} unavailable (${status})`, model, {
          cause: error,
        });
      }
    }
    return new ModelError(`${model} request failed: ${errorMessage(error)}`, model, "model_error", {
      cause: error,
    });
  }
}

export function createOpenAIProvider(config: OpenAIProviderConfig): OpenAIProvider {
  return new OpenAIProvider(config);
}
