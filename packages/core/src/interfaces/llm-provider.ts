/**
 * LLM Provider Interface
 *
 * One provider serves one model tier. Local tiers (Ollama) and cloud tiers
 * share the interface; the router decides which one may see a session's data.
 */

import type { LLMMessage } from "../models/model";

export interface CompletionRequestOptions {
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean; // ask for a single JSON object
  signal?: AbortSignal;
}

export interface LLMProvider {
  /**
   * Underlying model identifier (e.g. "llama3.1:8b")
   */
  getName(): string;

  /**
   * Whether inference runs on this machine
   */
  isLocal(): boolean;

  getContextWindow(): number;

  /**
   * Cheap reachability check; implementations may cache the answer
   */
  isAvailable(): Promise<boolean>;

  complete(messages: LLMMessage[], options?: CompletionRequestOptions): Promise<string>;

  /**
   * Yield completion tokens in order
   */
  stream(messages: LLMMessage[], options?: CompletionRequestOptions): AsyncIterable<string>;
}
