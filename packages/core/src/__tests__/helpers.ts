/**
 * Test doubles shared by the engine tests: a manual clock, scripted search
 * providers and scripted model providers.
 */

import type { CompletionRequestOptions, LLMProvider } from "../interfaces/llm-provider";
import type {
  ProviderSearchOptions,
  SearchProvider,
  SearchResultItem,
} from "../interfaces/search-provider";
import type { ReportExporter } from "../interfaces/exporter";
import type { LLMMessage, ModelTier } from "../models/model";
import type { ModelCatalogEntry } from "../services/llm/privacy-router";
import { InMemoryMemoryRepository } from "../services/memory/in-memory-repository";
import {
  DEFAULT_CONFIG,
  mergeConfig,
  type DeepPartial,
  type ResearchConfig,
} from "../services/research-engine/config";
import { createResearchEngine } from "../services/research-engine/factory";
import type { Clock } from "../utils/clock";

export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

type SearchScript = (
  query: string,
  call: number,
  options: ProviderSearchOptions
) => SearchResultItem[] | Promise<SearchResultItem[]>;

export class StubSearchProvider implements SearchProvider {
  readonly queries: string[] = [];

  constructor(
    private readonly name: string,
    private readonly script: SearchScript = () => []
  ) {}

  getName(): string {
    return this.name;
  }

  async search(query: string, options: ProviderSearchOptions): Promise<SearchResultItem[]> {
    this.queries.push(query);
    return this.script(query, this.queries.length, options);
  }

  get calls(): number {
    return this.queries.length;
  }
}

export function result(url: string, overrides: Partial<SearchResultItem> = {}): SearchResultItem {
  return {
    title: `Title for ${url}`,
    url,
    description: "A short description of the document used in tests.",
    ...overrides,
  };
}

export interface StubModelOptions {
  name?: string;
  local: boolean;
  available?: boolean;
  completion?: string | ((messages: LLMMessage[]) => string);
  tokens?: string[];
  /** Thrown by complete() and by stream() before the first token */
  error?: Error;
}

export class StubModel implements LLMProvider {
  completeCalls = 0;
  streamCalls = 0;
  available: boolean;

  constructor(private readonly options: StubModelOptions) {
    this.available = options.available ?? true;
  }

  getName(): string {
    return this.options.name ?? (this.options.local ? "stub-local" : "stub-cloud");
  }

  isLocal(): boolean {
    return this.options.local;
  }

  getContextWindow(): number {
    return 8192;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async complete(messages: LLMMessage[], _options?: CompletionRequestOptions): Promise<string> {
    this.completeCalls++;
    if (this.options.error) throw this.options.error;
    const completion = this.options.completion ?? "";
    return typeof completion === "string" ? completion : completion(messages);
  }

  async *stream(_messages: LLMMessage[], options?: CompletionRequestOptions): AsyncIterable<string> {
    this.streamCalls++;
    if (this.options.error) throw this.options.error;
    for (const token of this.options.tokens ?? []) {
      if (options?.signal?.aborted) return;
      yield token;
    }
  }
}

export function catalog(models: Partial<Record<ModelTier, StubModel>>): ModelCatalogEntry[] {
  const entries: ModelCatalogEntry[] = [];
  for (const tier of ["local-fast", "local-powerful", "cloud-best"] as const) {
    const provider = models[tier];
    if (provider) entries.push({ tier, provider });
  }
  return entries;
}

/**
 * Default configuration with page fetching off, so no test touches the network
 */
export function testConfig(overrides: DeepPartial<ResearchConfig> = {}): ResearchConfig {
  return mergeConfig(mergeConfig(DEFAULT_CONFIG, { extraction: { enabled: false } }), overrides);
}

export interface TestEngineOptions {
  searchProviders: SearchProvider[];
  models?: ModelCatalogEntry[];
  config?: ResearchConfig;
  clock?: ManualClock;
  memory?: InMemoryMemoryRepository;
  exporter?: ReportExporter;
}

export function buildTestEngine(options: TestEngineOptions) {
  const clock = options.clock ?? new ManualClock();
  const config = options.config ?? testConfig();
  const memory =
    options.memory ?? new InMemoryMemoryRepository({ now: () => clock.now() });
  const engine = createResearchEngine({
    config,
    memory,
    env: {},
    searchProviders: options.searchProviders,
    models: options.models ?? [],
    exporter: options.exporter,
    clock,
    random: () => 0.5,
  });
  return { engine, memory, clock, config };
}
