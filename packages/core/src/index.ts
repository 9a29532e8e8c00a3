/**
 * Core package entry point
 *
 * Exports the research engine, its collaborators and their types.
 */

// Models
export * from "./models/research-state";
export * from "./models/model";
export * from "./models/progress";

// Interfaces
export type * from "./interfaces";

// Errors & logging
export * from "./errors";
export { logger, createModuleLogger, type Logger } from "./logger";

// Services
export * from "./services/research-engine";
export {
  createSearchProviders,
  SearchAggregator,
  rankProviders,
  scoreResultQuality,
  BraveSearchProvider,
  PubMedProvider,
  SemanticScholarProvider,
  ArxivProvider,
  type Environment,
} from "./services/search";
export {
  createModelCatalog,
  OpenAIProvider,
  PrivacyRouter,
  TokenChannel,
  estimateComplexity,
  type ModelCatalogEntry,
  type CompletionOptions,
  type PrivacyAdviceOptions,
} from "./services/llm";
export { ProviderGate } from "./services/resilience/provider-gate";
export { ProviderRegistry } from "./services/resilience/provider-registry";
export { CircuitBreaker, type ProviderCircuit, type CircuitState } from "./services/resilience/circuit-breaker";
export { TokenBucket } from "./services/resilience/token-bucket";
export { withRetry, computeBackoff } from "./services/resilience/retry";
export { SaturationEvaluator, computeMetrics, roundMetrics } from "./services/saturation/evaluator";
export { SourceLearning, updateEffectiveness } from "./services/saturation/learning";
export { ContentExtractor, type ExtractedContent } from "./services/content-extractor";
export { InMemoryMemoryRepository, type MemoryOptions } from "./services/memory/in-memory-repository";
export { FirestoreMemoryRepository } from "./services/memory/firestore-repository";

// Utilities
export * from "./utils";
