/**
 * Collaborator interfaces for dependency injection
 */

export type { LLMProvider, CompletionRequestOptions } from "./llm-provider";
export type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  ProviderSearchOptions,
} from "./search-provider";
export type {
  Memory,
  DocumentMetadata,
  StoredDocument,
  RankedDocument,
  SimilarityFilters,
  AccessFailure,
  AccessFailureType,
  SourceEffectiveness,
  SessionCheckpoint,
} from "./memory";
export type { VerificationContext, Verifier } from "./verifier";
export type { ReportExporter } from "./exporter";
