/**
 * Memory collaborator interface
 *
 * Durable storage used by the engine: collected documents, learned source
 * effectiveness, permanent access failures and session checkpoints.
 */

import type { ResearchState } from "../models/research-state";

/**
 * Free-form document metadata. The engine writes url, title, source
 * (provider name) and domain.
 */
export type DocumentMetadata = Record<string, string | number | boolean | undefined>;

export interface StoredDocument {
  id: string;
  sessionId: string;
  content: string;
  metadata: DocumentMetadata;
  storedAt: number;
}

export interface RankedDocument extends StoredDocument {
  score: number; // 0.6 * semantic + 0.4 * keyword
}

export interface SimilarityFilters {
  sessionId?: string;
  source?: string;
  domain?: string;
}

export type AccessFailureType = "access_denied" | "not_found" | "paywall" | "blocked" | "timeout";

export interface AccessFailure {
  url: string; // normalized
  source: string;
  errorType: AccessFailureType;
  message: string;
  retryCount: number;
  firstFailedAt: number;
  lastFailedAt: number;
}

export interface SourceEffectiveness {
  source: string;
  domain: string;
  score: number;
  updatedAt: number;
}

export interface SessionCheckpoint {
  sessionId: string;
  phase: ResearchState["phase"];
  savedAt: number;
}

export interface Memory {
  storeDocument(
    content: string,
    metadata: DocumentMetadata,
    sessionId: string
  ): Promise<string>;

  searchSimilar(
    query: string,
    limit: number,
    filters?: SimilarityFilters
  ): Promise<RankedDocument[]>;

  /**
   * Learned score in [0, 1]; 0.5 for a source never seen in this domain
   */
  getSourceEffectiveness(source: string, domain: string): Promise<number>;

  updateSourceEffectiveness(
    source: string,
    domain: string,
    success: boolean,
    quality: number
  ): Promise<number>;

  /**
   * Idempotent per URL: repeats increment retryCount on the same record
   */
  recordAccessFailure(
    url: string,
    source: string,
    errorType: AccessFailureType,
    message: string
  ): Promise<AccessFailure>;

  isKnownFailure(url: string): Promise<boolean>;

  saveCheckpoint(state: ResearchState): Promise<void>;
  loadCheckpoint(sessionId: string): Promise<ResearchState | null>;
  listCheckpoints(): Promise<SessionCheckpoint[]>;

  /**
   * Move a finished session out of the active checkpoints
   */
  archiveSession(state: ResearchState): Promise<void>;
}
