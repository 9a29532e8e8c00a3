/**
 * In-process Memory implementation
 *
 * Used by tests, the CLI and the server when no Firestore credentials are
 * configured. Nothing survives a restart.
 */

import { randomUUID } from "crypto";
import type {
  AccessFailure,
  AccessFailureType,
  DocumentMetadata,
  Memory,
  RankedDocument,
  SessionCheckpoint,
  SimilarityFilters,
  SourceEffectiveness,
  StoredDocument,
} from "../../interfaces/memory";
import type { ResearchState } from "../../models/research-state";
import { normalizeUrl } from "../../utils/deduplication";
import { updateEffectiveness } from "../saturation/learning";
import { rankDocuments } from "./hybrid-scoring";

export interface MemoryOptions {
  alpha?: number;
  defaultScore?: number;
  now?: () => number;
}

export class InMemoryMemoryRepository implements Memory {
  private readonly documents = new Map<string, StoredDocument>();
  private readonly effectiveness = new Map<string, SourceEffectiveness>();
  private readonly failures = new Map<string, AccessFailure>();
  private readonly checkpoints = new Map<string, ResearchState>();
  private readonly archived = new Map<string, ResearchState>();
  private readonly alpha: number;
  private readonly defaultScore: number;
  private readonly now: () => number;

  constructor(options: MemoryOptions = {}) {
    this.alpha = options.alpha ?? 0.3;
    this.defaultScore = options.defaultScore ?? 0.5;
    this.now = options.now ?? Date.now;
  }

  async storeDocument(
    content: string,
    metadata: DocumentMetadata,
    sessionId: string
  ): Promise<string> {
    const id = randomUUID();
    this.documents.set(id, { id, sessionId, content, metadata: { ...metadata }, storedAt: this.now() });
    return id;
  }

  async searchSimilar(
    query: string,
    limit: number,
    filters: SimilarityFilters = {}
  ): Promise<RankedDocument[]> {
    const candidates = [...this.documents.values()].filter(
      (document) =>
        (!filters.sessionId || document.sessionId === filters.sessionId) &&
        (!filters.source || document.metadata.source === filters.source) &&
        (!filters.domain || document.metadata.domain === filters.domain)
    );
    return rankDocuments(query, candidates, limit);
  }

  async getSourceEffectiveness(source: string, domain: string): Promise<number> {
    return this.effectiveness.get(effectivenessKey(source, domain))?.score ?? this.defaultScore;
  }

  async updateSourceEffectiveness(
    source: string,
    domain: string,
    success: boolean,
    quality: number
  ): Promise<number> {
    const previous = await this.getSourceEffectiveness(source, domain);
    const score = updateEffectiveness(previous, success, quality, this.alpha);
    this.effectiveness.set(effectivenessKey(source, domain), {
      source,
      domain,
      score,
      updatedAt: this.now(),
    });
    return score;
  }

  async recordAccessFailure(
    url: string,
    source: string,
    errorType: AccessFailureType,
    message: string
  ): Promise<AccessFailure> {
    const key = normalizeUrl(url);
    const now = this.now();
    const existing = this.failures.get(key);
    const record: AccessFailure = existing
      ? { ...existing, errorType, message, retryCount: existing.retryCount + 1, lastFailedAt: now }
      : { url: key, source, errorType, message, retryCount: 1, firstFailedAt: now, lastFailedAt: now };
    this.failures.set(key, record);
    return { ...record };
  }

  async isKnownFailure(url: string): Promise<boolean> {
    return this.failures.has(normalizeUrl(url));
  }

  async saveCheckpoint(state: ResearchState): Promise<void> {
    this.checkpoints.set(state.sessionId, structuredClone(state));
  }

  async loadCheckpoint(sessionId: string): Promise<ResearchState | null> {
    const state = this.checkpoints.get(sessionId) ?? this.archived.get(sessionId);
    return state ? structuredClone(state) : null;
  }

  async listCheckpoints(): Promise<SessionCheckpoint[]> {
    return [...this.checkpoints.values()].map((state) => ({
      sessionId: state.sessionId,
      phase: state.phase,
      savedAt: state.updatedAt,
    }));
  }

  async archiveSession(state: ResearchState): Promise<void> {
    this.archived.set(state.sessionId, structuredClone(state));
    this.checkpoints.delete(state.sessionId);
  }

  /**
   * All stored failure records (inspection helper)
   */
  listAccessFailures(): AccessFailure[] {
    return [...this.failures.values()].map((record) => ({ ...record }));
  }
}

function effectivenessKey(source: string, domain: string): string {
  return `${source}::${domain}`;
}
