/**
 * Firestore-backed Memory
 *
 * Collections:
 *   documents/{id}
 *   sourceEffectiveness/{source}__{domain}
 *   accessFailures/{sha1(normalizedUrl)}
 *   checkpoints/{sessionId}
 *   archivedSessions/{sessionId}
 *
 * Checkpoints are stored as serialized JSON because research state holds
 * optional fields Firestore would reject as undefined.
 */

import { createHash } from "crypto";
import type { Firestore, Query } from "firebase-admin/firestore";
import { z } from "zod";
import type {
  AccessFailure,
  AccessFailureType,
  DocumentMetadata,
  Memory,
  RankedDocument,
  SessionCheckpoint,
  SimilarityFilters,
  StoredDocument,
} from "../../interfaces/memory";
import { isResearchState, type ResearchState } from "../../models/research-state";
import { StorageError } from "../../errors";
import { createModuleLogger } from "../../logger";
import { normalizeUrl } from "../../utils/deduplication";
import { updateEffectiveness } from "../saturation/learning";
import { rankDocuments } from "./hybrid-scoring";
import type { MemoryOptions } from "./in-memory-repository";

const log = createModuleLogger("firestore-memory");

/** How many recent documents are scored per similarity search */
const SIMILARITY_CANDIDATES = 200;

const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const DocumentSchema = z.object({
  sessionId: z.string(),
  content: z.string(),
  metadata: z.record(z.string(), MetadataValueSchema).default({}),
  storedAt: z.number(),
});

const EffectivenessSchema = z.object({ score: z.number().min(0).max(1) });

const AccessFailureSchema = z.object({
  url: z.string(),
  source: z.string(),
  errorType: z.enum(["access_denied", "not_found", "paywall", "blocked", "timeout"]),
  message: z.string(),
  retryCount: z.number().int(),
  firstFailedAt: z.number(),
  lastFailedAt: z.number(),
});

const CheckpointSchema = z.object({
  sessionId: z.string(),
  phase: z.string(),
  savedAt: z.number(),
  state: z.string(),
});

/** The part of a Firestore query the similarity search builds on */
export interface CandidateQuery<Q> {
  where(fieldPath: string, opStr: "==", value: string): Q;
  orderBy(fieldPath: string, directionStr: "desc"): Q;
  limit(limit: number): Q;
}

/**
 * The newest matching documents, up to the number scored per search
 */
export function similarityCandidates<Q extends CandidateQuery<Q>>(
  documents: Q,
  filters: SimilarityFilters
): Q {
  let query = documents;
  if (filters.sessionId) query = query.where("sessionId", "==", filters.sessionId);
  if (filters.source) query = query.where("metadata.source", "==", filters.source);
  if (filters.domain) query = query.where("metadata.domain", "==", filters.domain);
  return query.orderBy("storedAt", "desc").limit(SIMILARITY_CANDIDATES);
}

export class FirestoreMemoryRepository implements Memory {
  private readonly alpha: number;
  private readonly defaultScore: number;
  private readonly now: () => number;

  constructor(
    private readonly db: Firestore,
    options: MemoryOptions = {}
  ) {
    this.alpha = options.alpha ?? 0.3;
    this.defaultScore = options.defaultScore ?? 0.5;
    this.now = options.now ?? Date.now;
  }

  async storeDocument(
    content: string,
    metadata: DocumentMetadata,
    sessionId: string
  ): Promise<string> {
    const cleanMetadata: Record<string, string | number | boolean> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value !== undefined) cleanMetadata[key] = value;
    }

    const docRef = await this.db.collection("documents").add({
      sessionId,
      content,
      metadata: cleanMetadata,
      storedAt: this.now(),
    });
    return docRef.id;
  }

  async searchSimilar(
    query: string,
    limit: number,
    filters: SimilarityFilters = {}
  ): Promise<RankedDocument[]> {
    const documents: Query = this.db.collection("documents");
    const documentsQuery = similarityCandidates(documents, filters);
    const snapshot = await documentsQuery.get();
    const candidates: StoredDocument[] = [];
    for (const doc of snapshot.docs) {
      const parsed = DocumentSchema.safeParse(doc.data());
      if (parsed.success) {
        candidates.push({ id: doc.id, ...parsed.data });
      } else {
        log.warn("Skipping malformed document", { id: doc.id });
      }
    }
    return rankDocuments(query, candidates, limit);
  }

  async getSourceEffectiveness(source: string, domain: string): Promise<number> {
    const doc = await this.effectivenessRef(source, domain).get();
    const parsed = EffectivenessSchema.safeParse(doc.data());
    return parsed.success ? parsed.data.score : this.defaultScore;
  }

  async updateSourceEffectiveness(
    source: string,
    domain: string,
    success: boolean,
    quality: number
  ): Promise<number> {
    const ref = this.effectivenessRef(source, domain);
    return this.db.runTransaction(async (transaction) => {
      const doc = await transaction.get(ref);
      const parsed = EffectivenessSchema.safeParse(doc.data());
      const previous = parsed.success ? parsed.data.score : this.defaultScore;
      const score = updateEffectiveness(previous, success, quality, this.alpha);
      transaction.set(ref, { source, domain, score, updatedAt: this.now() });
      return score;
    });
  }

  async recordAccessFailure(
    url: string,
    source: string,
    errorType: AccessFailureType,
    message: string
  ): Promise<AccessFailure> {
    const key = normalizeUrl(url);
    const ref = this.failureRef(key);

    return this.db.runTransaction(async (transaction) => {
      const doc = await transaction.get(ref);
      const existing = AccessFailureSchema.safeParse(doc.data());
      const now = this.now();
      const record: AccessFailure = existing.success
        ? {
            ...existing.data,
            errorType,
            message,
            retryCount: existing.data.retryCount + 1,
            lastFailedAt: now,
          }
        : {
            url: key,
            source,
            errorType,
            message,
            retryCount: 1,
            firstFailedAt: now,
            lastFailedAt: now,
          };
      transaction.set(ref, record);
      return record;
    });
  }

  async isKnownFailure(url: string): Promise<boolean> {
    const doc = await this.failureRef(normalizeUrl(url)).get();
    return doc.exists;
  }

  async saveCheckpoint(state: ResearchState): Promise<void> {
    await this.db.collection("checkpoints").doc(state.sessionId).set({
      sessionId: state.sessionId,
      phase: state.phase,
      savedAt: this.now(),
      state: JSON.stringify(state),
    });
  }

  async loadCheckpoint(sessionId: string): Promise<ResearchState | null> {
    for (const collection of ["checkpoints", "archivedSessions"]) {
      const doc = await this.db.collection(collection).doc(sessionId).get();
      if (doc.exists) {
        return this.parseCheckpoint(sessionId, doc.data());
      }
    }
    return null;
  }

  async listCheckpoints(): Promise<SessionCheckpoint[]> {
    const snapshot = await this.db.collection("checkpoints").get();
    const checkpoints: SessionCheckpoint[] = [];
    for (const doc of snapshot.docs) {
      const parsed = CheckpointSchema.safeParse(doc.data());
      if (!parsed.success) continue;
      const state = this.parseCheckpoint(doc.id, parsed.data);
      checkpoints.push({ sessionId: state.sessionId, phase: state.phase, savedAt: parsed.data.savedAt });
    }
    return checkpoints;
  }

  async archiveSession(state: ResearchState): Promise<void> {
    const batch = this.db.batch();
    batch.set(this.db.collection("archivedSessions").doc(state.sessionId), {
      sessionId: state.sessionId,
      phase: state.phase,
      savedAt: this.now(),
      state: JSON.stringify(state),
    });
    batch.delete(this.db.collection("checkpoints").doc(state.sessionId));
    await batch.commit();
  }

  private parseCheckpoint(sessionId: string, data: unknown): ResearchState {
    const parsed = CheckpointSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(`Checkpoint for ${sessionId} is malformed`);
    }
    let state: unknown;
    try {
      state = JSON.parse(parsed.data.state);
    } catch (error) {
      throw new StorageError(`Checkpoint for ${sessionId} is not valid JSON`, { cause: error });
    }
    if (!isResearchState(state)) {
      throw new StorageError(`Checkpoint for ${sessionId} does not hold a research state`);
    }
    return state;
  }

  private effectivenessRef(source: string, domain: string) {
    return this.db.collection("sourceEffectiveness").doc(`${source}__${domain}`);
  }

  private failureRef(normalizedUrl: string) {
    const id = createHash("sha1").update(normalizedUrl).digest("hex");
    return this.db.collection("accessFailures").doc(id);
  }
}
