import { describe, it, expect } from "vitest";
import {
  similarityCandidates,
  type CandidateQuery,
} from "../services/memory/firestore-repository";
import { InMemoryMemoryRepository } from "../services/memory/in-memory-repository";
import { hybridScore, rankDocuments } from "../services/memory/hybrid-scoring";
import { createInitialState } from "../services/research-engine/engine";
import { ManualClock } from "./helpers";

describe("InMemoryMemoryRepository", () => {
  it("should increment retryCount when the same URL fails again", async () => {
    const clock = new ManualClock(1000);
    const memory = new InMemoryMemoryRepository({ now: () => clock.now() });

    await memory.recordAccessFailure("https://journal.example/paper", "brave", "paywall", "402");
    clock.advance(500);
    const second = await memory.recordAccessFailure(
      "https://www.journal.example/paper/",
      "brave",
      "access_denied",
      "403"
    );

    expect(second).toEqual({
      url: "https://journal.example/paper",
      source: "brave",
      errorType: "access_denied",
      message: "403",
      retryCount: 2,
      firstFailedAt: 1000,
      lastFailedAt: 1500,
    });
    expect(memory.listAccessFailures()).toHaveLength(1);
  });

  it("should return the default effectiveness for an unseen source", async () => {
    const memory = new InMemoryMemoryRepository({ defaultScore: 0.5 });
    expect(await memory.getSourceEffectiveness("arxiv", "academic")).toBe(0.5);
  });

  it("should rank stored documents by hybrid score and apply filters", async () => {
    const memory = new InMemoryMemoryRepository();
    const relevant = await memory.storeDocument(
      "Metformin lowers blood glucose in type 2 diabetes patients.",
      { title: "Metformin review", source: "pubmed", domain: "medical" },
      "s1"
    );
    const partial = await memory.storeDocument(
      "Diabetes prevalence rose across the region.",
      { title: "Prevalence", source: "brave", domain: "medical" },
      "s1"
    );
    await memory.storeDocument(
      "Quarterly revenue grew for the retailer.",
      { title: "Earnings", source: "brave", domain: "competitive_intelligence" },
      "s2"
    );

    const ranked = await memory.searchSimilar("metformin diabetes", 5);
    expect(ranked.map((doc) => doc.id)).toEqual([relevant, partial]);
    expect(ranked[0].score).toBeGreaterThan(ranked[1].score);

    const fromPubmed = await memory.searchSimilar("metformin diabetes", 5, { source: "pubmed" });
    expect(fromPubmed.map((doc) => doc.id)).toEqual([relevant]);

    expect(await memory.searchSimilar("metformin", 5, { sessionId: "s2" })).toEqual([]);
  });

  it("should keep a checkpoint per session and move it to the archive", async () => {
    const memory = new InMemoryMemoryRepository();
    const state = createInitialState({ query: "solid state batteries", sessionId: "s1" }, 10);

    await memory.saveCheckpoint(state);
    await memory.saveCheckpoint({ ...state, phase: "plan", updatedAt: 20 });
    expect(await memory.listCheckpoints()).toEqual([{ sessionId: "s1", phase: "plan", savedAt: 20 }]);

    const loaded = await memory.loadCheckpoint("s1");
    expect(loaded?.phase).toBe("plan");
    expect(loaded).not.toBe(state);

    await memory.archiveSession({ ...state, phase: "done" });
    expect(await memory.listCheckpoints()).toEqual([]);
    expect((await memory.loadCheckpoint("s1"))?.phase).toBe("done");
    expect(await memory.loadCheckpoint("missing")).toBeNull();
  });
});

describe("hybridScore", () => {
  it("should weight semantic similarity 0.6 and keyword overlap 0.4", () => {
    expect(hybridScore("glucose", "glucose")).toBeCloseTo(1);
    expect(hybridScore("glucose insulin", "glucose")).toBeCloseTo(0.6 * Math.SQRT1_2 + 0.4 * 0.5);
    expect(hybridScore("glucose", "revenue")).toBe(0);
  });

  it("should drop documents with no overlap", () => {
    const ranked = rankDocuments(
      "glucose",
      [{ id: "a", sessionId: "s", content: "revenue", metadata: {}, storedAt: 0 }],
      5
    );
    expect(ranked).toEqual([]);
  });
});

class RecordingQuery implements CandidateQuery<RecordingQuery> {
  readonly steps: string[] = [];

  where(fieldPath: string, opStr: "==", value: string): RecordingQuery {
    this.steps.push(`where ${fieldPath} ${opStr} ${value}`);
    return this;
  }

  orderBy(fieldPath: string, directionStr: "desc"): RecordingQuery {
    this.steps.push(`orderBy ${fieldPath} ${directionStr}`);
    return this;
  }

  limit(limit: number): RecordingQuery {
    this.steps.push(`limit ${limit}`);
    return this;
  }
}

describe("similarityCandidates", () => {
  it("should take the newest documents matching the filters", () => {
    const query = similarityCandidates(new RecordingQuery(), { source: "pubmed", domain: "medical" });

    expect(query.steps).toEqual([
      "where metadata.source == pubmed",
      "where metadata.domain == medical",
      "orderBy storedAt desc",
      "limit 200",
    ]);
  });
});
