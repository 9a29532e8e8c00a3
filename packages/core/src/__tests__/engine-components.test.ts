import { describe, it, expect } from "vitest";
import { ModelUnavailableError, PrivacyViolationError, ResearchError } from "../errors";
import type { VerificationContext } from "../interfaces/verifier";
import type { SequencedEvent } from "../models/progress";
import type { Fact, ResearchState, SourceResult } from "../models/research-state";
import { PrivacyRouter } from "../services/llm/privacy-router";
import { DEFAULT_CONFIG, type DomainConfig } from "../services/research-engine/config";
import { detectDomain, domainKeywords } from "../services/research-engine/domain-detector";
import { createInitialState } from "../services/research-engine/engine";
import { addNotFound } from "../services/research-engine/phases/collect";
import {
  extractFacts,
  extractHeuristically,
} from "../services/research-engine/phases/fact-extraction";
import { expandQuery } from "../services/research-engine/phases/plan";
import { mergeEntities, mergeFacts } from "../services/research-engine/phases/process";
import { ProgressHub } from "../services/research-engine/progress-hub";
import { buildReport, fallbackSummary } from "../services/research-engine/report";
import {
  contradicts,
  credibilityScore,
  FactVerifier,
  standingFromConfig,
} from "../services/research-engine/verification";
import { catalog, ManualClock, StubModel } from "./helpers";

function fact(statement: string, overrides: Partial<Fact> = {}): Fact {
  return {
    statement,
    sources: ["https://a.example/1"],
    confidence: 0.5,
    extractedConfidence: 0.5,
    verified: false,
    contradictions: [],
    ...overrides,
  };
}

function baseState(overrides: Partial<ResearchState> = {}): ResearchState {
  return {
    ...createInitialState(
      { query: "battery recycling", privacyMode: "LOCAL_ONLY", domain: "general", sessionId: "s1" },
      0
    ),
    ...overrides,
  };
}

const SOURCE: SourceResult = {
  provider: "brave",
  url: "https://a.example/1",
  title: "Battery study",
  snippet: "",
  success: true,
  qualityScore: 0.5,
  retrievedAt: 0,
};

describe("detectDomain", () => {
  it("should pick the domain with the most keyword weight", () => {
    const detected = detectDomain("FDA approval requirements for medical devices");
    expect(detected.domain).toBe("regulatory");
    expect(detected.matchedKeywords).toEqual(["fda", "requirement", "approval"]);
    expect(detected.confidence).toBeCloseTo(3 / 18 + 0.2, 5);
  });

  it("should fall back to general when nothing matches", () => {
    expect(detectDomain("best hiking trails in colorado")).toEqual({
      domain: "general",
      confidence: 0.3,
      matchedKeywords: [],
    });
  });

  it("should use keywords configured for a domain", () => {
    const legal: DomainConfig = {
      primarySources: ["brave"],
      secondarySources: [],
      verificationThreshold: 0.7,
      keywords: ["statute"],
    };
    const detected = detectDomain("statute of limitations", domainKeywords({ legal }));
    expect(detected.domain).toBe("legal");
    expect(detected.confidence).toBe(0.95);
  });
});

describe("FactVerifier", () => {
  const localOnly: VerificationContext = { privacyMode: "LOCAL_ONLY", sources: [] };

  function attributed(url: string, provider: string): SourceResult {
    return { ...SOURCE, url, provider };
  }

  function verifierWith(model: StubModel): FactVerifier {
    return new FactVerifier({
      router: new PrivacyRouter(catalog({ "local-fast": model }), { clock: new ManualClock() }),
    });
  }

  it("should count each normalized source once", async () => {
    const [checked] = await new FactVerifier().verify(
      [fact("Recycling recovers cobalt.", { sources: ["https://www.a.com/x", "https://a.com/x/"] })],
      localOnly
    );
    expect(checked.verified).toBe(false);
    expect(checked.confidence).toBe(0.5);
  });

  it("should verify facts backed by two sources and give the same answer on a second pass", async () => {
    const verifier = new FactVerifier();
    const first = await verifier.verify(
      [
        fact("Recycling recovers cobalt.", {
          sources: ["https://a.example/1", "https://b.example/2"],
          confidence: 0.4,
          extractedConfidence: 0.4,
        }),
      ],
      localOnly
    );
    expect(first[0]).toMatchObject({ verified: true, confidence: 0.75 });

    const second = await verifier.verify(first, localOnly);
    expect(second[0].confidence).toBe(0.75);
  });

  it("should link facts that disagree on a year", async () => {
    const a = "Drug X was approved by the FDA in 2019";
    const b = "Drug X was approved by the FDA in 2021";
    const checked = await new FactVerifier().verify([fact(a), fact(b)], localOnly);
    expect(checked[0].contradictions).toEqual([b]);
    expect(checked[1].contradictions).toEqual([a]);
    expect(checked.map((entry) => entry.confidence)).toEqual([0.2, 0.2]);
  });

  it("should take contradictions from the local model", async () => {
    const model = new StubModel({
      local: true,
      completion: '{"contradictions": [{"pair": [2, 0], "explanation": "opposite effects"}, {"pair": [1, 9]}]}',
    });
    const statements = [
      "Drug X lowers blood pressure in adults",
      "Cobalt prices rose last year",
      "Drug X raises blood pressure in adults",
    ];

    const checked = await verifierWith(model).verify(statements.map((statement) => fact(statement)), localOnly);

    expect(checked.map((entry) => entry.contradictions)).toEqual([[statements[2]], [], [statements[0]]]);
    expect(checked.map((entry) => entry.confidence)).toEqual([0.2, 0.5, 0.2]);
    expect(model.completeCalls).toBe(1);
  });

  it("should fall back to patterns when the model finds nothing or fails", async () => {
    const a = "Drug X was approved by the FDA in 2019";
    const b = "Drug X was approved by the FDA in 2021";

    for (const model of [
      new StubModel({ local: true, completion: '{"contradictions": []}' }),
      new StubModel({ local: true, completion: "I could not decide." }),
      new StubModel({ local: true, error: new Error("connection reset") }),
    ]) {
      const checked = await verifierWith(model).verify([fact(a), fact(b)], localOnly);
      expect(checked[0].contradictions).toEqual([b]);
    }
  });

  it("should not ask the model about a single fact", async () => {
    const model = new StubModel({ local: true, completion: '{"contradictions": []}' });
    await verifierWith(model).verify([fact("Cobalt prices rose last year")], localOnly);
    expect(model.completeCalls).toBe(0);
  });

  it("should end the check when the only local model fails under LOCAL_ONLY", async () => {
    const model = new StubModel({
      local: true,
      error: new ModelUnavailableError("stub-local is down", "local-fast"),
    });
    await expect(
      verifierWith(model).verify([fact("Cobalt prices rose"), fact("Nickel prices fell")], localOnly)
    ).rejects.toBeInstanceOf(ModelUnavailableError);
  });

  it("should weight confidence by the credibility of each source's provider", async () => {
    const verifier = new FactVerifier({ standingOf: standingFromConfig(DEFAULT_CONFIG.search.providers) });
    const context: VerificationContext = {
      privacyMode: "LOCAL_ONLY",
      sources: [
        attributed("https://news.example/1", "brave"),
        attributed("https://arxiv.example/2", "arxiv"),
        attributed("https://blog.example/3", "forum"),
      ],
    };

    const checked = await verifier.verify(
      [
        fact("Cobalt recovery reached 95% in pilot plants", {
          sources: ["https://news.example/1", "https://arxiv.example/2"],
        }),
        fact("Nickel recovery lags behind cobalt", { sources: ["https://blog.example/3"] }),
        fact("Lithium recovery is rarely reported", { sources: ["https://elsewhere.example/4"] }),
      ],
      context
    );

    // 0.6 x 0.75 + 0.4 x (0.6 + 0.1 x log2 3)
    expect(checked[0].confidence).toBe(0.753);
    // 0.6 x 0.5 + 0.4 x (0.3 + 0.1)
    expect(checked[1].confidence).toBe(0.46);
    // unattributed sources leave the confidence alone
    expect(checked[2].confidence).toBe(0.5);
  });

  it("should score peer-reviewed sources higher", () => {
    const preprint = { credibility: 0.7, peerReviewed: false };
    const journal = { credibility: 0.9, peerReviewed: true };
    expect(credibilityScore([])).toBeNull();
    expect(credibilityScore([preprint])).toBeCloseTo(0.8, 10);
    expect(credibilityScore([journal])).toBeCloseTo(1, 10);
  });

  it("should detect amount conflicts only for the same subject", () => {
    expect(contradicts("Acme raised $5 million in funding", "Acme raised $7 million in funding")).toBe(true);
    expect(contradicts("Solar output rose in 2020", "Drug X was approved in 2019")).toBe(false);
  });
});

describe("ProgressHub", () => {
  const snapshotEvent = { type: "done" } as const;

  it("should replay buffered events after the given seq, then deliver live ones", () => {
    const hub = new ProgressHub();
    hub.publish("s1", snapshotEvent);
    hub.publish("s1", { type: "token", token: "a" });
    hub.publish("s1", { type: "token", token: "b" });

    const seen: SequencedEvent[] = [];
    const unsubscribe = hub.subscribe("s1", 0, (event) => seen.push(event));
    hub.publish("s1", { type: "token", token: "c" });
    unsubscribe();
    hub.publish("s1", { type: "token", token: "d" });

    expect(seen.map((event) => event.seq)).toEqual([1, 2, 3]);
    expect(hub.lastSeq("s1")).toBe(4);
  });

  it("should keep only the most recent events", () => {
    const hub = new ProgressHub(2);
    hub.publish("s1", { type: "token", token: "a" });
    hub.publish("s1", { type: "token", token: "b" });
    hub.publish("s1", { type: "token", token: "c" });

    expect(hub.history("s1").map((event) => event.seq)).toEqual([1, 2]);
    expect(hub.lastSeq("unknown")).toBe(-1);
  });

  it("should keep delivering when a listener throws", () => {
    const hub = new ProgressHub();
    const seen: number[] = [];
    hub.subscribe("s1", -1, () => {
      throw new Error("listener failed");
    });
    hub.subscribe("s1", -1, (event) => seen.push(event.seq));

    hub.publish("s1", snapshotEvent);

    expect(seen).toEqual([0]);
  });

  it("should forget a released session's buffer and listeners", () => {
    const hub = new ProgressHub();
    const seen: number[] = [];
    hub.subscribe("s1", -1, (event) => seen.push(event.seq));
    hub.publish("s1", { type: "token", token: "a" });
    hub.publish("s1", { type: "token", token: "b" });

    hub.release("s1");

    expect(hub.lastSeq("s1")).toBe(-1);
    expect(hub.history("s1")).toEqual([]);
    expect(hub.publish("s1", { type: "token", token: "c" }).seq).toBe(0);
    expect(seen).toEqual([0, 1]);
  });
});

describe("buildReport", () => {
  it("should order findings and call out weak ones", () => {
    const state = baseState({
      facts: [
        fact("B", { confidence: 0.5, contradictions: ["C"] }),
        fact("A", {
          sources: ["https://a.example/1", "https://b.example/2"],
          confidence: 0.9,
          verified: true,
        }),
        fact("C", { confidence: 0.4, contradictions: ["B"] }),
      ],
      sourceResults: [SOURCE],
      stopReason: ["maximum of 5 research cycles reached"],
    });

    const report = buildReport(state, "Summary text.", {
      partial: false,
      generatedAt: 5,
      verificationThreshold: 0.6,
    });

    expect(report.sections.map((section) => section.heading)).toEqual([
      "Executive Summary",
      "Key Findings",
      "Contradictions",
      "Sources",
      "Limitations",
    ]);
    expect(report.sections[1].body).toBe(
      [
        "- A (confidence 90%, 2 sources, verified)",
        "- B (confidence 50%, 1 source)",
        "- C (confidence 40%, 1 source)",
      ].join("\n")
    );
    expect(report.sections[2].body).toBe('- "B" conflicts with "C"');
    expect(report.sections[3].body).toBe("1. [Battery study](https://a.example/1) (brave)");
    expect(report.sections[4].body).toBe(
      [
        "- Stopped: maximum of 5 research cycles reached",
        "- 2 of 3 findings are below the 60% confidence required for this domain.",
        "- Only local models were used to process this research.",
      ].join("\n")
    );
    expect(report.markdown.startsWith(
      "# Research Report: battery recycling\n\n" +
        "_Domain: general | Privacy: LOCAL_ONLY | Cycles: 0 | Sources: 1 | Facts: 3_\n\n" +
        "## Executive Summary\n\nSummary text."
    )).toBe(true);
    expect(report).toMatchObject({ factCount: 3, sourceCount: 1, generatedAt: 5, partial: false });
  });

  it("should explain what was not found when there are no facts", () => {
    const state = baseState({
      notFound: [{ topic: "battery recycling", reason: "no results from pubmed" }],
    });
    const summary = fallbackSummary(state);

    const report = buildReport(state, summary, {
      partial: true,
      generatedAt: 0,
      verificationThreshold: 0.6,
    });

    expect(summary).toBe(
      'No findings could be established for "battery recycling". Reasons: no results from pubmed.'
    );
    expect(report.sections[1].body).toBe("No facts were extracted from the collected sources.");
    expect(report.sections.at(-1)).toEqual({
      heading: "Not Found / Why",
      body: "- **battery recycling**: no results from pubmed",
    });
  });
});

describe("fact extraction", () => {
  const content =
    "Short one. The 2023 trial enrolled 1,200 adults at Mercy Hospital in Boston. " +
    "Researchers observed fewer complications among participants overall here. " +
    "This sentence mentions metformin without any numbers at all okay.";
  const input = { query: "metformin outcomes", title: "Trial", url: "https://a.example/1", content };

  it("should keep informative sentences and capitalized names", () => {
    expect(extractHeuristically(input)).toEqual({
      facts: [
        { statement: "The 2023 trial enrolled 1,200 adults at Mercy Hospital in Boston.", confidence: 0.4 },
        { statement: "This sentence mentions metformin without any numbers at all okay.", confidence: 0.4 },
      ],
      entities: [
        { name: "Mercy Hospital", type: "concept" },
        { name: "Boston", type: "concept" },
      ],
      method: "heuristic",
    });
  });

  it("should use the model's JSON when it is valid", async () => {
    const models = {
      "local-fast": new StubModel({
        local: true,
        completion:
          '{"entities": [{"name": " Metformin ", "type": "Drug"}], ' +
          '"facts": [{"statement": "Metformin lowered HbA1c.", "confidence": 0.8}]}',
      }),
    };
    const router = new PrivacyRouter(catalog(models), { clock: new ManualClock() });

    expect(await extractFacts(router, "local-fast", "LOCAL_ONLY", input)).toEqual({
      entities: [{ name: "Metformin", type: "drug" }],
      facts: [{ statement: "Metformin lowered HbA1c.", confidence: 0.8 }],
      method: "model",
    });
  });

  it("should fall back to the heuristic on unusable output", async () => {
    const models = { "local-fast": new StubModel({ local: true, completion: "no json here" }) };
    const router = new PrivacyRouter(catalog(models), { clock: new ManualClock() });

    const extraction = await extractFacts(router, "local-fast", "LOCAL_ONLY", input);
    expect(extraction.method).toBe("heuristic");
    expect(extraction.facts).toHaveLength(2);
  });

  it("should not hide a privacy violation", async () => {
    const models = { "cloud-best": new StubModel({ local: false, completion: "{}" }) };
    const router = new PrivacyRouter(catalog(models), { clock: new ManualClock() });

    await expect(extractFacts(router, "cloud-best", "LOCAL_ONLY", input)).rejects.toBeInstanceOf(
      PrivacyViolationError
    );
    expect(models["cloud-best"].completeCalls).toBe(0);
  });
});

describe("state merging", () => {
  it("should merge facts by normalized statement", () => {
    const { facts, added } = mergeFacts(
      [fact("Drug X works.", { sources: ["https://a.example/1"] })],
      [
        { statement: "drug x works", confidence: 0.7 },
        { statement: "New fact", confidence: 0.4 },
      ],
      "https://b.example/2"
    );

    expect(added).toBe(1);
    expect(facts[0]).toMatchObject({
      statement: "Drug X works.",
      sources: ["https://a.example/1", "https://b.example/2"],
      confidence: 0.7,
      extractedConfidence: 0.7,
    });
    expect(facts[1]).toMatchObject({ statement: "New fact", sources: ["https://b.example/2"] });
  });

  it("should merge entities by lowercase name", () => {
    const { entities, added } = mergeEntities(
      [{ name: "Cobalt", type: "material" }],
      [
        { name: "cobalt", type: "element" },
        { name: "Nickel", type: "material" },
      ]
    );
    expect(added).toBe(1);
    expect(entities).toEqual([
      { name: "Cobalt", type: "material" },
      { name: "Nickel", type: "material" },
    ]);
  });

  it("should expand the query with recent unused entities", () => {
    const entities = ["Lithium", "Cobalt", "Battery", "Nickel", "Redwood"].map((name) => ({
      name,
      type: "concept",
    }));
    expect(expandQuery("battery recycling", entities, ["Redwood"])).toEqual({
      query: "battery recycling Nickel Cobalt Lithium",
      terms: ["Nickel", "Cobalt", "Lithium"],
    });
  });

  it("should not repeat a not-found entry", () => {
    const entry = { topic: "battery recycling", reason: "no results from brave" };
    expect(addNotFound(addNotFound([], entry), { ...entry })).toEqual([entry]);
  });
});

describe("createInitialState", () => {
  it("should reject an empty query", () => {
    expect(() => createInitialState({ query: "   " }, 0)).toThrow(ResearchError);
  });

  it("should start at the clarify phase in cycle 1", () => {
    const state = createInitialState({ query: "  battery recycling " }, 42);
    expect(state).toMatchObject({
      phase: "clarify",
      query: "battery recycling",
      refinedQuery: "battery recycling",
      cycle: 1,
      privacyMode: null,
      domain: null,
      stopReason: [],
      createdAt: 42,
    });
  });
});
