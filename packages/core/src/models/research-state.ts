/**
 * ResearchState data model
 *
 * The single document a session works on. Checkpointed through the Memory
 * collaborator after every phase transition.
 */

import type { PrivacyMode } from "./model";
import type { SearchFilters } from "../interfaces/search-provider";

export const RESEARCH_PHASES = [
  "clarify",
  "plan",
  "await_approval",
  "collect",
  "process",
  "analyze",
  "evaluate",
  "synthesize",
  "done",
] as const;

export type ResearchPhase = (typeof RESEARCH_PHASES)[number];

/**
 * Phases that have a transition (everything except the terminal phase)
 */
export type ActivePhase = Exclude<ResearchPhase, "done">;

/**
 * One search hit as recorded in the session. Frozen once recorded.
 */
export interface SourceResult {
  readonly provider: string;
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
  readonly content?: string;
  readonly success: boolean;
  readonly qualityScore: number; // 0-1
  readonly retrievedAt: number; // Unix ms
}

export interface Fact {
  statement: string;
  sources: string[]; // URLs
  confidence: number; // 0-1, after verification
  extractedConfidence: number; // highest score any extraction gave the statement
  verified: boolean;
  contradictions: string[]; // statements this fact conflicts with
}

export interface Entity {
  name: string;
  type: string; // "drug", "organization", "person", "concept", ...
}

export interface SaturationMetrics {
  newEntitiesRatio: number;
  newFactsRatio: number;
  citationCircularity: number;
  sourceCoverage: number;
  overallSaturation: number;
}

export interface CycleRecord {
  cycle: number;
  query: string;
  metrics: SaturationMetrics;
  newEntities: number;
  newFacts: number;
  resultsCollected: number;
  sourceExhausted: boolean;
  completedAt: number;
}

export interface RankedProvider {
  name: string;
  category: string;
  effectiveness: number;
  priority: number; // static order within the domain, lower first
}

export interface ResearchPlan {
  providers: RankedProvider[];
  query: string;
  categoriesPlanned: string[];
  relatedDocumentIds: string[];
  filters?: SearchFilters;
}

/**
 * Per-cycle scratch space, reset by PLAN
 */
export interface CycleWorkspace {
  query: string;
  newResultUrls: string[];
  repeatedCitations: number;
  totalCitations: number;
  exhausted: boolean;
  newEntities: number;
  newFacts: number;
}

export interface NotFoundEntry {
  topic: string;
  reason: string;
}

export interface ReportSection {
  heading: string;
  body: string;
}

export interface ResearchReport {
  title: string;
  summary: string;
  sections: ReportSection[];
  markdown: string;
  partial: boolean;
  factCount: number;
  sourceCount: number;
  generatedAt: number;
}

export interface ResearchState {
  sessionId: string;
  phase: ResearchPhase;
  query: string;
  refinedQuery: string;
  domain: string | null;
  privacyMode: PrivacyMode | null;
  searchFilters: SearchFilters | null;
  requireApproval: boolean;
  approved: boolean;
  plan: ResearchPlan | null;
  entities: Entity[];
  facts: Fact[];
  sourceResults: SourceResult[];
  providersQueried: string[];
  cycle: number;
  cycleHistory: CycleRecord[];
  saturationMetrics: SaturationMetrics | null;
  stopReason: string[];
  notFound: NotFoundEntry[];
  usedExpansionTerms: string[];
  workspace: CycleWorkspace;
  report: ResearchReport | null;
  createdAt: number;
  updatedAt: number;
}

/**
 * Options accepted when a session is started
 */
export interface ResearchRequest {
  query: string;
  privacyMode?: PrivacyMode;
  domain?: string;
  requireApproval?: boolean;
  sessionId?: string;
  filters?: SearchFilters;
}

export function emptyWorkspace(query = ""): CycleWorkspace {
  return {
    query,
    newResultUrls: [],
    repeatedCitations: 0,
    totalCitations: 0,
    exhausted: false,
    newEntities: 0,
    newFacts: 0,
  };
}

/**
 * Shape check for checkpoints read back from storage
 */
export function isResearchState(value: unknown): value is ResearchState {
  if (typeof value !== "object" || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.sessionId === "string" &&
    typeof candidate.query === "string" &&
    RESEARCH_PHASES.some((phase) => phase === candidate.phase) &&
    Array.isArray(candidate.facts) &&
    Array.isArray(candidate.entities) &&
    Array.isArray(candidate.sourceResults) &&
    Array.isArray(candidate.providersQueried) &&
    Array.isArray(candidate.cycleHistory) &&
    Array.isArray(candidate.stopReason)
  );
}
