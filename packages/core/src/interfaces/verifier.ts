/**
 * Verification collaborator
 */

import type { PrivacyMode } from "../models/model";
import type { Fact, SourceResult } from "../models/research-state";

export interface VerificationContext {
  privacyMode: PrivacyMode;
  /** Every result collected so far; maps a fact's URLs back to providers */
  sources: readonly SourceResult[];
}

export interface Verifier {
  /**
   * Return the facts with confidence, verified and contradictions filled in
   */
  verify(facts: Fact[], context: VerificationContext): Promise<Fact[]>;
}
