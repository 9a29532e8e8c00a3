/**
 * Phase transition table
 */

import type { TransitionTable } from "../types";
import { analyze } from "./analyze";
import { awaitApproval } from "./await-approval";
import { clarify } from "./clarify";
import { collect } from "./collect";
import { evaluate } from "./evaluate";
import { plan } from "./plan";
import { processResults } from "./process";
import { synthesize } from "./synthesize";

export const TRANSITIONS: TransitionTable = {
  clarify,
  plan,
  await_approval: awaitApproval,
  collect,
  process: processResults,
  analyze,
  evaluate,
  synthesize,
};

export { expandQuery } from "./plan";
export { addNotFound } from "./collect";
export { mergeEntities, mergeFacts } from "./process";
export { extractFacts, extractHeuristically } from "./fact-extraction";
