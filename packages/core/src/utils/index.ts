/**
 * Pure utility functions
 */

export { normalizeUrl, normalizeStatement, tokenize, jaccardSimilarity } from "./deduplication";
export { withTimeout, Semaphore } from "./async";
export { systemClock, type Clock } from "./clock";
