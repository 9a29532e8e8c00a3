/**
 * Export collaborator. Rendering formats live outside the engine.
 */

import type { ResearchReport } from "../models/research-state";

export interface ReportExporter {
  export(sessionId: string, report: ResearchReport): Promise<void>;
}
