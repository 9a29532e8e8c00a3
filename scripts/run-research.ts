/**
 * Run Research Script
 *
 * Runs one research session from the command line, printing progress as it
 * happens and the final report as markdown.
 *
 * Usage:
 *   npm run research -- "<query>" [--privacy=LOCAL_ONLY|CLOUD_ALLOWED|HYBRID] [--domain=medical] [--cycles=N] [--since=YYYY-MM-DD]
 *
 * Example:
 *   npm run research -- "long-term outcomes of GLP-1 agonists" --domain=medical --cycles=3
 *
 * Memory is in-process for the duration of the run unless
 * FIREBASE_SERVICE_ACCOUNT_JSON is set.
 */

// Load environment variables from .env file
import * as dotenv from "dotenv";
import * as path from "path";
import { fileURLToPath } from "url";
dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env"),
});

import { initializeApp, cert } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import {
  createResearchEngine,
  errorMessage,
  FirestoreMemoryRepository,
  InMemoryMemoryRepository,
  isPrivacyMode,
  withConfigOverrides,
  type DeepPartial,
  type Memory,
  type ResearchConfig,
  type ResearchRequest,
  type SequencedEvent,
} from "../packages/core/src";

function option(args: string[], name: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function createMemory(config: ResearchConfig): Memory {
  const learning = { alpha: config.learning.alpha, defaultScore: config.learning.defaultScore };
  const serviceAccount = process.env.FIREBASE_SERVICE_ACCOUNT_JSON;
  if (!serviceAccount) {
    return new InMemoryMemoryRepository(learning);
  }
  // cert() reads the snake_case service account file format as well
  const app = initializeApp({ credential: cert(JSON.parse(serviceAccount)) });
  return new FirestoreMemoryRepository(getFirestore(app), learning);
}

function printEvent(event: SequencedEvent): void {
  switch (event.type) {
    case "progress": {
      const s = event.snapshot;
      const metrics = s.saturationMetrics
        ? ` | new entities ${(s.saturationMetrics.newEntitiesRatio * 100).toFixed(0)}%` +
          ` | new facts ${(s.saturationMetrics.newFactsRatio * 100).toFixed(0)}%`
        : "";
      console.log(
        `  [${s.phase}] cycle ${s.cycle} | ${s.sourcesQueried} sources | ` +
          `${s.entitiesFound} entities | ${s.factsExtracted} facts${metrics}`
      );
      break;
    }
    case "model_info":
      console.log(`  Writing summary with ${event.model}${event.local ? " (local)" : ""}`);
      break;
    case "error":
      console.log(`  ✗ ${event.message}`);
      break;
    default:
      break;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const query = args.find((a) => !a.startsWith("--"));

  if (!query) {
    console.error(
      '\nUsage: npm run research -- "<query>" [--privacy=MODE] [--domain=NAME] [--cycles=N]\n'
    );
    process.exit(1);
  }

  const privacy = option(args, "privacy");
  if (privacy !== undefined && !isPrivacyMode(privacy)) {
    console.error(`\n✗ Unknown privacy mode: ${privacy}\n`);
    process.exit(1);
  }

  const overrides: DeepPartial<ResearchConfig> = {};
  const cycles = option(args, "cycles");
  if (cycles) {
    overrides.saturation = { maxCycles: parseInt(cycles, 10) };
  }
  const config = withConfigOverrides(overrides);

  console.log("\n" + "=".repeat(60));
  console.log("  RESEARCH RUN");
  console.log("=".repeat(60) + "\n");
  console.log(`Query:      ${query}`);
  console.log(`Privacy:    ${privacy ?? "auto"}`);
  console.log(`Domain:     ${option(args, "domain") ?? "auto"}`);
  console.log(`Max cycles: ${config.saturation.maxCycles}\n`);

  const engine = createResearchEngine({ config, memory: createMemory(config) });
  console.log(`✓ Search providers: ${engine.services.aggregator.providerNames.join(", ") || "none"}\n`);

  const since = option(args, "since");
  const request: ResearchRequest = {
    query,
    privacyMode: privacy,
    domain: option(args, "domain"),
    filters: since ? { dateFrom: since } : undefined,
  };
  const session = await engine.createSession(request);
  const unsubscribe = engine.progress.subscribe(session.sessionId, -1, printEvent);
  const startTime = Date.now();

  try {
    const state = await session.run();
    unsubscribe();

    console.log("\n" + "=".repeat(60));
    console.log(`  ✓ RESEARCH COMPLETED in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
    console.log(`  Stop reason: ${state.stopReason.join("; ") || "n/a"}`);
    console.log("=".repeat(60) + "\n");
    console.log(state.report?.markdown ?? "(no report)");
  } catch (error) {
    unsubscribe();
    console.error("\n" + "=".repeat(60));
    console.error("  ✗ RESEARCH FAILED");
    console.error("=".repeat(60) + "\n");
    console.error("Error:", errorMessage(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Fatal:", errorMessage(error));
  process.exit(1);
});
