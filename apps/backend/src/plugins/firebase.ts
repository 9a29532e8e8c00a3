import fp from "fastify-plugin";
import { initializeApp, cert } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import { z } from "zod";
import {
  ConfigurationError,
  FirestoreMemoryRepository,
  InMemoryMemoryRepository,
  type Memory,
  type ResearchConfig,
} from "core";

declare module "fastify" {
  interface FastifyInstance {
    memory: Memory;
  }
}

const ServiceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function parseServiceAccount(raw: string) {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError("FIREBASE_SERVICE_ACCOUNT_JSON is not valid JSON", { cause: error });
  }
  const parsed = ServiceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError("FIREBASE_SERVICE_ACCOUNT_JSON is missing project_id, client_email or private_key");
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key,
  };
}

export interface FirebasePluginOptions {
  config: ResearchConfig;
}

// Memory backend: Firestore when service account credentials are present,
// otherwise an in-process store that lives as long as the server.
export default fp<FirebasePluginOptions>(async (app, opts) => {
  const learning = {
    alpha: opts.config.learning.alpha,
    defaultScore: opts.config.learning.defaultScore,
  };
  const serviceAccount = process.env.FIREBASE_SERVICE_ACCOUNT_JSON;

  let memory: Memory;
  if (serviceAccount) {
    const firebaseApp = initializeApp({ credential: cert(parseServiceAccount(serviceAccount)) });
    memory = new FirestoreMemoryRepository(getFirestore(firebaseApp), learning);
    app.log.info("Firebase Admin initialized; using Firestore memory");
  } else {
    memory = new InMemoryMemoryRepository(learning);
    app.log.warn("FIREBASE_SERVICE_ACCOUNT_JSON not set; using in-process memory");
  }

  app.decorate("memory", memory);
});
