import Fastify, { type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyWebsocket from "@fastify/websocket";
import type { ResearchConfig, ResearchEngine } from "core";
import errors from "./plugins/errors.js";
import engine from "./plugins/engine.js";
import researchRoutes from "./routes/research.js";
import privacyRoutes from "./routes/privacy.js";
import providersRoutes from "./routes/providers.js";

export interface BuildAppOptions {
  config: ResearchConfig;
  engine?: ResearchEngine;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(options: BuildAppOptions) {
  // Structured logging; API keys never belong in logs
  const app = Fastify({
    logger: options.logger ?? {
      level: process.env.LOG_LEVEL || "info",
      redact: {
        paths: ["req.headers.authorization", "headers.authorization"],
        censor: "[REDACTED]",
      },
    },
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: true,
    credentials: true,
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "Accept", "Origin"],
    methods: ["GET", "POST", "OPTIONS"],
  });

  // errors first so every route gets the same error shape
  await app.register(errors);
  await app.register(fastifyWebsocket);
  await app.register(engine, { config: options.config, engine: options.engine });

  await app.register(researchRoutes, { prefix: "/api/v1/research" });
  await app.register(privacyRoutes, { prefix: "/api/v1/privacy" });
  await app.register(providersRoutes, { prefix: "/api/v1/providers" });

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  return app;
}
