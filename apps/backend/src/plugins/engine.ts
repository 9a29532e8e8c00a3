import fp from "fastify-plugin";
import { createResearchEngine, type ResearchConfig, type ResearchEngine } from "core";
import firebase from "./firebase.js";

declare module "fastify" {
  interface FastifyInstance {
    research: ResearchEngine;
  }
}

export interface EnginePluginOptions {
  config: ResearchConfig;
  /** Prebuilt engine (tests); when absent one is built from config */
  engine?: ResearchEngine;
}

export default fp<EnginePluginOptions>(async (app, opts) => {
  if (opts.engine) {
    app.decorate("research", opts.engine);
    return;
  }

  await app.register(firebase, { config: opts.config });
  app.decorate("research", createResearchEngine({ config: opts.config, memory: app.memory }));
  app.log.info(
    { providers: app.research.services.aggregator.providerNames },
    "Research engine ready"
  );
});
