import type { FastifyPluginAsync } from "fastify";

// Circuit state per search provider, for operators
const routes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_req, rep) => {
    return rep.send({
      configured: app.research.services.aggregator.providerNames,
      circuits: app.research.providerStatus(),
    });
  });
};

export default routes;
