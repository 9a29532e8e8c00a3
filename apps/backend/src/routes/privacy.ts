import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import { PRIVACY_MODES } from "core";

const RecommendBody = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  explicitMode: z.enum(PRIVACY_MODES).optional(),
  useModel: z.boolean().optional(),
});

const routes: FastifyPluginAsync = async (app) => {
  app.post("/recommend", async (req, rep) => {
    const { query, ...options } = RecommendBody.parse(req.body);
    const recommendation = await app.research.recommendPrivacyMode(query, options);
    return rep.send(recommendation);
  });
};

export default routes;
