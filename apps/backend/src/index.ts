import "dotenv/config";
import { getConfig } from "core";
import { buildApp } from "./app.js";

const config = getConfig();
const app = await buildApp({ config });

const port = Number(process.env.PORT || config.server.port);

// Startup log to aid operational visibility
app.log.info(
  {
    env: process.env.NODE_ENV || "development",
    port,
    providers: app.research.services.aggregator.providerNames,
  },
  "Starting research API server"
);

await app.listen({ host: config.server.host, port });
