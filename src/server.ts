/**
 * Gateway server entry point
 *
 * Loads configuration from the environment, wires the question pipeline
 * and serves it over HTTP.
 */

import type { Server } from "http";
import { createApp } from "./app.js";
import { loadConfigFromEnv } from "./config/env.js";
import { createQueryPipeline } from "./agents/QueryPipeline.js";

let server: Server | undefined;

async function startServer(): Promise<void> {
  const config = loadConfigFromEnv();
  const { pipeline, schemaCache, graphqlClient } = createQueryPipeline(config);

  const app = createApp({
    agent: pipeline,
    graphql: graphqlClient,
    schema: schemaCache,
    auth: config.server.auth,
    rateLimit: config.server.rateLimit,
    trustProxyHops: config.server.trustProxyHops,
  });

  const port = config.server.port;
  server = app.listen(port, () => {
    console.log(`GraphQL question gateway running on port ${port}`);
    console.log(`Query endpoint: POST http://localhost:${port}/query`);
    console.log(`Health check: http://localhost:${port}/health`);
    console.log(`Metrics: http://localhost:${port}/metrics`);
  });
}

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down...`);
  if (!server) {
    process.exit(0);
  }
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

startServer().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
