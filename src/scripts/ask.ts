#!/usr/bin/env npx tsx
/**
 * Ask Script
 *
 * Runs one question through the full pipeline without starting the server.
 *
 * Usage:
 *   set -a; source .env; set +a; npx tsx src/scripts/ask.ts "Which jobs are open?"
 */

import { loadConfigFromEnv } from "../config/env.js";
import { createQueryPipeline } from "../agents/QueryPipeline.js";

async function main(): Promise<void> {
  const question = process.argv.slice(2).join(" ").trim();
  if (!question) {
    console.error('Usage: npm run ask -- "<question>"');
    process.exit(1);
  }

  const { pipeline, schemaCache } = createQueryPipeline(loadConfigFromEnv());
  const result = await pipeline.query(question);

  console.log("");
  console.log(`Schema source: ${schemaCache.getSchemaSource()}`);
  if (result.generatedQuery !== undefined) {
    console.log("\nGraphQL query:");
    console.log(result.generatedQuery);
  }
  console.log("\nAnswer:");
  console.log(result.answer);

  if (result.errorMessage !== undefined) {
    console.error(`\nFailed during ${result.failedStage ?? "unknown"} stage`);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Ask failed:", err);
  process.exit(1);
});
