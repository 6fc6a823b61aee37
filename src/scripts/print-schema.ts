#!/usr/bin/env npx tsx
/**
 * Print Schema Script
 *
 * Prints the schema description the model would receive, so the live
 * description can be compared with schema/fallback-schema.txt.
 *
 * Usage:
 *   GRAPHQL_API_URL=http://localhost:4000/graphql npx tsx src/scripts/print-schema.ts
 */

import { ConfigError } from "../errors/pipeline-errors.js";
import { GraphQLClient } from "../services/GraphQLClient.js";
import { SchemaIntrospector } from "../schema/SchemaIntrospector.js";
import { SchemaCache } from "../schema/SchemaCache.js";
import { FallbackSchemaProvider } from "../schema/FallbackSchemaProvider.js";

async function main(): Promise<void> {
  const url = process.env.GRAPHQL_API_URL;
  if (!url) {
    throw new ConfigError("Missing required environment variables: GRAPHQL_API_URL", [
      "GRAPHQL_API_URL",
    ]);
  }

  const cache = new SchemaCache({
    introspector: new SchemaIntrospector(new GraphQLClient({ url })),
    fallback: new FallbackSchemaProvider(),
  });

  const description = await cache.getSchemaDescription();
  console.log(`# source: ${cache.getSchemaSource()}\n`);
  process.stdout.write(description);

  // The fallback text is not the live schema; signal that to callers
  if (cache.getSchemaSource() === "fallback") {
    process.exit(2);
  }
}

main().catch((err) => {
  console.error("Print schema failed:", err);
  process.exit(1);
});
