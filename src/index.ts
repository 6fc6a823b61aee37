/**
 * Gateway Entry Point
 * Exports all public APIs
 */

// Types
export * from "./types/pipeline-contracts.js";
export * from "./errors/pipeline-errors.js";

// Configuration
export * from "./config/env.js";
export * from "./config/timeouts.js";

// Schema
export * from "./schema/SchemaIntrospector.js";
export * from "./schema/SchemaFormatter.js";
export * from "./schema/SchemaCache.js";
export * from "./schema/FallbackSchemaProvider.js";
export { INTROSPECTION_QUERY, INTROSPECTION_TYPE_DEPTH } from "./schema/introspection-query.js";

// Agents
export * from "./agents/QueryGenerator.js";
export * from "./agents/AnswerComposer.js";
export * from "./agents/QueryPipeline.js";

// Services
export * from "./services/CompletionClient.js";
export * from "./services/GraphQLClient.js";

// HTTP
export { createApp, toQueryResponse, type AppOptions } from "./app.js";
