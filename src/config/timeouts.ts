/**
 * Centralized timeout configuration for the gateway
 *
 * Covers the three remote calls of a question (language model, GraphQL
 * API) and the health probe. All values are configurable via environment
 * variables. A timeout counts as a transport failure of that call.
 */

/**
 * Default timeout values (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /**
   * Language-model completions (query generation, answer composition)
   * Default: 60000ms (60 seconds)
   */
  completion: parseInt(process.env.LLM_TIMEOUT ?? "60000", 10),

  /**
   * GraphQL API requests (introspection and execution)
   * Default: 30000ms (30 seconds)
   */
  graphql: parseInt(process.env.GRAPHQL_TIMEOUT ?? "30000", 10),

  /**
   * Health check probe against the GraphQL API
   * Default: 5000ms (5 seconds)
   */
  healthCheck: parseInt(process.env.HEALTH_CHECK_TIMEOUT ?? "5000", 10),
} as const;

/**
 * Get the completion timeout value
 */
export function getCompletionTimeout(): number {
  return DEFAULT_TIMEOUTS.completion;
}

/**
 * Get the GraphQL request timeout value
 */
export function getGraphQLTimeout(): number {
  return DEFAULT_TIMEOUTS.graphql;
}

/**
 * Get the health check timeout value
 */
export function getHealthCheckTimeout(): number {
  return DEFAULT_TIMEOUTS.healthCheck;
}
