/**
 * Environment configuration
 *
 * Reads everything the gateway needs once at startup. Missing required
 * variables fail startup with a ConfigError naming all of them.
 *
 * @module env
 */

import { ConfigError } from "../errors/pipeline-errors.js";
import type { CompletionClientConfig, LLMProvider } from "../services/CompletionClient.js";
import type { GraphQLClientConfig } from "../services/GraphQLClient.js";
import type { AuthConfig } from "../middleware/auth.js";
import type { RateLimitConfig } from "../middleware/rateLimit.js";
import { getCompletionTimeout, getGraphQLTimeout } from "./timeouts.js";

// ============================================================================
// Types
// ============================================================================

export interface ServerConfig {
  port: number;
  /** Reverse-proxy hops in front of the gateway (0: use the socket address) */
  trustProxyHops: number;
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
}

export interface AgentConfig {
  graphql: GraphQLClientConfig;
  llm: CompletionClientConfig;
}

export interface GatewayConfig extends AgentConfig {
  server: ServerConfig;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_PORT = 8000;

const LLM_PROVIDERS: readonly LLMProvider[] = ["azure-openai", "openai", "ollama"];

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  "azure-openai": "gpt-4o",
  openai: "gpt-4o",
  ollama: "llama3.2",
};

const OPENAI_BASE_URL = "https://api.openai.com/v1";

// ============================================================================
// Loaders
// ============================================================================

function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Language-model configuration for the selected provider
 */
function loadLLMConfig(env: NodeJS.ProcessEnv, missing: string[]): CompletionClientConfig {
  const providerName = env.LLM_PROVIDER ?? "azure-openai";
  if (!isLLMProvider(providerName)) {
    throw new ConfigError(
      `Unsupported LLM_PROVIDER "${providerName}". Use one of: ${LLM_PROVIDERS.join(", ")}`,
    );
  }

  const apiKey = env.OPENAI_API_KEY;
  const endpoint = env.OPENAI_API_ENDPOINT;
  const apiVersion = env.OPENAI_API_VERSION;

  if (providerName !== "ollama" && !apiKey) missing.push("OPENAI_API_KEY");
  if (providerName === "azure-openai" && !apiVersion) missing.push("OPENAI_API_VERSION");
  if (providerName !== "openai" && !endpoint) missing.push("OPENAI_API_ENDPOINT");

  const config: CompletionClientConfig = {
    provider: providerName,
    baseUrl: endpoint || OPENAI_BASE_URL,
    model: env.OPENAI_DEPLOYMENT || DEFAULT_MODELS[providerName],
    timeout: parseIntOr(env.LLM_TIMEOUT, getCompletionTimeout()),
  };
  // Only add credentials if defined
  if (apiKey) {
    config.apiKey = apiKey;
  }
  if (apiVersion) {
    config.apiVersion = apiVersion;
  }
  return config;
}

/**
 * Load the full gateway configuration
 *
 * @throws ConfigError when required variables are missing
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const missing: string[] = [];

  const graphqlUrl = env.GRAPHQL_API_URL;
  if (!graphqlUrl) missing.push("GRAPHQL_API_URL");

  const llm = loadLLMConfig(env, missing);

  if (missing.length > 0 || !graphqlUrl) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }

  const auth: AuthConfig = {};
  if (env.AGENT_API_KEY) {
    auth.apiKey = env.AGENT_API_KEY;
  }

  return {
    graphql: {
      url: graphqlUrl,
      timeout: parseIntOr(env.GRAPHQL_TIMEOUT, getGraphQLTimeout()),
    },
    llm,
    server: {
      port: parseIntOr(env.PORT, DEFAULT_PORT),
      trustProxyHops: parseIntOr(env.TRUST_PROXY_HOPS, 0),
      auth,
      rateLimit: {
        windowMs: parseIntOr(env.RATE_LIMIT_WINDOW_MS, 60000),
        maxRequests: parseIntOr(env.RATE_LIMIT_MAX_REQUESTS, 100),
      },
    },
  };
}
