/**
 * GraphQL Client
 *
 * Sends queries to the upstream GraphQL endpoint. API-level problems
 * (non-2xx status, an `errors` list) come back as `{ error }` results;
 * only transport failures (network, timeout, unreadable body) throw.
 */

import { z } from "zod";
import type { QueryExecutor, StructuredResult } from "../types/pipeline-contracts.js";
import { getGraphQLTimeout, getHealthCheckTimeout } from "../config/timeouts.js";
import { errorMessage } from "../errors/pipeline-errors.js";

export interface GraphQLClientConfig {
  /** GraphQL endpoint URL */
  url: string;

  /** Timeout for query requests (ms) */
  timeout?: number;
}

const responseBodySchema = z.record(z.unknown());

/**
 * Status and body text, read within one timeout
 */
interface RawResponse {
  ok: boolean;
  status: number;
  text: string;
}

/**
 * Client for the upstream GraphQL API
 */
export class GraphQLClient implements QueryExecutor {
  private readonly url: string;
  private readonly timeout: number;

  constructor(config: GraphQLClientConfig) {
    this.url = config.url;
    this.timeout = config.timeout ?? getGraphQLTimeout();
  }

  /**
   * Execute a query and return the structured result
   */
  async execute(
    query: string,
    variables: Record<string, unknown> = {},
  ): Promise<StructuredResult> {
    console.log(`[GraphQLClient] Query: ${query}`);
    console.log(`[GraphQLClient] Variables: ${JSON.stringify(variables)}`);

    const response = await this.post({ query, variables }, this.timeout);

    if (!response.ok) {
      console.error(`[GraphQLClient] Request failed (${response.status}): ${response.text}`);
      return { error: `GraphQL request failed with status ${response.status}` };
    }

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (error) {
      throw new Error(`GraphQL response body is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = responseBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("GraphQL response body is not a JSON object");
    }

    const result = parsed.data;
    if ("errors" in result) {
      console.error(`[GraphQLClient] API returned errors: ${JSON.stringify(result.errors)}`);
      return { error: result.errors };
    }

    return result;
  }

  /**
   * Check if the endpoint answers a trivial query
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.post(
        { query: "{ __typename }", variables: {} },
        getHealthCheckTimeout(),
      );
      return response.ok;
    } catch {
      return false;
    }
  }

  /**
   * Endpoint URL (for startup logs and health output)
   */
  getUrl(): string {
    return this.url;
  }

  /**
   * POST the payload and read the whole body before the timeout fires
   */
  private async post(
    payload: { query: string; variables: Record<string, unknown> },
    timeout: number,
  ): Promise<RawResponse> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timedOut = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new Error(`GraphQL request timed out after ${timeout}ms`));
      }, timeout);
    });

    const exchange = async (): Promise<RawResponse> => {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const text = await response.text();
      return { ok: response.ok, status: response.status, text };
    };

    try {
      return await Promise.race([exchange(), timedOut]);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`GraphQL request timed out after ${timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
