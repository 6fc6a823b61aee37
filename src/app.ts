/**
 * HTTP Gateway for the question pipeline
 *
 * Endpoints:
 * - GET /         - Welcome message
 * - POST /query   - Answer a natural-language question
 * - GET /health   - GraphQL API reachability and schema source
 * - GET /metrics  - Prometheus metrics
 */

import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import {
  isFailedResult,
  type PipelineResult,
  type QueryRequestBody,
  type QueryResponse,
  type QuestionAgent,
  type SchemaSource,
} from "./types/pipeline-contracts.js";
import { createAuthMiddleware, type AuthConfig } from "./middleware/auth.js";
import { createQueryRateLimiter, type RateLimitConfig } from "./middleware/rateLimit.js";
import { metrics, metricsHandler, metricsMiddleware } from "./monitoring/metrics.js";

export interface AppOptions {
  /** Question pipeline */
  agent: QuestionAgent;
  /** GraphQL API probe for /health */
  graphql: { isAvailable(): Promise<boolean> };
  /** Schema cache, reported on /health */
  schema: { getSchemaSource(): SchemaSource };
  auth?: AuthConfig;
  rateLimit?: RateLimitConfig;
  /** Reverse-proxy hops whose X-Forwarded-For entries are trusted */
  trustProxyHops?: number;
}

interface HealthResponse {
  status: "healthy" | "unhealthy";
  timestamp: string;
  schemaSource: SchemaSource;
  services: {
    graphql: { status: "ok" | "error"; latency: number };
  };
}

// Error handling middleware
const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
};

/**
 * Map a pipeline result to the public response (raw result withheld)
 */
export function toQueryResponse(result: PipelineResult): QueryResponse {
  const response: QueryResponse = { answer: result.answer };
  if (result.generatedQuery !== undefined) {
    response.graphql_query = result.generatedQuery;
  }
  if (result.errorMessage !== undefined) {
    response.error = result.errorMessage;
  }
  return response;
}

export function createApp(options: AppOptions): Express {
  const { agent, graphql, schema } = options;

  const app = express();
  if (options.trustProxyHops) {
    app.set("trust proxy", options.trustProxyHops);
  }
  app.use(cors());
  app.use(express.json());
  app.use(metricsMiddleware);
  app.use(createAuthMiddleware(options.auth));

  const queryRateLimiter = createQueryRateLimiter(options.rateLimit);

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Welcome to the GraphQL question gateway. Use POST /query to ask questions.",
    });
  });

  // ==========================================================================
  // QUERY ENDPOINT
  // ==========================================================================

  app.post("/query", queryRateLimiter, asyncHandler(async (req: Request, res: Response) => {
    const body: QueryRequestBody = req.body ?? {};

    if (typeof body.q !== "string" || body.q.trim().length === 0) {
      res.status(400).json({
        error: "Query cannot be empty",
        message: "Request body must include a non-empty 'q' string field",
      });
      return;
    }

    console.log(`[Gateway] Received query: ${body.q}`);
    const startTime = Date.now();

    const result = await agent.query(body.q);

    metrics.recordQuestion(result, Date.now() - startTime);
    metrics.setSchemaSource(schema.getSchemaSource());

    if (isFailedResult(result)) {
      console.error(`[Gateway] Error processing query: ${result.errorMessage}`);
    }

    res.json(toQueryResponse(result));
  }));

  // ==========================================================================
  // HEALTH & METRICS
  // ==========================================================================

  app.get("/health", asyncHandler(async (_req: Request, res: Response) => {
    const start = Date.now();
    const available = await graphql.isAvailable();

    const response: HealthResponse = {
      status: available ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      schemaSource: schema.getSchemaSource(),
      services: {
        graphql: { status: available ? "ok" : "error", latency: Date.now() - start },
      },
    };

    res.status(available ? 200 : 503).json(response);
  }));

  app.get("/metrics", asyncHandler(metricsHandler));

  // ==========================================================================
  // ERROR HANDLER
  // ==========================================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    // Raised by express.json() for a malformed body
    if ("type" in err && err.type === "entity.parse.failed") {
      res.status(400).json({
        error: "Invalid JSON body",
        message: err.message,
      });
      return;
    }

    console.error("[Gateway] Server error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err.message,
    });
  });

  return app;
}
