/**
 * Prometheus Metrics
 *
 * Exposes gateway metrics for monitoring and alerting.
 */

import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from "prom-client";
import type { Request, Response, NextFunction } from "express";
import type { PipelineResult, SchemaSource } from "../types/pipeline-contracts.js";

const register = new Registry();

collectDefaultMetrics({ register });

// ============================================================================
// CUSTOM METRICS
// ============================================================================

const httpRequestsTotal = new Counter({
  name: "gqlgw_http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "path", "status"],
  registers: [register],
});

const httpRequestDuration = new Histogram({
  name: "gqlgw_http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "path"],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

const questionsTotal = new Counter({
  name: "gqlgw_questions_total",
  help: "Questions processed, by outcome and failed stage",
  labelNames: ["outcome", "stage"],
  registers: [register],
});

const questionDuration = new Histogram({
  name: "gqlgw_question_duration_seconds",
  help: "End-to-end question pipeline duration in seconds",
  labelNames: ["outcome"],
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

const apiErrorResults = new Counter({
  name: "gqlgw_api_error_results_total",
  help: "Generated queries the GraphQL API answered with an error",
  registers: [register],
});

const schemaSource = new Gauge({
  name: "gqlgw_schema_source",
  help: "Schema description in use (1 for the active source)",
  labelNames: ["source"],
  registers: [register],
});

const rateLimitHits = new Counter({
  name: "gqlgw_rate_limit_hits_total",
  help: "Number of rate limit hits",
  labelNames: ["path"],
  registers: [register],
});

// ============================================================================
// METRIC RECORDING FUNCTIONS
// ============================================================================

export const metrics = {
  recordRequest(method: string, path: string, status: number, duration: number) {
    httpRequestsTotal.labels(method, path, String(status)).inc();
    httpRequestDuration.labels(method, path).observe(duration / 1000);
  },

  recordQuestion(result: PipelineResult, duration: number) {
    const outcome = result.errorMessage === undefined ? "success" : "failed";
    questionsTotal.labels(outcome, result.failedStage ?? "none").inc();
    questionDuration.labels(outcome).observe(duration / 1000);
    if (result.rawResult !== undefined && "error" in result.rawResult) {
      apiErrorResults.inc();
    }
  },

  setSchemaSource(source: SchemaSource) {
    for (const candidate of ["pending", "live", "fallback"] as const) {
      schemaSource.labels(candidate).set(candidate === source ? 1 : 0);
    }
  },

  recordRateLimitHit(path: string) {
    rateLimitHits.labels(path).inc();
  },
};

// ============================================================================
// EXPRESS MIDDLEWARE
// ============================================================================

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on("finish", () => {
    metrics.recordRequest(req.method, req.path, res.statusCode, Date.now() - start);
  });

  next();
}

/**
 * Metrics endpoint handler
 */
export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.set("Content-Type", register.contentType);
  res.end(await register.metrics());
}

export { register };
