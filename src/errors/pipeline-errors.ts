/**
 * Error taxonomy for the question pipeline
 *
 * Schema errors never leave SchemaCache (the fallback description is used
 * instead). Pipeline errors end the current question and are turned into
 * a PipelineResult by QueryPipeline.
 */

import type { PipelineStage } from "../types/pipeline-contracts.js";

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Schema errors
// ============================================================================

/**
 * Introspection request failed (transport or API level)
 */
export class SchemaFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemaFetchError";
  }
}

/**
 * Introspection document is missing its envelope or has an invalid shape
 */
export class SchemaFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaFormatError";
  }
}

// ============================================================================
// Pipeline errors
// ============================================================================

/**
 * Base class for errors that fail a question
 * The message is the underlying error's message.
 */
export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(cause: unknown) {
    super(errorMessage(cause), { cause });
  }
}

/**
 * Model call failed while producing the query
 */
export class GenerationError extends PipelineError {
  readonly stage = "generation";

  constructor(cause: unknown) {
    super(cause);
    this.name = "GenerationError";
  }
}

/**
 * Network-level failure while calling the data API
 */
export class ExecutionTransportError extends PipelineError {
  readonly stage = "execution";

  constructor(cause: unknown) {
    super(cause);
    this.name = "ExecutionTransportError";
  }
}

/**
 * Model call failed while producing the answer
 */
export class CompositionError extends PipelineError {
  readonly stage = "composition";

  constructor(cause: unknown) {
    super(cause);
    this.name = "CompositionError";
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/**
 * Required configuration is missing or invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
