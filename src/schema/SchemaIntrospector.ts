/**
 * SchemaIntrospector - Fetches the raw introspection document
 */

import type { QueryExecutor, StructuredResult } from "../types/pipeline-contracts.js";
import { SchemaFetchError, errorMessage } from "../errors/pipeline-errors.js";
import { INTROSPECTION_QUERY } from "./introspection-query.js";

/**
 * Anything that can produce a raw schema document
 */
export interface SchemaDocumentSource {
  fetchSchema(): Promise<unknown>;
}

/**
 * Runs the introspection query through a QueryExecutor.
 * No retries: one failed attempt is reported as SchemaFetchError.
 */
export class SchemaIntrospector implements SchemaDocumentSource {
  private readonly executor: QueryExecutor;

  constructor(executor: QueryExecutor) {
    this.executor = executor;
  }

  async fetchSchema(): Promise<unknown> {
    let result: StructuredResult;
    try {
      result = await this.executor.execute(INTROSPECTION_QUERY);
    } catch (error) {
      throw new SchemaFetchError(`Introspection request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if ("error" in result) {
      throw new SchemaFetchError(
        `Introspection returned an error: ${JSON.stringify(result.error)}`,
      );
    }

    return result;
  }
}
