/**
 * SchemaCache - Lazily resolved schema description
 *
 * Holds one description per instance. The first call introspects and
 * formats the live schema, falling back to the static description on any
 * failure. The outcome is kept for the instance lifetime (no TTL, no
 * refresh). Concurrent first calls may both introspect; the result is
 * the same either way.
 */

import type { SchemaSource } from "../types/pipeline-contracts.js";
import { errorMessage } from "../errors/pipeline-errors.js";
import type { SchemaDocumentSource } from "./SchemaIntrospector.js";
import type { FallbackSchemaProvider } from "./FallbackSchemaProvider.js";
import { formatSchema } from "./SchemaFormatter.js";

export interface SchemaCacheOptions {
  introspector: SchemaDocumentSource;
  fallback: FallbackSchemaProvider;
  /** Document formatter (default: formatSchema) */
  format?: (document: unknown) => string;
}

/**
 * Anything that yields the schema description for prompts
 */
export interface SchemaDescriptionSource {
  getSchemaDescription(): Promise<string>;
}

export class SchemaCache implements SchemaDescriptionSource {
  private readonly introspector: SchemaDocumentSource;
  private readonly fallback: FallbackSchemaProvider;
  private readonly format: (document: unknown) => string;

  private description: string | undefined;
  private source: SchemaSource = "pending";

  constructor(options: SchemaCacheOptions) {
    this.introspector = options.introspector;
    this.fallback = options.fallback;
    this.format = options.format ?? formatSchema;
  }

  /**
   * Get the schema description. Never rejects.
   */
  async getSchemaDescription(): Promise<string> {
    if (this.description !== undefined) {
      return this.description;
    }

    const resolved = await this.resolve();
    this.description = resolved.description;
    this.source = resolved.source;
    return resolved.description;
  }

  /**
   * Where the cached description came from
   */
  getSchemaSource(): SchemaSource {
    return this.source;
  }

  private async resolve(): Promise<{ description: string; source: SchemaSource }> {
    try {
      const document = await this.introspector.fetchSchema();
      const description = this.format(document);
      console.log(`[SchemaCache] Live schema loaded (${description.length} chars)`);
      return { description, source: "live" };
    } catch (error) {
      console.warn(`[SchemaCache] Schema retrieval failed, using fallback schema: ${errorMessage(error)}`);
      return { description: this.fallback.getDescription(), source: "fallback" };
    }
  }
}
