/**
 * FallbackSchemaProvider - Static schema description
 *
 * Used whenever live introspection or formatting fails. The text is
 * hand-maintained in schema/fallback-schema.txt and is not synchronized
 * with the live API; `npm run print-schema` shows the live description
 * for comparison.
 */

import * as fs from "fs";

/**
 * Resolves to <repo>/schema/fallback-schema.txt from both src/ and dist/
 */
export const DEFAULT_FALLBACK_SCHEMA_PATH = new URL(
  "../../schema/fallback-schema.txt",
  import.meta.url,
);

export interface FallbackSchemaOptions {
  /** File holding the description */
  path?: URL | string;
  /** Description text (takes precedence over path) */
  text?: string;
}

export class FallbackSchemaProvider {
  private readonly description: string;

  /**
   * Reads the file eagerly so a missing file fails at startup
   */
  constructor(options: FallbackSchemaOptions = {}) {
    this.description =
      options.text ?? fs.readFileSync(options.path ?? DEFAULT_FALLBACK_SCHEMA_PATH, "utf-8");
  }

  getDescription(): string {
    return this.description;
  }
}
