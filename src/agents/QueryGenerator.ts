/**
 * QueryGenerator - Question + schema → executable GraphQL query
 */

import type { CompletionModel } from "../services/CompletionClient.js";
import { buildQueryGenerationPrompt } from "./prompts.js";

/**
 * Code fence spanning several lines, optional language tag on the opening line
 */
const FENCED_BLOCK_PATTERN = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\s*```$/;

/**
 * Code fence on a single line
 */
const INLINE_FENCE_PATTERN = /^```([\s\S]*?)```$/;

/**
 * Strip surrounding whitespace and one enclosing code fence from model output
 */
export function extractExecutableQuery(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCED_BLOCK_PATTERN.exec(trimmed) ?? INLINE_FENCE_PATTERN.exec(trimmed);
  return (match?.[1] ?? trimmed).trim();
}

export class QueryGenerator {
  private readonly model: CompletionModel;

  constructor(model: CompletionModel) {
    this.model = model;
  }

  /**
   * Ask the model for a query and return it ready to execute
   */
  async generate(schema: string, question: string): Promise<string> {
    const raw = await this.model.complete(buildQueryGenerationPrompt({ schema, question }));
    return extractExecutableQuery(raw);
  }
}
