/**
 * AnswerComposer - Structured result → natural-language answer
 */

import type { CompletionModel } from "../services/CompletionClient.js";
import type { StructuredResult } from "../types/pipeline-contracts.js";
import { buildAnswerPrompt } from "./prompts.js";

export interface CompositionInput {
  question: string;
  query: string;
  result: StructuredResult;
}

export class AnswerComposer {
  private readonly model: CompletionModel;

  constructor(model: CompletionModel) {
    this.model = model;
  }

  async compose(input: CompositionInput): Promise<string> {
    return this.model.complete(
      buildAnswerPrompt({
        question: input.question,
        query: input.query,
        serializedResult: JSON.stringify(input.result, null, 2),
      }),
    );
  }
}
