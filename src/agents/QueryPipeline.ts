/**
 * QueryPipeline - Question → GraphQL → Answer
 *
 * Runs one question through four stages as an explicit state machine:
 *
 *   idle → schemaResolved → queryGenerated → resultObtained → answerComposed
 *
 * Generation, execution and composition can each move the machine to
 * `failed`. Every run ends in a PipelineResult; nothing is retried and
 * nothing is thrown to the caller.
 *
 * @module QueryPipeline
 */

import type {
  PipelineResult,
  QueryExecutor,
  QuestionAgent,
  StructuredResult,
} from "../types/pipeline-contracts.js";
import {
  CompositionError,
  ExecutionTransportError,
  GenerationError,
  type PipelineError,
} from "../errors/pipeline-errors.js";
import type { AgentConfig } from "../config/env.js";
import { CompletionClient } from "../services/CompletionClient.js";
import { GraphQLClient } from "../services/GraphQLClient.js";
import { SchemaCache, type SchemaDescriptionSource } from "../schema/SchemaCache.js";
import { SchemaIntrospector } from "../schema/SchemaIntrospector.js";
import { FallbackSchemaProvider } from "../schema/FallbackSchemaProvider.js";
import { QueryGenerator } from "./QueryGenerator.js";
import { AnswerComposer } from "./AnswerComposer.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Pipeline state. Each variant carries what the next transition needs.
 */
export type PipelineState =
  | { stage: "idle" }
  | { stage: "schemaResolved"; schema: string }
  | { stage: "queryGenerated"; query: string }
  | { stage: "resultObtained"; query: string; result: StructuredResult }
  | { stage: "answerComposed"; query: string; result: StructuredResult; answer: string }
  | { stage: "failed"; error: PipelineError; query?: string };

type TerminalState = Extract<PipelineState, { stage: "answerComposed" | "failed" }>;

/**
 * Collaborators of the pipeline
 */
export interface QueryPipelineDeps {
  schema: SchemaDescriptionSource;
  generator: Pick<QueryGenerator, "generate">;
  executor: QueryExecutor;
  composer: Pick<AnswerComposer, "compose">;
}

// ============================================================================
// QueryPipeline Class
// ============================================================================

export class QueryPipeline implements QuestionAgent {
  private readonly schema: SchemaDescriptionSource;
  private readonly generator: Pick<QueryGenerator, "generate">;
  private readonly executor: QueryExecutor;
  private readonly composer: Pick<AnswerComposer, "compose">;

  constructor(deps: QueryPipelineDeps) {
    this.schema = deps.schema;
    this.generator = deps.generator;
    this.executor = deps.executor;
    this.composer = deps.composer;
  }

  /**
   * Answer one question
   */
  async query(question: string): Promise<PipelineResult> {
    let state: PipelineState = { stage: "idle" };

    while (!isTerminal(state)) {
      state = await this.advance(state, question);
    }

    return this.assemble(state);
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  private async advance(
    state: Exclude<PipelineState, TerminalState>,
    question: string,
  ): Promise<PipelineState> {
    switch (state.stage) {
      case "idle":
        return { stage: "schemaResolved", schema: await this.schema.getSchemaDescription() };
      case "schemaResolved":
        return this.generate(state.schema, question);
      case "queryGenerated":
        return this.execute(state.query);
      case "resultObtained":
        return this.compose(question, state.query, state.result);
    }
  }

  private async generate(schema: string, question: string): Promise<PipelineState> {
    try {
      const query = await this.generator.generate(schema, question);
      console.log(`[QueryPipeline] Generated GraphQL query: ${query}`);
      return { stage: "queryGenerated", query };
    } catch (error) {
      return { stage: "failed", error: new GenerationError(error) };
    }
  }

  private async execute(query: string): Promise<PipelineState> {
    try {
      const result = await this.executor.execute(query);
      if ("error" in result) {
        console.warn(`[QueryPipeline] API reported an error for the generated query`);
      }
      return { stage: "resultObtained", query, result };
    } catch (error) {
      return { stage: "failed", error: new ExecutionTransportError(error), query };
    }
  }

  private async compose(
    question: string,
    query: string,
    result: StructuredResult,
  ): Promise<PipelineState> {
    try {
      const answer = await this.composer.compose({ question, query, result });
      return { stage: "answerComposed", query, result, answer };
    } catch (error) {
      return { stage: "failed", error: new CompositionError(error), query };
    }
  }

  // ==========================================================================
  // Result assembly
  // ==========================================================================

  private assemble(state: TerminalState): PipelineResult {
    if (state.stage === "answerComposed") {
      return {
        answer: state.answer,
        generatedQuery: state.query,
        rawResult: state.result,
      };
    }

    const reason = state.error.message;
    console.error(`[QueryPipeline] ${state.error.name} during ${state.error.stage}: ${reason}`);

    const result: PipelineResult = {
      answer: `I encountered an error: ${reason}`,
      errorMessage: reason,
      failedStage: state.error.stage,
    };
    if (state.query !== undefined) {
      result.generatedQuery = state.query;
    }
    return result;
  }
}

function isTerminal(state: PipelineState): state is TerminalState {
  return state.stage === "answerComposed" || state.stage === "failed";
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Wire a pipeline from configuration
 */
export function createQueryPipeline(config: AgentConfig): {
  pipeline: QueryPipeline;
  schemaCache: SchemaCache;
  graphqlClient: GraphQLClient;
} {
  const graphqlClient = new GraphQLClient(config.graphql);
  const model = new CompletionClient(config.llm);

  const schemaCache = new SchemaCache({
    introspector: new SchemaIntrospector(graphqlClient),
    fallback: new FallbackSchemaProvider(),
  });

  const pipeline = new QueryPipeline({
    schema: schemaCache,
    generator: new QueryGenerator(model),
    executor: graphqlClient,
    composer: new AnswerComposer(model),
  });

  console.log(
    `[QueryPipeline] Initialized: GraphQL ${graphqlClient.getUrl()}, model ${model.describe()}`,
  );

  return { pipeline, schemaCache, graphqlClient };
}
