/**
 * Pipeline Contracts - Input/Output shapes for the question pipeline
 *
 * These contracts define the structures exchanged between the schema
 * layer, the query pipeline and the HTTP gateway.
 */

// ============================================================================
// SCHEMA TYPES
// ============================================================================

/**
 * Introspection type reference
 * Wrapper kinds (LIST, NON_NULL) carry the wrapped type in ofType.
 */
export interface TypeReference {
  kind: string;
  name?: string | null | undefined;
  ofType?: TypeReference | null | undefined;
}

/**
 * Field argument or input-object field
 */
export interface InputValue {
  name: string;
  description?: string | null | undefined;
  type: TypeReference;
  defaultValue?: string | null | undefined;
}

/**
 * Field of an OBJECT type
 */
export interface FieldDescriptor {
  name: string;
  description?: string | null | undefined;
  args?: InputValue[] | null | undefined;
  type: TypeReference;
}

/**
 * Value of an ENUM type
 */
export interface EnumValue {
  name: string;
  description?: string | null | undefined;
}

/**
 * One named entity of the remote schema
 */
export interface SchemaType {
  kind: string;
  name?: string | null | undefined;
  description?: string | null | undefined;
  fields?: FieldDescriptor[] | null | undefined;
  inputFields?: InputValue[] | null | undefined;
  enumValues?: EnumValue[] | null | undefined;
}

/**
 * Where the schema description handed to the model came from
 */
export type SchemaSource = "pending" | "live" | "fallback";

// ============================================================================
// EXECUTION TYPES
// ============================================================================

/**
 * Result of running a query: the upstream body unchanged,
 * or `{ error }` when the API reported a problem
 */
export type StructuredResult = Record<string, unknown>;

/**
 * Anything that can run a GraphQL query
 */
export interface QueryExecutor {
  execute(query: string, variables?: Record<string, unknown>): Promise<StructuredResult>;
}

// ============================================================================
// PIPELINE TYPES
// ============================================================================

/**
 * Pipeline stages that can fail a question
 */
export type PipelineStage = "generation" | "execution" | "composition";

/**
 * Output of one pipeline run
 *
 * Successful runs carry generatedQuery + rawResult; failed runs carry
 * errorMessage and failedStage, plus generatedQuery when generation
 * had already succeeded.
 */
export interface PipelineResult {
  /** Answer for the user (an error sentence on failure) */
  answer: string;

  /** Executable query sent to the API */
  generatedQuery?: string;

  /** Structured API result */
  rawResult?: StructuredResult;

  /** Underlying error message */
  errorMessage?: string;

  /** Stage that failed */
  failedStage?: PipelineStage;
}

/**
 * Anything that answers questions
 */
export interface QuestionAgent {
  query(question: string): Promise<PipelineResult>;
}

// ============================================================================
// GATEWAY CONTRACTS
// ============================================================================

/**
 * Body of POST /query
 */
export interface QueryRequestBody {
  /** Natural language question */
  q?: unknown;
}

/**
 * Response of POST /query
 * The raw API result is intentionally absent.
 */
export interface QueryResponse {
  answer: string;
  graphql_query?: string;
  error?: string;
}

/**
 * Type guard for a failed pipeline result
 */
export function isFailedResult(
  result: PipelineResult,
): result is PipelineResult & { errorMessage: string } {
  return result.errorMessage !== undefined;
}
