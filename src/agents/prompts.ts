/**
 * Prompt templates for query generation and answer composition
 */

import type { CompletionPrompt } from "../services/CompletionClient.js";

const QUERY_GENERATION_SYSTEM_PROMPT = `You are an assistant that converts natural language questions into GraphQL queries.

INSTRUCTIONS:
1. Work out what information the user is asking for
2. Find the types and fields in the schema that hold that information
3. Write one valid GraphQL query that retrieves it
4. Add arguments and filters when the question needs them
5. Select only the fields relevant to the question

Return ONLY the GraphQL query, with no explanation.`;

const ANSWER_SYSTEM_PROMPT = `You are an assistant that helps users understand data returned by a Jobs API.

INSTRUCTIONS:
1. Answer the original question using ONLY the query result
2. Be clear and concise, and format the answer for a human reader
3. If the result contains errors, explain in plain terms what probably went wrong`;

export interface QueryGenerationPromptInput {
  schema: string;
  question: string;
}

export interface AnswerPromptInput {
  question: string;
  query: string;
  serializedResult: string;
}

/**
 * Prompt asking for a GraphQL query
 */
export function buildQueryGenerationPrompt(input: QueryGenerationPromptInput): CompletionPrompt {
  return {
    system: QUERY_GENERATION_SYSTEM_PROMPT,
    user: `GraphQL Schema:
${input.schema}

User Question:
${input.question}`,
  };
}

/**
 * Prompt asking for a natural-language answer
 */
export function buildAnswerPrompt(input: AnswerPromptInput): CompletionPrompt {
  return {
    system: ANSWER_SYSTEM_PROMPT,
    user: `Original question: ${input.question}

The following GraphQL query was executed:
\`\`\`graphql
${input.query}
\`\`\`

Result:
\`\`\`json
${input.serializedResult}
\`\`\``,
  };
}
