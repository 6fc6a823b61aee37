/**
 * SchemaFormatter - Introspection document → prompt text
 *
 * Validates the raw introspection document and renders the OBJECT, ENUM
 * and INPUT_OBJECT types as a compact text description for the model.
 * Output follows document order, so the same document always yields the
 * same text.
 *
 * @module SchemaFormatter
 */

import { z } from "zod";
import type {
  EnumValue,
  FieldDescriptor,
  InputValue,
  SchemaType,
  TypeReference,
} from "../types/pipeline-contracts.js";
import { SchemaFormatError } from "../errors/pipeline-errors.js";
import { INTROSPECTION_TYPE_DEPTH } from "./introspection-query.js";

// ============================================================================
// Constants
// ============================================================================

/**
 * Names with this prefix belong to the introspection system itself
 */
export const INTROSPECTION_PREFIX = "__";

/**
 * Kinds included in the description
 */
export const FORMATTED_KINDS: ReadonlySet<string> = new Set(["OBJECT", "ENUM", "INPUT_OBJECT"]);

export const SCHEMA_HEADER = "GraphQL Schema Types:";

// ============================================================================
// Document schemas
// ============================================================================

const typeReferenceSchema: z.ZodType<TypeReference> = z.lazy(() =>
  z.object({
    kind: z.string(),
    name: z.string().nullable().optional(),
    ofType: typeReferenceSchema.nullable().optional(),
  }),
);

const inputValueSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  type: typeReferenceSchema,
  defaultValue: z.string().nullable().optional(),
});

const fieldSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  args: z.array(inputValueSchema).nullable().optional(),
  type: typeReferenceSchema,
});

const enumValueSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
});

const schemaTypeSchema = z.object({
  kind: z.string(),
  name: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  fields: z.array(fieldSchema).nullable().optional(),
  inputFields: z.array(inputValueSchema).nullable().optional(),
  enumValues: z.array(enumValueSchema).nullable().optional(),
});

const envelopeSchema = z.object({
  data: z.object({
    __schema: z.object({}).passthrough(),
  }),
});

const introspectionDocumentSchema = z.object({
  data: z.object({
    __schema: z.object({
      types: z.array(schemaTypeSchema),
    }),
  }),
});

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate an introspection document and return its schema types
 *
 * @throws SchemaFormatError when the envelope is missing, invalid or empty
 */
export function parseIntrospectionDocument(document: unknown): SchemaType[] {
  if (!envelopeSchema.safeParse(document).success) {
    throw new SchemaFormatError("Introspection document is missing the data.__schema envelope");
  }

  const parsed = introspectionDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SchemaFormatError(`Invalid introspection document: ${issues}`);
  }

  const types = parsed.data.data.__schema.types;
  if (types.length === 0) {
    throw new SchemaFormatError("Introspection document contains no types");
  }

  return types;
}

/**
 * Render an introspection document as prompt text
 *
 * @throws SchemaFormatError when the document cannot be parsed
 */
export function formatSchema(document: unknown): string {
  const types = parseIntrospectionDocument(document).filter(isFormattedType);

  const lines: string[] = [SCHEMA_HEADER, ""];
  for (const type of types) {
    lines.push(...formatType(type), "");
  }

  return lines.join("\n") + "\n";
}

/**
 * Render a type reference as a signature such as `[Job!]!`
 *
 * Recursion stops at the depth the introspection query fetches; a
 * reference at that depth renders its bare name (or kind).
 */
export function renderTypeReference(ref: TypeReference, level = 1): string {
  const wrapped = ref.ofType;

  if (wrapped && level < INTROSPECTION_TYPE_DEPTH) {
    if (ref.kind === "NON_NULL") {
      return `${renderTypeReference(wrapped, level + 1)}!`;
    }
    if (ref.kind === "LIST") {
      return `[${renderTypeReference(wrapped, level + 1)}]`;
    }
  }

  return ref.name || ref.kind;
}

// ============================================================================
// Private helpers
// ============================================================================

function isFormattedType(type: SchemaType): boolean {
  const name = type.name ?? "";
  return FORMATTED_KINDS.has(type.kind) && !name.startsWith(INTROSPECTION_PREFIX);
}

function formatType(type: SchemaType): string[] {
  const lines = [`Type: ${type.name ?? ""} (${type.kind})`];

  if (type.description) {
    lines.push(`Description: ${type.description}`);
  }

  if (type.kind === "ENUM") {
    lines.push(...formatEnumValues(type.enumValues ?? []));
  } else if (type.kind === "INPUT_OBJECT") {
    lines.push(...formatInputFields(type.inputFields ?? []));
  } else {
    lines.push(...formatFields(type.fields ?? []));
  }

  return lines;
}

function formatFields(fields: FieldDescriptor[]): string[] {
  if (fields.length === 0) return [];

  const lines = ["Fields:"];
  for (const field of fields) {
    const args = field.args ?? [];
    const signature =
      args.length > 0 ? `${field.name}(${args.map(formatInputValue).join(", ")})` : field.name;
    lines.push(`  - ${signature}: ${renderTypeReference(field.type)}`);
    if (field.description) {
      lines.push(`    Description: ${field.description}`);
    }
  }
  return lines;
}

function formatInputFields(inputFields: InputValue[]): string[] {
  if (inputFields.length === 0) return [];

  const lines = ["Input Fields:"];
  for (const field of inputFields) {
    lines.push(`  - ${formatInputValue(field)}`);
    if (field.description) {
      lines.push(`    Description: ${field.description}`);
    }
  }
  return lines;
}

function formatEnumValues(values: EnumValue[]): string[] {
  if (values.length === 0) return [];

  return ["Values:", ...values.map((value) => `  - ${value.name}`)];
}

function formatInputValue(value: InputValue): string {
  const signature = `${value.name}: ${renderTypeReference(value.type)}`;
  return value.defaultValue ? `${signature} = ${value.defaultValue}` : signature;
}
