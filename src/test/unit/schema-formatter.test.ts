/**
 * Unit Tests: Schema Formatter
 */

import { describe, it, expect } from "vitest";
import {
  formatSchema,
  parseIntrospectionDocument,
  renderTypeReference,
} from "../../schema/SchemaFormatter.js";
import { SchemaFormatError } from "../../errors/pipeline-errors.js";
import type { TypeReference } from "../../types/pipeline-contracts.js";
import { loadFixture } from "../fixtures/load-fixture.js";

const EXPECTED_DESCRIPTION = [
  "GraphQL Schema Types:",
  "",
  "Type: Query (OBJECT)",
  "Fields:",
  "  - jobs(limit: Int = 10, status: JobStatus): [Job!]!",
  "  - job(id: ID!): Job",
  "",
  "Type: Job (OBJECT)",
  "Description: A scheduled piece of work",
  "Fields:",
  "  - id: ID!",
  "  - title: String",
  "    Description: Short job title",
  "  - location: String",
  "  - status: JobStatus",
  "",
  "Type: JobStatus (ENUM)",
  "Values:",
  "  - OPEN",
  "  - CLOSED",
  "",
  "Type: JobFilter (INPUT_OBJECT)",
  "Input Fields:",
  "  - title: String",
  "  - status: JobStatus = OPEN",
  "",
  "",
].join("\n");

function named(kind: string, name: string): TypeReference {
  return { kind, name, ofType: null };
}

function wrap(kind: "NON_NULL" | "LIST", ofType: TypeReference): TypeReference {
  return { kind, name: null, ofType };
}

describe("SchemaFormatter", () => {
  describe("formatSchema", () => {
    it("should render objects, enums and input objects in document order", () => {
      expect(formatSchema(loadFixture("jobs-introspection.json"))).toBe(EXPECTED_DESCRIPTION);
    });

    it("should produce identical output for the same document", () => {
      const document = loadFixture("jobs-introspection.json");

      expect(formatSchema(document)).toBe(formatSchema(document));
    });

    it("should leave out introspection types, scalars and interfaces", () => {
      const output = formatSchema(loadFixture("jobs-introspection.json"));

      expect(output).not.toContain("Type: __Schema");
      expect(output).not.toContain("Type: __TypeKind");
      expect(output).not.toContain("Type: String (SCALAR)");
      expect(output).not.toContain("Type: Node (INTERFACE)");
    });

    it("should render an object without fields as its header only", () => {
      const document = {
        data: { __schema: { types: [{ kind: "OBJECT", name: "Empty", fields: [] }] } },
      };

      expect(formatSchema(document)).toBe("GraphQL Schema Types:\n\nType: Empty (OBJECT)\n\n");
    });
  });

  describe("parseIntrospectionDocument", () => {
    it("should reject a document without the data.__schema envelope", () => {
      expect(() => parseIntrospectionDocument({ error: "boom" })).toThrow(SchemaFormatError);
      expect(() => parseIntrospectionDocument({ data: {} })).toThrow(
        "Introspection document is missing the data.__schema envelope",
      );
    });

    it("should reject a schema without a types list", () => {
      expect(() => parseIntrospectionDocument({ data: { __schema: {} } })).toThrow(
        /^Invalid introspection document: data\.__schema\.types/,
      );
    });

    it("should reject an empty types list", () => {
      expect(() => parseIntrospectionDocument({ data: { __schema: { types: [] } } })).toThrow(
        "Introspection document contains no types",
      );
    });

    it("should return every type, including the ones the formatter skips", () => {
      const types = parseIntrospectionDocument(loadFixture("jobs-introspection.json"));

      expect(types.map((type) => type.name)).toEqual([
        "Query",
        "Job",
        "JobStatus",
        "JobFilter",
        "Node",
        "String",
        "__Schema",
        "__TypeKind",
      ]);
    });
  });

  describe("renderTypeReference", () => {
    it("should render a named type as its name", () => {
      expect(renderTypeReference(named("OBJECT", "Job"))).toBe("Job");
    });

    it("should mark non-null types with !", () => {
      expect(renderTypeReference(wrap("NON_NULL", named("OBJECT", "Job")))).toBe("Job!");
    });

    it("should wrap list types in brackets", () => {
      expect(renderTypeReference(wrap("LIST", wrap("NON_NULL", named("OBJECT", "Job"))))).toBe(
        "[Job!]",
      );
    });

    it("should render a reference without a name as its kind", () => {
      expect(renderTypeReference({ kind: "SCALAR" })).toBe("SCALAR");
    });

    it("should stop unwrapping at the fetched depth", () => {
      const deep = wrap(
        "NON_NULL",
        wrap("LIST", wrap("NON_NULL", wrap("LIST", wrap("NON_NULL", named("SCALAR", "String"))))),
      );

      expect(renderTypeReference(deep)).toBe("[LIST!]!");
    });
  });
});
