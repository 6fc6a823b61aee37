/**
 * Unit Tests: Schema Introspector, Schema Cache and Fallback Schema
 */

import { describe, it, expect, vi } from "vitest";
import { SchemaIntrospector } from "../../schema/SchemaIntrospector.js";
import { SchemaCache } from "../../schema/SchemaCache.js";
import { FallbackSchemaProvider } from "../../schema/FallbackSchemaProvider.js";
import { formatSchema } from "../../schema/SchemaFormatter.js";
import { INTROSPECTION_QUERY } from "../../schema/introspection-query.js";
import { SchemaFetchError } from "../../errors/pipeline-errors.js";
import { loadFixture } from "../fixtures/load-fixture.js";

const FALLBACK_TEXT = "Static schema for tests";

function createCache(fetchSchema: () => Promise<unknown>) {
  const introspector = { fetchSchema: vi.fn(fetchSchema) };
  const cache = new SchemaCache({
    introspector,
    fallback: new FallbackSchemaProvider({ text: FALLBACK_TEXT }),
  });
  return { cache, introspector };
}

describe("SchemaIntrospector", () => {
  it("should send the introspection query and return the document", async () => {
    const document = loadFixture("jobs-introspection.json");
    const executor = { execute: vi.fn().mockResolvedValue(document) };

    const result = await new SchemaIntrospector(executor).fetchSchema();

    expect(result).toBe(document);
    expect(executor.execute).toHaveBeenCalledWith(INTROSPECTION_QUERY);
  });

  it("should report an API error result as SchemaFetchError", async () => {
    const executor = { execute: vi.fn().mockResolvedValue({ error: "boom" }) };

    const promise = new SchemaIntrospector(executor).fetchSchema();

    await expect(promise).rejects.toBeInstanceOf(SchemaFetchError);
    await expect(promise).rejects.toThrow('Introspection returned an error: "boom"');
  });

  it("should report a transport failure as SchemaFetchError", async () => {
    const executor = { execute: vi.fn().mockRejectedValue(new Error("ECONNREFUSED")) };

    await expect(new SchemaIntrospector(executor).fetchSchema()).rejects.toThrow(
      "Introspection request failed: ECONNREFUSED",
    );
  });
});

describe("SchemaCache", () => {
  it("should report a pending source before the first lookup", () => {
    const { cache } = createCache(async () => loadFixture("jobs-introspection.json"));

    expect(cache.getSchemaSource()).toBe("pending");
  });

  it("should format the live schema when introspection succeeds", async () => {
    const document = loadFixture("jobs-introspection.json");
    const { cache } = createCache(async () => document);

    const description = await cache.getSchemaDescription();

    expect(description).toBe(formatSchema(document));
    expect(cache.getSchemaSource()).toBe("live");
  });

  it("should introspect only once across lookups", async () => {
    const { cache, introspector } = createCache(async () => loadFixture("jobs-introspection.json"));

    const first = await cache.getSchemaDescription();
    const second = await cache.getSchemaDescription();

    expect(second).toBe(first);
    expect(introspector.fetchSchema).toHaveBeenCalledTimes(1);
  });

  it("should use the fallback when introspection fails", async () => {
    const { cache } = createCache(async () => {
      throw new SchemaFetchError("Introspection request failed: timeout");
    });

    expect(await cache.getSchemaDescription()).toBe(FALLBACK_TEXT);
    expect(cache.getSchemaSource()).toBe("fallback");
  });

  it("should use the fallback when the document lacks the __schema envelope", async () => {
    const { cache } = createCache(async () => ({ data: { jobs: [] } }));

    expect(await cache.getSchemaDescription()).toBe(FALLBACK_TEXT);
    expect(cache.getSchemaSource()).toBe("fallback");
  });

  it("should keep the fallback without retrying introspection", async () => {
    const { cache, introspector } = createCache(async () => {
      throw new Error("offline");
    });

    await cache.getSchemaDescription();
    await cache.getSchemaDescription();

    expect(introspector.fetchSchema).toHaveBeenCalledTimes(1);
  });

  it("should fall back when the API answers introspection with errors", async () => {
    const executor = {
      execute: vi.fn().mockResolvedValue({ error: [{ message: "Introspection is disabled" }] }),
    };
    const cache = new SchemaCache({
      introspector: new SchemaIntrospector(executor),
      fallback: new FallbackSchemaProvider({ text: FALLBACK_TEXT }),
    });

    expect(await cache.getSchemaDescription()).toBe(FALLBACK_TEXT);
  });
});

describe("FallbackSchemaProvider", () => {
  it("should read the bundled description by default", () => {
    const description = new FallbackSchemaProvider().getDescription();

    expect(description.startsWith("GraphQL Schema for the Jobs API (static fallback):\n")).toBe(true);
    expect(description).toContain("Type: Job (OBJECT)");
  });

  it("should prefer explicit text over the file", () => {
    expect(new FallbackSchemaProvider({ text: "custom" }).getDescription()).toBe("custom");
  });
});
