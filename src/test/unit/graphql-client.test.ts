/**
 * Unit Tests: GraphQL Client
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { GraphQLClient } from "../../services/GraphQLClient.js";

const ENDPOINT = "http://jobs.test/graphql";

describe("GraphQLClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: GraphQLClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new GraphQLClient({ url: ENDPOINT, timeout: 1000 });
  });

  function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
  }

  describe("execute", () => {
    it("should post the query and variables as JSON", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { jobs: [] } }));

      await client.execute("query ($id: ID!) { job(id: $id) { id } }", { id: "7" });

      const call = fetchMock.mock.calls[0];
      expect(call?.[0]).toBe(ENDPOINT);
      expect(call?.[1]?.method).toBe("POST");
      expect(JSON.parse(String(call?.[1]?.body))).toEqual({
        query: "query ($id: ID!) { job(id: $id) { id } }",
        variables: { id: "7" },
      });
    });

    it("should send empty variables by default", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { jobs: [] } }));

      await client.execute("{ jobs { id } }");

      expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual({
        query: "{ jobs { id } }",
        variables: {},
      });
    });

    it("should return a successful body unchanged", async () => {
      const body = { data: { jobs: [{ title: "Boiler service", location: "Leeds" }] } };
      fetchMock.mockResolvedValueOnce(jsonResponse(body));

      expect(await client.execute("{ jobs { title location } }")).toEqual(body);
    });

    it("should return the errors list as an error result", async () => {
      const errors = [{ message: 'Cannot query field "salary" on type "Job".' }];
      fetchMock.mockResolvedValueOnce(jsonResponse({ errors, data: null }));

      expect(await client.execute("{ jobs { salary } }")).toEqual({ error: errors });
    });

    it("should return an error result for a non-2xx status", async () => {
      fetchMock.mockResolvedValueOnce(new Response("upstream down", { status: 502 }));

      expect(await client.execute("{ jobs { id } }")).toEqual({
        error: "GraphQL request failed with status 502",
      });
    });

    it("should reject a body that is not a JSON object", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([1, 2, 3]));

      await expect(client.execute("{ jobs { id } }")).rejects.toThrow(
        "GraphQL response body is not a JSON object",
      );
    });

    it("should reject a body that is not valid JSON", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<html>Bad gateway</html>", { status: 200 }));

      await expect(client.execute("{ jobs { id } }")).rejects.toThrow(
        /^GraphQL response body is not valid JSON: /,
      );
    });

    it("should time out while the body is still streaming", async () => {
      const stalled = new Response("{}", { status: 200 });
      vi.spyOn(stalled, "text").mockReturnValue(new Promise<string>(() => undefined));
      fetchMock.mockResolvedValueOnce(stalled);

      const slowClient = new GraphQLClient({ url: ENDPOINT, timeout: 50 });

      await expect(slowClient.execute("{ jobs { id } }")).rejects.toThrow(
        "GraphQL request timed out after 50ms",
      );
    });

    it("should reject on network failure", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.execute("{ jobs { id } }")).rejects.toThrow("fetch failed");
    });

    it("should report an aborted request as a timeout", async () => {
      fetchMock.mockRejectedValueOnce(Object.assign(new Error("aborted"), { name: "AbortError" }));

      await expect(client.execute("{ jobs { id } }")).rejects.toThrow(
        "GraphQL request timed out after 1000ms",
      );
    });
  });

  describe("isAvailable", () => {
    it("should return true when the endpoint answers", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { __typename: "Query" } }));

      expect(await client.isAvailable()).toBe(true);
    });

    it("should return false when the endpoint is unreachable", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      expect(await client.isAvailable()).toBe(false);
    });
  });
});
