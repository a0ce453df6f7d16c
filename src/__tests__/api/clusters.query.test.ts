import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { getDisplayMessage, isAuthError } from "../../api/api-errors";
import {
  buildClusterSearch,
  findCluster,
  getLiveResources,
  PAGE_SIZE,
  searchClusters,
} from "../../api/clusters.query";

const server = { baseUrl: "https://api.example.test", token: "test-secret" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function cluster(id: string, extra: Record<string, unknown> = {}) {
  return { id, name: `name-${id}`, ...extra };
}

function requestedUrl(call: unknown[]): URL {
  const [input] = call;
  return new URL(String(input));
}

describe("clusters.query", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("buildClusterSearch matches every identifier field and escapes quotes", () => {
    expect(buildClusterSearch("  my-cluster ")).toBe(
      "(id like 'my-cluster' or external_id like 'my-cluster' or display_name like 'my-cluster')",
    );
    expect(buildClusterSearch("o'neil")).toBe(
      "(id like 'o''neil' or external_id like 'o''neil' or display_name like 'o''neil')",
    );
  });

  test("searchClusters sends the token and pages until a short page", async () => {
    const fullPage = Array.from({ length: PAGE_SIZE }, (_, i) => cluster(`c${i}`));
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ items: fullPage }))
      .mockResolvedValueOnce(jsonResponse({ items: [cluster("last")] }));

    const result = await searchClusters(server, "name = 'x'");

    expect(result._unsafeUnwrap()).toHaveLength(PAGE_SIZE + 1);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const first = requestedUrl(fetchMock.mock.calls[0]);
    expect(first.pathname).toBe("/api/clusters_mgmt/v1/clusters");
    expect(first.searchParams.get("search")).toBe("name = 'x'");
    expect(first.searchParams.get("size")).toBe("50");
    expect(first.searchParams.get("page")).toBe("1");
    expect(requestedUrl(fetchMock.mock.calls[1]).searchParams.get("page")).toBe("2");

    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
  });

  test("findCluster returns the single match", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [cluster("abc", { hypershift: { enabled: true } })] }));

    const result = await findCluster(server, "abc");
    expect(result._unsafeUnwrap()).toMatchObject({ id: "abc", hypershift: { enabled: true } });
  });

  test("findCluster reports no match and several matches", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));
    expect((await findCluster(server, "nope"))._unsafeUnwrapErr()).toEqual({
      type: "not-found",
      identifier: "nope",
    });

    fetchMock.mockResolvedValueOnce(jsonResponse({ items: [cluster("a"), { id: "b" }] }));
    expect((await findCluster(server, "%"))._unsafeUnwrapErr()).toEqual({
      type: "ambiguous",
      identifier: "%",
      matches: ["name-a (a)", "b"],
    });
  });

  test("HTTP failures carry the status and server reason", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ kind: "Error", reason: "Token expired" }, 401));

    const error = (await findCluster(server, "abc"))._unsafeUnwrapErr();
    if (error.type !== "api") throw new Error(`unexpected ${error.type}`);

    expect(error.error.status).toBe(401);
    expect(error.error.reason).toBe("Token expired");
    expect(isAuthError(error.error)).toBe(true);
    expect(getDisplayMessage(error.error)).toBe("Token expired (log in again or provide a fresh token)");
  });

  test("network failures become API errors", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    const result = await searchClusters(server, "x");
    expect(result._unsafeUnwrapErr()).toEqual({ message: "fetch failed" });
  });

  test("getLiveResources returns the document map", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ resources: { "manifest_work-abc": "{}" } }));

    const result = await getLiveResources(server, "abc");
    expect(result._unsafeUnwrap()).toEqual({ "manifest_work-abc": "{}" });
    expect(requestedUrl(fetchMock.mock.calls[0]).pathname).toBe(
      "/api/clusters_mgmt/v1/clusters/abc/resources/live",
    );
  });

  test("getLiveResources treats a missing map as empty and rejects a malformed one", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));
    expect((await getLiveResources(server, "abc"))._unsafeUnwrap()).toEqual({});

    fetchMock.mockResolvedValueOnce(jsonResponse({ resources: { a: 1 } }));
    expect((await getLiveResources(server, "abc"))._unsafeUnwrapErr().message).toMatch(
      /^unexpected response from \/api\/clusters_mgmt\/v1\/clusters\/abc\/resources\/live: /,
    );
  });
});
