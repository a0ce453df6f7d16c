import { err, errAsync, ok, okAsync, type Result } from "neverthrow";
import { describe, expect, test, vi } from "vitest";
import type { ApiError } from "../../api/api-errors";
import type { ClusterLookupError } from "../../api/clusters.query";
import {
  type ClusterClient,
  ClusterStatusService,
  describeStatusError,
} from "../../services/cluster-status-service";
import { createNoOpStatusService, StatusService } from "../../services/status-service";
import type { Cluster } from "../../types/ocm";
import { manifestWorkJson, str } from "../test-utils";

const HCP: Cluster = {
  id: "internal-1",
  external_id: "ext-1",
  name: "my-cluster",
  state: "ready",
  hypershift: { enabled: true },
};

function fakeClient(
  lookup: Cluster | ClusterLookupError,
  live: Result<Record<string, string>, ApiError> = ok({}),
): ClusterClient {
  return {
    findCluster: vi.fn(() =>
      "id" in lookup ? okAsync<Cluster, ClusterLookupError>(lookup) : errAsync<Cluster, ClusterLookupError>(lookup),
    ),
    getLiveResources: vi.fn(() =>
      live.isOk()
        ? okAsync<Record<string, string>, ApiError>(live.value)
        : errAsync<Record<string, string>, ApiError>(live.error),
    ),
  };
}

const mainWork = manifestWorkJson({
  name: "internal-1",
  labels: { "api.openshift.com/management-cluster": "hs-mc-test123" },
  conditions: [{ type: "Applied", status: "True", lastTransitionTime: "2026-05-07T12:00:00Z" }],
  manifests: [{ kind: "HostedCluster", values: [str("Available-Status", "True")] }],
});

describe("ClusterStatusService", () => {
  test("builds a snapshot with the cluster identity filled in", async () => {
    const client = fakeClient(HCP, ok({ "manifest_work-internal-1": mainWork }));
    const service = new ClusterStatusService(client, createNoOpStatusService());

    const snapshot = (await service.getStatus("my-cluster"))._unsafeUnwrap();

    expect(client.getLiveResources).toHaveBeenCalledWith("internal-1", undefined);
    expect(snapshot.clusterId).toBe("ext-1");
    expect(snapshot.clusterName).toBe("my-cluster");
    expect(snapshot.clusterState).toBe("ready");
    expect(snapshot.managementCluster).toBe("hs-mc-test123");
    expect(snapshot.controlPlaneConditions.map((c) => c.type)).toEqual(["Available"]);
  });

  test("reports progress through the status logger", async () => {
    const messages: string[] = [];
    const service = new ClusterStatusService(
      fakeClient(HCP, ok({ "manifest_work-internal-1": mainWork })),
      new StatusService((m) => messages.push(m)),
    );

    await service.getStatus("my-cluster");

    expect(messages).toEqual([
      "Looking up cluster my-cluster…",
      "Fetching live resources for my-cluster (internal-1)…",
    ]);
  });

  test("refuses clusters that are not HCP", async () => {
    const client = fakeClient({ ...HCP, hypershift: { enabled: false } });
    const error = (await new ClusterStatusService(client, createNoOpStatusService()).getStatus("x"))._unsafeUnwrapErr();

    expect(error).toEqual({ type: "not-hcp", identifier: "x" });
    expect(client.getLiveResources).not.toHaveBeenCalled();
  });

  test("treats a missing hypershift block as not HCP", async () => {
    const client = fakeClient({ id: "classic" });
    const error = (await new ClusterStatusService(client, createNoOpStatusService()).getStatus("classic"))._unsafeUnwrapErr();
    expect(error.type).toBe("not-hcp");
  });

  test("fails when there are no live resources", async () => {
    const service = new ClusterStatusService(fakeClient(HCP, ok({})), createNoOpStatusService());
    expect((await service.getStatus("my-cluster"))._unsafeUnwrapErr()).toEqual({
      type: "no-resources",
      clusterId: "internal-1",
    });
  });

  test("passes lookup and fetch failures through", async () => {
    const lookupError: ClusterLookupError = { type: "not-found", identifier: "ghost" };
    const missing = new ClusterStatusService(fakeClient(lookupError), createNoOpStatusService());
    expect((await missing.getStatus("ghost"))._unsafeUnwrapErr()).toEqual(lookupError);

    const broken = new ClusterStatusService(fakeClient(HCP, err({ message: "boom" })), createNoOpStatusService());
    expect((await broken.getStatus("my-cluster"))._unsafeUnwrapErr()).toEqual({
      type: "api",
      error: { message: "boom" },
    });
  });

  test("wraps parse failures with the offending key", async () => {
    const service = new ClusterStatusService(
      fakeClient(HCP, ok({ "manifest_work-internal-1": "{" })),
      createNoOpStatusService(),
    );

    const error = (await service.getStatus("my-cluster"))._unsafeUnwrapErr();
    expect(error.type).toBe("parse");
    expect(describeStatusError(error)).toMatch(
      /^failed to parse live resources: failed to parse ManifestWork sync status from manifest_work-internal-1: /,
    );
  });
});

describe("describeStatusError", () => {
  test("renders each failure for the terminal", () => {
    expect(describeStatusError({ type: "not-found", identifier: "ghost" })).toBe('no cluster matches "ghost"');
    expect(describeStatusError({ type: "ambiguous", identifier: "a%", matches: ["a1 (1)", "a2 (2)"] })).toBe(
      '"a%" matches 2 clusters: a1 (1), a2 (2)',
    );
    expect(describeStatusError({ type: "not-hcp", identifier: "classic" })).toBe(
      'cluster "classic" is not an HCP cluster',
    );
    expect(describeStatusError({ type: "no-resources", clusterId: "abc" })).toBe(
      "no live resources found for cluster abc",
    );
    expect(describeStatusError({ type: "api", error: { message: "GET /x → 500 ", reason: "oops" } })).toBe(
      "GET /x → 500 : oops",
    );
  });
});
