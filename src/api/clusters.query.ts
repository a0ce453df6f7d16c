import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import {
  type Cluster,
  ClusterListSchema,
  LiveResourcesSchema,
  type Server,
} from "../types/ocm";
import type { ApiError } from "./api-errors";
import { getJson } from "./transport";

const CLUSTERS_PATH = "/api/clusters_mgmt/v1/clusters";
export const PAGE_SIZE = 50;

export type ClusterLookupError =
  | { type: "api"; error: ApiError }
  | { type: "not-found"; identifier: string }
  | { type: "ambiguous"; identifier: string; matches: string[] };

/**
 * Search expression matching a cluster by internal ID, external ID or
 * display name. The identifier may carry `%` wildcards.
 */
export function buildClusterSearch(identifier: string): string {
  const quoted = identifier.trim().replaceAll("'", "''");
  return `(id like '${quoted}' or external_id like '${quoted}' or display_name like '${quoted}')`;
}

// Pages through the cluster list until a short page comes back.
export function searchClusters(
  server: Server,
  search: string,
  signal?: AbortSignal,
): ResultAsync<Cluster[], ApiError> {
  const fetchFrom = (page: number, acc: Cluster[]): ResultAsync<Cluster[], ApiError> => {
    const qs = new URLSearchParams({ search, size: String(PAGE_SIZE), page: String(page) });
    return getJson(server, `${CLUSTERS_PATH}?${qs.toString()}`, ClusterListSchema, { signal }).andThen(
      (list) => {
        const items = list.items ?? [];
        const all = [...acc, ...items];
        return items.length >= PAGE_SIZE ? fetchFrom(page + 1, all) : okAsync(all);
      },
    );
  };
  return fetchFrom(1, []);
}

export function describeCluster(cluster: Cluster): string {
  const label = cluster.name || cluster.display_name || "";
  return label ? `${label} (${cluster.id})` : cluster.id;
}

export function findCluster(
  server: Server,
  identifier: string,
  signal?: AbortSignal,
): ResultAsync<Cluster, ClusterLookupError> {
  return searchClusters(server, buildClusterSearch(identifier), signal)
    .mapErr((error): ClusterLookupError => ({ type: "api", error }))
    .andThen((clusters) => {
      if (clusters.length === 0) {
        return errAsync<Cluster, ClusterLookupError>({ type: "not-found", identifier });
      }
      if (clusters.length > 1) {
        return errAsync<Cluster, ClusterLookupError>({
          type: "ambiguous",
          identifier,
          matches: clusters.map(describeCluster),
        });
      }
      return okAsync<Cluster, ClusterLookupError>(clusters[0]);
    });
}

export function getLiveResources(
  server: Server,
  clusterId: string,
  signal?: AbortSignal,
): ResultAsync<Record<string, string>, ApiError> {
  const path = `${CLUSTERS_PATH}/${encodeURIComponent(clusterId)}/resources/live`;
  return getJson(server, path, LiveResourcesSchema, { signal }).map((body) => body.resources ?? {});
}
