import { errAsync, okAsync, type ResultAsync } from "neverthrow";
import { type ApiError, getDisplayMessage } from "../api/api-errors";
import {
  type ClusterLookupError,
  describeCluster,
  findCluster,
  getLiveResources,
} from "../api/clusters.query";
import {
  describeLiveResourceError,
  type LiveResourceError,
  type ParseOptions,
  parseLiveResources,
} from "../status/live-resources";
import type { StatusSnapshot } from "../types/domain";
import type { Cluster, Server } from "../types/ocm";
import type { StatusLogger } from "./status-service";

/**
 * The two calls the status service needs from the management API.
 */
export interface ClusterClient {
  findCluster(identifier: string, signal?: AbortSignal): ResultAsync<Cluster, ClusterLookupError>;
  getLiveResources(clusterId: string, signal?: AbortSignal): ResultAsync<Record<string, string>, ApiError>;
}

export function createClusterClient(server: Server): ClusterClient {
  return {
    findCluster: (identifier, signal) => findCluster(server, identifier, signal),
    getLiveResources: (clusterId, signal) => getLiveResources(server, clusterId, signal),
  };
}

export type StatusError =
  | ClusterLookupError
  | { type: "not-hcp"; identifier: string }
  | { type: "no-resources"; clusterId: string }
  | { type: "parse"; error: LiveResourceError };

export function describeStatusError(error: StatusError): string {
  switch (error.type) {
    case "api":
      return getDisplayMessage(error.error);
    case "not-found":
      return `no cluster matches "${error.identifier}"`;
    case "ambiguous":
      return `"${error.identifier}" matches ${error.matches.length} clusters: ${error.matches.join(", ")}`;
    case "not-hcp":
      return `cluster "${error.identifier}" is not an HCP cluster`;
    case "no-resources":
      return `no live resources found for cluster ${error.clusterId}`;
    case "parse":
      return `failed to parse live resources: ${describeLiveResourceError(error.error)}`;
  }
}

/**
 * Looks a cluster up, fetches its live resources and turns them into a
 * snapshot with the cluster's identity filled in.
 */
export class ClusterStatusService {
  constructor(
    private readonly client: ClusterClient,
    private readonly status: StatusLogger,
    private readonly parseOptions: ParseOptions = {},
  ) {}

  getStatus(identifier: string, signal?: AbortSignal): ResultAsync<StatusSnapshot, StatusError> {
    this.status.info(`Looking up cluster ${identifier}…`, "cluster-status");

    return this.client
      .findCluster(identifier, signal)
      .andThen((cluster) => {
        if (cluster.hypershift?.enabled !== true) {
          return errAsync<Cluster, StatusError>({ type: "not-hcp", identifier });
        }
        return okAsync<Cluster, StatusError>(cluster);
      })
      .andThen((cluster) => {
        this.status.info(`Fetching live resources for ${describeCluster(cluster)}…`, "cluster-status");
        return this.client
          .getLiveResources(cluster.id, signal)
          .mapErr((error): StatusError => ({ type: "api", error }))
          .andThen((resources) => this.buildSnapshot(cluster, resources));
      });
  }

  private buildSnapshot(
    cluster: Cluster,
    resources: Record<string, string>,
  ): ResultAsync<StatusSnapshot, StatusError> {
    const keys = Object.keys(resources);
    if (keys.length === 0) {
      return errAsync<StatusSnapshot, StatusError>({ type: "no-resources", clusterId: cluster.id });
    }
    this.status.debug(`Parsing ${keys.length} live resources`, "cluster-status");

    const parsed = parseLiveResources(resources, cluster.id, this.parseOptions);
    if (parsed.isErr()) {
      this.status.error(describeLiveResourceError(parsed.error), "cluster-status");
      return errAsync<StatusSnapshot, StatusError>({ type: "parse", error: parsed.error });
    }

    return okAsync<StatusSnapshot, StatusError>({
      ...parsed.value,
      clusterId: cluster.external_id ?? "",
      clusterName: cluster.name ?? "",
      clusterState: cluster.state ?? "",
    });
  }
}
