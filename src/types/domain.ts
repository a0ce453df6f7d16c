// Domain types used across the app (stable)

export type Condition = {
  type: string;
  status: string;
  reason: string;
  message: string;
  lastTransitionTime: string; // left unparsed, callers pick the format
};

export type SyncSummary = {
  name: string;
  applied: boolean;
  available: boolean;
  lastSyncTime: Date | null; // null when no condition carried a parseable time
};

export type VersionInfo = {
  current: string;
  desired: string;
  status: string;
  image: string;
  availableUpdates: string[];
};

/**
 * A certificate that was observed. `ready` is null when the resource exists
 * but nothing reported its readiness; a missing certificate is modelled by the
 * owner holding `null` instead of a CertificateStatus.
 */
export type CertificateStatus = {
  ready: boolean | null;
  notAfter: Date | null;
  renewalTime: Date | null;
  dnsNames: string[];
};

export type WorkerPoolStatus = {
  name: string;
  replicas: number;
  version: string;
  conditions: Condition[];
};

export type StatusSnapshot = {
  // Identity is filled in by whoever looked the cluster up.
  clusterId: string;
  clusterName: string;
  clusterState: string;
  managementCluster: string;
  version: VersionInfo;
  apiServerCertificate: CertificateStatus | null;
  ingressCertificate: CertificateStatus | null;
  syncSummaries: SyncSummary[];
  controlPlaneConditions: Condition[];
  workerPools: WorkerPoolStatus[];
};

export function emptyVersionInfo(): VersionInfo {
  return { current: "", desired: "", status: "", image: "", availableUpdates: [] };
}

export function emptySnapshot(): StatusSnapshot {
  return {
    clusterId: "",
    clusterName: "",
    clusterState: "",
    managementCluster: "",
    version: emptyVersionInfo(),
    apiServerCertificate: null,
    ingressCertificate: null,
    syncSummaries: [],
    controlPlaneConditions: [],
    workerPools: [],
  };
}
