import type { Result } from "neverthrow";
import {
  MANAGEMENT_CLUSTER_LABEL,
  ManifestWorkSchema,
  RESOURCE_KINDS,
  type FeedbackValue,
  type ManifestCondition,
  type ManifestWork,
} from "../types/resources";
import {
  emptyVersionInfo,
  type CertificateStatus,
  type Condition,
  type SyncSummary,
  type VersionInfo,
  type WorkerPoolStatus,
} from "../types/domain";
import { latestTimestamp } from "../utils/time";
import { decodeDocument, type DocumentError, present } from "./document";
import { DEFAULT_FEEDBACK_RULES, flattenFeedback, type FeedbackRules } from "./feedback";

export type ControlPlaneResult = {
  conditions: Condition[];
  version: VersionInfo;
  managementCluster: string;
  certificate: CertificateStatus | null;
};

function manifestsOf(mw: ManifestWork): ManifestCondition[] {
  return present(mw.status?.resourceStatus?.manifests);
}

function feedbackOf(manifest: ManifestCondition): FeedbackValue[] {
  return present(manifest.statusFeedback?.values);
}

/**
 * Summarise the work's own Applied/Available conditions and the most recent
 * transition time across all of its conditions.
 */
export function parseSyncSummary(text: string): Result<SyncSummary, DocumentError> {
  return decodeDocument(ManifestWorkSchema, text).map((mw) => {
    const conditions = present(mw.status?.conditions);
    const summary: SyncSummary = {
      name: mw.metadata?.name ?? "",
      applied: false,
      available: false,
      lastSyncTime: latestTimestamp(conditions.map((c) => c.lastTransitionTime)),
    };

    for (const c of conditions) {
      if (c.type === "Applied") summary.applied = c.status === "True";
      else if (c.type === "Available") summary.available = c.status === "True";
    }
    return summary;
  });
}

function versionFromExtras(extras: Map<string, string>): VersionInfo {
  const version = emptyVersionInfo();
  version.current = extras.get("Version-Current") ?? "";
  version.desired = extras.get("Version-Desired") ?? "";
  version.status = extras.get("Version-Status") ?? "";
  version.image = extras.get("Version-Image") ?? "";

  const updates = extras.get("Version-AvailableUpdates");
  if (updates) version.availableUpdates = updates.split(",");
  return version;
}

/**
 * Read the hosted cluster's conditions and version from the main work.
 *
 * A Certificate manifest only marks the API server certificate as present:
 * the work carries no feedback rules for it yet, so readiness stays unknown.
 */
export function parseControlPlane(
  text: string,
  rules: FeedbackRules = DEFAULT_FEEDBACK_RULES,
): Result<ControlPlaneResult, DocumentError> {
  return decodeDocument(ManifestWorkSchema, text).map((mw) => {
    const result: ControlPlaneResult = {
      conditions: [],
      version: emptyVersionInfo(),
      managementCluster: mw.metadata?.labels?.[MANAGEMENT_CLUSTER_LABEL] ?? "",
      certificate: null,
    };

    for (const manifest of manifestsOf(mw)) {
      switch (manifest.resourceMeta?.kind) {
        case RESOURCE_KINDS.controlPlane: {
          const { conditions, extras } = flattenFeedback(feedbackOf(manifest), rules);
          result.conditions = conditions;
          result.version = versionFromExtras(extras);
          break;
        }
        case RESOURCE_KINDS.certificate:
          result.certificate = { ready: null, notAfter: null, renewalTime: null, dnsNames: [] };
          break;
      }
    }
    return result;
  });
}

const INTEGER = /^[+-]?\d+$/;

function parseReplicas(value: string | undefined): number {
  if (value === undefined || !INTEGER.test(value)) return 0;
  const n = Number.parseInt(value, 10);
  return Number.isSafeInteger(n) ? n : 0;
}

/**
 * Every NodePool manifest in the work, in document order.
 */
export function parseWorkerPools(
  text: string,
  rules: FeedbackRules = DEFAULT_FEEDBACK_RULES,
): Result<WorkerPoolStatus[], DocumentError> {
  return decodeDocument(ManifestWorkSchema, text).map((mw) =>
    manifestsOf(mw)
      .filter((m) => m.resourceMeta?.kind === RESOURCE_KINDS.workerPool)
      .map((manifest) => {
        const { conditions, extras } = flattenFeedback(feedbackOf(manifest), rules);
        return {
          name: manifest.resourceMeta?.name ?? "",
          replicas: parseReplicas(extras.get("Replicas")),
          version: extras.get("Version") ?? "",
          conditions,
        };
      }),
  );
}
