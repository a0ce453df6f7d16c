import { err, ok, type Result } from "neverthrow";
import { emptySnapshot, type StatusSnapshot } from "../types/domain";
import { parseCertificate } from "./certificate";
import type { DocumentError, DocumentErrorReason } from "./document";
import { DEFAULT_FEEDBACK_RULES, type FeedbackRules } from "./feedback";
import { parseControlPlane, parseSyncSummary, parseWorkerPools } from "./manifest-work";

export const MANIFEST_WORK_PREFIX = "manifest_work";
export const CERTIFICATE_PREFIX = "certificate";

export type ParseStage = "sync" | "control-plane" | "worker-pools" | "certificate";

export type LiveResourceError = {
  key: string;
  stage: ParseStage;
  reason: DocumentErrorReason;
  message: string;
};

export type LiveResources = Readonly<Record<string, string>>;

export type ParseOptions = {
  feedbackRules?: FeedbackRules;
};

const STAGE_LABELS: Record<ParseStage, string> = {
  sync: "ManifestWork sync status",
  "control-plane": "main ManifestWork",
  "worker-pools": "NodePools",
  certificate: "ingress certificate",
};

export function describeLiveResourceError(error: LiveResourceError): string {
  return `failed to parse ${STAGE_LABELS[error.stage]} from ${error.key}: ${error.message}`;
}

export function mainManifestWorkKey(clusterInternalId: string): string {
  return `${MANIFEST_WORK_PREFIX}-${clusterInternalId}`;
}

// Code-unit order, independent of locale.
function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function keysWithPrefix(resources: LiveResources, prefix: string): string[] {
  return Object.keys(resources)
    .filter((key) => key.startsWith(`${prefix}-`))
    .sort(byCodeUnit);
}

function withKey<T>(
  result: Result<T, DocumentError>,
  key: string,
  stage: ParseStage,
): Result<T, LiveResourceError> {
  return result.mapErr((e) => ({ key, stage, reason: e.reason, message: e.message }));
}

/**
 * Build a status snapshot from the live resources of one cluster.
 *
 * Documents are processed in sorted key order so the same input always gives
 * the same snapshot. The main work (`manifest_work-<internal id>`) supplies
 * the control plane fields and may be missing. Only the first certificate
 * document in key order is read. The first document that fails to decode
 * aborts the whole parse.
 */
export function parseLiveResources(
  resources: LiveResources,
  clusterInternalId: string,
  options: ParseOptions = {},
): Result<StatusSnapshot, LiveResourceError> {
  const rules = options.feedbackRules ?? DEFAULT_FEEDBACK_RULES;
  const snapshot = emptySnapshot();
  const workKeys = keysWithPrefix(resources, MANIFEST_WORK_PREFIX);

  for (const key of workKeys) {
    const summary = withKey(parseSyncSummary(resources[key]), key, "sync");
    if (summary.isErr()) return err(summary.error);
    snapshot.syncSummaries.push(summary.value);
  }

  const mainKey = mainManifestWorkKey(clusterInternalId);
  if (Object.hasOwn(resources, mainKey)) {
    const main = withKey(parseControlPlane(resources[mainKey], rules), mainKey, "control-plane");
    if (main.isErr()) return err(main.error);
    snapshot.controlPlaneConditions = main.value.conditions;
    snapshot.version = main.value.version;
    snapshot.managementCluster = main.value.managementCluster;
    snapshot.apiServerCertificate = main.value.certificate;
  }

  for (const key of workKeys) {
    const pools = withKey(parseWorkerPools(resources[key], rules), key, "worker-pools");
    if (pools.isErr()) return err(pools.error);
    snapshot.workerPools.push(...pools.value);
  }

  const [certKey] = keysWithPrefix(resources, CERTIFICATE_PREFIX);
  if (certKey !== undefined) {
    const cert = withKey(parseCertificate(resources[certKey]), certKey, "certificate");
    if (cert.isErr()) return err(cert.error);
    snapshot.ingressCertificate = cert.value;
  }

  return ok(snapshot);
}
