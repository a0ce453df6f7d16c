export {
  parseLiveResources,
  describeLiveResourceError,
  mainManifestWorkKey,
  MANIFEST_WORK_PREFIX,
  CERTIFICATE_PREFIX,
} from "./status/live-resources";
export type { LiveResourceError, LiveResources, ParseOptions, ParseStage } from "./status/live-resources";
export { flattenFeedback, fieldValueText, DEFAULT_FEEDBACK_RULES } from "./status/feedback";
export type { FeedbackRules, FlattenedFeedback } from "./status/feedback";
export { parseSyncSummary, parseControlPlane, parseWorkerPools } from "./status/manifest-work";
export type { ControlPlaneResult } from "./status/manifest-work";
export { parseCertificate } from "./status/certificate";
export type { DocumentError, DocumentErrorReason } from "./status/document";
export type {
  CertificateStatus,
  Condition,
  StatusSnapshot,
  SyncSummary,
  VersionInfo,
  WorkerPoolStatus,
} from "./types/domain";
export type { FeedbackValue, FieldValue } from "./types/resources";
export { StatusView } from "./components/StatusView";
export {
  ClusterStatusService,
  createClusterClient,
  describeStatusError,
} from "./services/cluster-status-service";
export type { ClusterClient, StatusError } from "./services/cluster-status-service";
