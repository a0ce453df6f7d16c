import chalk from 'chalk';
import {Box, Text} from 'ink';
import React from 'react';
import type {
  CertificateStatus,
  StatusSnapshot,
  SyncSummary,
  VersionInfo,
  WorkerPoolStatus,
} from '../types/domain';
import {
  boolStatus,
  daysRemaining,
  formatDate,
  humanizeAgo,
  nodePoolHeading,
  readinessLabel,
} from '../utils/formatters';
import {formatTable} from '../utils/table';
import {ConditionTable} from './ConditionTable';

const TRANSITIONAL_HINT = '(Cluster may not be fully installed yet or may be in a transitional state)';

const Section: React.FC<{title: string; children: React.ReactNode}> = ({title, children}) => (
  <Box flexDirection="column" marginBottom={1}>
    <Text bold>{title}</Text>
    <Box flexDirection="column" paddingLeft={2}>
      {children}
    </Box>
  </Box>
);

const Lines: React.FC<{lines: string[]}> = ({lines}) => (
  <Box flexDirection="column">
    {lines.map((line, i) => (
      <Text key={i}>{line}</Text>
    ))}
  </Box>
);

const NotAvailable: React.FC<{message: string}> = ({message}) => (
  <>
    <Text>{message}</Text>
    <Text dimColor>{TRANSITIONAL_HINT}</Text>
  </>
);

export function syncRows(works: readonly SyncSummary[], now: Date): string[][] {
  return [
    ['NAME', 'APPLIED', 'AVAILABLE', 'LAST SYNC'],
    ...works.map(w => [w.name, boolStatus(w.applied), boolStatus(w.available), humanizeAgo(w.lastSyncTime, now)]),
  ];
}

export function versionRows(version: VersionInfo): string[][] {
  if (!version.current && !version.desired && !version.status) {
    return [['Version:', '(not available)']];
  }
  const first = [
    'Current:',
    version.current || '(not available)',
    ...(version.desired ? [`Desired: ${version.desired}`] : []),
    ...(version.status ? [`Status: ${version.status}`] : []),
  ];
  const rows = [first];
  if (version.availableUpdates.length > 0) {
    rows.push(['Available Updates:', version.availableUpdates.join(', ')]);
  }
  if (version.status && version.status !== 'Completed') {
    rows.push(['Note:', 'Check ClusterVersion conditions below for details']);
  }
  return rows;
}

export function certificateRows(cert: CertificateStatus, now: Date): string[][] {
  const rows: string[][] = [['Status:', readinessLabel(cert.ready)]];
  if (cert.notAfter) {
    rows.push(['Expires:', `${formatDate(cert.notAfter)} (${daysRemaining(cert.notAfter, now)}d remaining)`]);
  }
  if (cert.renewalTime) {
    rows.push(['Renews:', formatDate(cert.renewalTime)]);
  }
  cert.dnsNames.forEach((name, i) => rows.push([i === 0 ? 'DNS Names:' : '', name]));
  return rows;
}

const HostedClusterSection: React.FC<{snapshot: StatusSnapshot}> = ({snapshot}) => {
  if (snapshot.controlPlaneConditions.length === 0) {
    return (
      <Section title="HOSTED CLUSTER">
        <NotAvailable message="No HostedCluster conditions available" />
      </Section>
    );
  }
  return (
    <Section title="HOSTED CLUSTER">
      <Text bold>CONTROL PLANE VERSION</Text>
      <Box paddingLeft={2} marginBottom={1}>
        <Lines lines={formatTable(versionRows(snapshot.version))} />
      </Box>
      <Text bold>CONDITIONS</Text>
      <Box paddingLeft={2}>
        <ConditionTable conditions={snapshot.controlPlaneConditions} />
      </Box>
    </Section>
  );
};

const NodePoolSection: React.FC<{pool: WorkerPoolStatus}> = ({pool}) => (
  <Section title={nodePoolHeading(pool.name, pool.replicas, pool.version)}>
    <ConditionTable conditions={pool.conditions} />
  </Section>
);

export type StatusViewProps = {
  snapshot: StatusSnapshot;
  now?: Date;
};

/**
 * One-shot rendering of a cluster's status. Every part that could not be
 * determined is shown as explicitly unavailable rather than left out.
 */
export const StatusView: React.FC<StatusViewProps> = ({snapshot, now = new Date()}) => (
  <Box flexDirection="column">
    <Box flexDirection="column" marginBottom={1}>
      <Text>
        {chalk.bold('HCP Cluster Status:')} {snapshot.clusterName} ({snapshot.clusterId})
      </Text>
      {snapshot.clusterState ? <Text>Cluster State: {snapshot.clusterState}</Text> : null}
      {snapshot.managementCluster ? <Text>Management Cluster: {snapshot.managementCluster}</Text> : null}
    </Box>

    <Section title="MANIFEST WORKS (Service Cluster -> Management Cluster)">
      {snapshot.syncSummaries.length === 0
        ? <NotAvailable message="No ManifestWork resources found" />
        : <Lines lines={formatTable(syncRows(snapshot.syncSummaries, now))} />}
    </Section>

    <HostedClusterSection snapshot={snapshot} />

    {snapshot.apiServerCertificate !== null && (
      <Section title="CLUSTER KUBE API CERTIFICATE">
        <Text>Certificate resource found in ManifestWork</Text>
        <Text dimColor>(Detailed status not available - ACM feedback rules not yet implemented)</Text>
      </Section>
    )}

    <Section title="DEFAULT INGRESS CERTIFICATE">
      {snapshot.ingressCertificate
        ? <Lines lines={formatTable(certificateRows(snapshot.ingressCertificate, now))} />
        : <NotAvailable message="No certificate information available" />}
    </Section>

    {snapshot.workerPools.length === 0
      ? (
        <Section title="NODEPOOLS">
          <NotAvailable message="No NodePool resources found" />
        </Section>
      )
      : snapshot.workerPools.map((pool, i) => <NodePoolSection key={`${pool.name}-${i}`} pool={pool} />)}
  </Box>
);
