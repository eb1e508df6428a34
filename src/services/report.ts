import type {
  Camera,
  CollectionReport,
  DiscoveredOrganization,
  NetworkReport,
  OrganizationReport,
  ReportSummary,
  SnapshotResult,
} from '../types.js';

/**
 * Group results by organization, then network. Order is first appearance,
 * with the discovery skeleton (when given) taking precedence so empty
 * organizations and networks still show up. No result is dropped.
 */
export function aggregate(
  results: readonly SnapshotResult[],
  discovery: readonly DiscoveredOrganization[] = [],
  meta: { generatedAt?: Date; requestedTime?: Date } = {},
): CollectionReport {
  const organizations: OrganizationReport[] = [];
  const orgIndex = new Map<string, OrganizationReport>();
  const networkIndex = new Map<string, NetworkReport>();

  const orgFor = (entry: Pick<OrganizationReport, 'organization' | 'error'>): OrganizationReport => {
    let report = orgIndex.get(entry.organization.id);
    if (!report) {
      report = { organization: entry.organization, networks: [] };
      if (entry.error) report.error = entry.error;
      orgIndex.set(entry.organization.id, report);
      organizations.push(report);
    }
    return report;
  };

  const networkFor = (org: OrganizationReport, entry: Pick<NetworkReport, 'network' | 'error'>): NetworkReport => {
    const key = `${org.organization.id}\u0000${entry.network.id}`;
    let report = networkIndex.get(key);
    if (!report) {
      report = { network: entry.network, results: [] };
      if (entry.error) report.error = entry.error;
      networkIndex.set(key, report);
      org.networks.push(report);
    }
    return report;
  };

  for (const discovered of discovery) {
    const org = orgFor(discovered);
    for (const network of discovered.networks) {
      networkFor(org, network);
    }
  }

  for (const result of results) {
    const org = orgFor({ organization: result.organization });
    networkFor(org, { network: result.network }).results.push(result);
  }

  const report: CollectionReport = {
    generatedAt: meta.generatedAt ?? new Date(),
    organizations,
  };
  if (meta.requestedTime) report.requestedTime = meta.requestedTime;
  return report;
}

export function cameraLabel(camera: Camera): string {
  return camera.name ? `${camera.name} / ${camera.serial}` : camera.serial;
}

export function reportResults(report: CollectionReport): SnapshotResult[] {
  return report.organizations.flatMap((org) => org.networks.flatMap((network) => network.results));
}

export function summarize(report: CollectionReport): ReportSummary {
  const summary: ReportSummary = { total: 0, success: 0, unavailable: 0, error: 0 };
  for (const result of reportResults(report)) {
    summary.total += 1;
    summary[result.status] += 1;
  }
  return summary;
}

export function formatSummary(summary: ReportSummary): string {
  return `${summary.total} camera(s): ${summary.success} succeeded, ${summary.unavailable} unavailable, ${summary.error} failed`;
}
