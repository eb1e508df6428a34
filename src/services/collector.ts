import pLimit from 'p-limit';
import type {
  Camera,
  CollectionReport,
  DiscoveredOrganization,
  Logger,
  Network,
  Organization,
  SnapshotResult,
} from '../types.js';
import {
  AuthError,
  EnumerationError,
  PermanentCameraError,
  TransientApiError,
  errorMessage,
} from './errors.js';
import type { SnapshotApi } from './meraki.js';
import { aggregate, cameraLabel } from './report.js';

export interface CollectOptions {
  timestamp?: Date;
  // Organization id or name; all organizations when unset
  organization?: string;
  concurrency?: number;
  logger?: Logger;
}

interface CameraTask {
  organization: Organization;
  network: Network;
  camera: Camera;
}

function selectOrganizations(organizations: Organization[], wanted: string | undefined): Organization[] {
  if (!wanted) return organizations;
  const needle = wanted.trim().toLowerCase();
  const match = organizations.find((o) => o.id === wanted.trim() || o.name.toLowerCase() === needle);
  if (!match) {
    const available = organizations.map((o) => o.name).join(', ') || 'none';
    throw new EnumerationError(`Organization "${wanted}" not found. Available: ${available}`);
  }
  return [match];
}

async function listOrganizations(api: SnapshotApi): Promise<Organization[]> {
  try {
    return await api.listOrganizations();
  } catch (error) {
    if (error instanceof AuthError) throw error;
    throw new EnumerationError(`Failed to list organizations: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Walk organizations, networks and cameras. Failures below the organization
 * list are recorded on the branch they happened in; only authentication
 * failures abort.
 */
async function discover(
  api: SnapshotApi,
  organizations: Organization[],
  logger: Logger,
): Promise<{ skeleton: DiscoveredOrganization[]; tasks: CameraTask[] }> {
  const skeleton: DiscoveredOrganization[] = [];
  const tasks: CameraTask[] = [];
  const seen = new Set<string>();

  for (const organization of organizations) {
    const entry: DiscoveredOrganization = { organization, networks: [] };
    skeleton.push(entry);

    let networks: Network[];
    try {
      networks = await api.listNetworks(organization);
    } catch (error) {
      if (error instanceof AuthError) throw error;
      entry.error = `Failed to list networks: ${errorMessage(error)}`;
      logger.error(`Collector: ${organization.name}: ${entry.error}`);
      continue;
    }

    for (const network of networks) {
      if (network.productTypes && !network.productTypes.includes('camera')) {
        entry.networks.push({ network });
        continue;
      }
      let cameras: Camera[];
      try {
        cameras = await api.listCameras(network);
      } catch (error) {
        if (error instanceof AuthError) throw error;
        const message = `Failed to list cameras: ${errorMessage(error)}`;
        entry.networks.push({ network, error: message });
        logger.error(`Collector: ${organization.name} / ${network.name}: ${message}`);
        continue;
      }
      entry.networks.push({ network });
      for (const camera of cameras) {
        if (seen.has(camera.serial)) continue;
        seen.add(camera.serial);
        tasks.push({ organization, network, camera });
      }
    }
  }

  return { skeleton, tasks };
}

export async function snapshotCamera(
  api: SnapshotApi,
  task: CameraTask,
  timestamp: Date | undefined,
): Promise<SnapshotResult> {
  const { camera } = task;
  if (!camera.snapshotCapable) {
    return {
      ...task,
      status: 'unavailable',
      reason: `Model ${camera.model || 'unknown'} does not support snapshots`,
    };
  }

  let imageUrl: string | undefined;
  try {
    imageUrl = await api.requestSnapshot(camera, timestamp);
    const image = await api.fetchImage(imageUrl);
    return { ...task, status: 'success', imageUrl, image };
  } catch (error) {
    if (error instanceof AuthError) throw error;
    if (error instanceof PermanentCameraError) {
      return {
        ...task,
        status: 'error',
        errorKind: 'permanent',
        cameraErrorKind: error.cameraErrorKind,
        reason: error.message,
        ...(imageUrl ? { imageUrl } : {}),
      };
    }
    return {
      ...task,
      status: 'error',
      errorKind: error instanceof TransientApiError ? 'transient' : 'permanent',
      reason: errorMessage(error),
      ...(imageUrl ? { imageUrl } : {}),
    };
  }
}

function describeOutcome(result: SnapshotResult): string {
  switch (result.status) {
    case 'success':
      return 'ok';
    case 'unavailable':
      return `unavailable (${result.reason})`;
    case 'error':
      return `failed (${result.reason})`;
  }
}

/**
 * Collect one snapshot per discovered camera. Camera failures become
 * `error` results; the returned report covers every camera exactly once.
 */
export async function collect(api: SnapshotApi, options: CollectOptions = {}): Promise<CollectionReport> {
  const logger = options.logger ?? console;
  const organizations = selectOrganizations(await listOrganizations(api), options.organization);
  logger.log(`Collector: found ${organizations.length} organization(s)`);

  const { skeleton, tasks } = await discover(api, organizations, logger);
  logger.log(`Collector: found ${tasks.length} camera(s), requesting snapshots`);

  const limit = pLimit(Math.max(1, options.concurrency ?? 4));
  let done = 0;
  const results = await Promise.all(
    tasks.map((task) =>
      limit(async () => {
        const result = await snapshotCamera(api, task, options.timestamp);
        done += 1;
        const line = `Collector: [${done}/${tasks.length}] ${cameraLabel(task.camera)}: ${describeOutcome(result)}`;
        if (result.status === 'error') {
          logger.warn(line);
        } else {
          logger.log(line);
        }
        return result;
      }),
    ),
  );

  return aggregate(results, skeleton, { requestedTime: options.timestamp });
}
