import type { CameraErrorKind } from './services/errors.js';

export interface Organization {
  id: string;
  name: string;
}

export interface Network {
  id: string;
  name: string;
  organizationId: string;
  // Product types enabled on the network, when the API reports them
  productTypes?: string[];
}

export interface Camera {
  id: string; // device serial
  name: string;
  serial: string;
  model: string;
  networkId: string;
  snapshotCapable: boolean;
}

interface ResultBase {
  organization: Organization;
  network: Network;
  camera: Camera;
}

export interface SuccessResult extends ResultBase {
  status: 'success';
  imageUrl: string;
  image: Buffer;
}

export interface UnavailableResult extends ResultBase {
  status: 'unavailable';
  reason: string;
}

export interface ErrorResult extends ResultBase {
  status: 'error';
  reason: string;
  errorKind: 'transient' | 'permanent';
  cameraErrorKind?: CameraErrorKind;
  // Set when the snapshot was generated but the image could not be retrieved
  imageUrl?: string;
}

export type SnapshotResult = SuccessResult | UnavailableResult | ErrorResult;

export interface NetworkReport {
  network: Network;
  results: SnapshotResult[];
  error?: string;
}

export interface OrganizationReport {
  organization: Organization;
  networks: NetworkReport[];
  error?: string;
}

export interface CollectionReport {
  generatedAt: Date;
  requestedTime?: Date;
  organizations: OrganizationReport[];
}

export interface ReportSummary {
  total: number;
  success: number;
  unavailable: number;
  error: number;
}

// Enumeration skeleton, used to keep empty organizations and networks in the report
export interface DiscoveredNetwork {
  network: Network;
  error?: string;
}

export interface DiscoveredOrganization {
  organization: Organization;
  networks: DiscoveredNetwork[];
  error?: string;
}

export interface SavedFile {
  result: SuccessResult;
  path: string;
  // Relative to the output directory, always with forward slashes
  relativePath: string;
}

export interface FileFailure {
  result: SuccessResult;
  path: string;
  reason: string;
}

export interface SaveOutcome {
  files: SavedFile[];
  failures: FileFailure[];
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
