import fs from 'fs';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { SnapshotApi } from '../src/services/meraki.js';
import type { Camera, Logger, Network, Organization } from '../src/types.js';

export function quietLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function org(id: string, name = id): Organization {
  return { id, name };
}

export function network(id: string, organizationId: string, name = id, productTypes?: string[]): Network {
  return productTypes ? { id, name, organizationId, productTypes } : { id, name, organizationId };
}

export function camera(serial: string, networkId: string, name = serial, model = 'MV12W'): Camera {
  return { id: serial, serial, name, model, networkId, snapshotCapable: /^MV/.test(model) };
}

export interface FakeNetwork {
  network: Network;
  cameras: Camera[] | Error;
}

export interface FakeOrganization {
  organization: Organization;
  networks: FakeNetwork[] | Error;
}

export function imageUrlFor(serial: string): string {
  return `https://images.example.test/${serial}.jpg`;
}

/** In-memory Dashboard API with per-camera failure injection. */
export class FakeSnapshotApi implements SnapshotApi {
  readonly snapshotCalls: Array<{ serial: string; timestamp?: Date }> = [];
  readonly listCamerasCalls: string[] = [];
  readonly fetchCalls: string[] = [];
  readonly snapshotFailures = new Map<string, Error>();
  readonly fetchFailures = new Map<string, Error>();

  constructor(private readonly organizations: FakeOrganization[] | Error) {}

  async listOrganizations(): Promise<Organization[]> {
    if (this.organizations instanceof Error) throw this.organizations;
    return this.organizations.map((o) => o.organization);
  }

  async listNetworks(organization: Organization): Promise<Network[]> {
    const entry = this.orgEntry(organization.id);
    if (entry.networks instanceof Error) throw entry.networks;
    return entry.networks.map((n) => n.network);
  }

  async listCameras(target: Network): Promise<Camera[]> {
    this.listCamerasCalls.push(target.id);
    const entry = this.orgEntry(target.organizationId);
    const networks = entry.networks instanceof Error ? [] : entry.networks;
    const found = networks.find((n) => n.network.id === target.id);
    if (!found) throw new Error(`unknown network ${target.id}`);
    if (found.cameras instanceof Error) throw found.cameras;
    return found.cameras;
  }

  async requestSnapshot(target: Camera, timestamp?: Date): Promise<string> {
    this.snapshotCalls.push(timestamp ? { serial: target.serial, timestamp } : { serial: target.serial });
    const failure = this.snapshotFailures.get(target.serial);
    if (failure) throw failure;
    return imageUrlFor(target.serial);
  }

  async fetchImage(url: string): Promise<Buffer> {
    this.fetchCalls.push(url);
    const failure = this.fetchFailures.get(url);
    if (failure) throw failure;
    return Buffer.from(`jpeg:${url}`);
  }

  private orgEntry(id: string): FakeOrganization {
    if (this.organizations instanceof Error) throw this.organizations;
    const entry = this.organizations.find((o) => o.organization.id === id);
    if (!entry) throw new Error(`unknown organization ${id}`);
    return entry;
  }
}
