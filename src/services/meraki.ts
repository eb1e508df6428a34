import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import type { Camera, Logger, Network, Organization } from '../types.js';
import { DEFAULT_BASE_URL } from './config.js';
import {
  ApiRequestError,
  AuthError,
  PermanentCameraError,
  TransientApiError,
  errorMessage,
  type CameraErrorKind,
} from './errors.js';

/** The calls the collector needs from the Dashboard API. */
export interface SnapshotApi {
  listOrganizations(): Promise<Organization[]>;
  listNetworks(organization: Organization): Promise<Network[]>;
  listCameras(network: Network): Promise<Camera[]>;
  /** Ask the camera for a snapshot; resolves with the URL the image will be published at. */
  requestSnapshot(camera: Camera, timestamp?: Date): Promise<string>;
  fetchImage(url: string): Promise<Buffer>;
}

export interface MerakiClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  imagePollAttempts?: number;
  imagePollIntervalMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const USER_AGENT = 'CameraSnapshotCollector/1.0';

const OrganizationSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const NetworkSchema = z.object({
  id: z.string(),
  name: z.string(),
  organizationId: z.string(),
  productTypes: z.array(z.string()).optional(),
});

const DeviceSchema = z.object({
  serial: z.string(),
  name: z.string().nullish(),
  model: z.string().nullish(),
  networkId: z.string().nullish(),
  productType: z.string().nullish(),
});

const SnapshotSchema = z.object({
  url: z.string().url(),
  expiry: z.string().optional(),
});

const ErrorBodySchema = z.object({
  errors: z.array(z.string()).min(1),
});

type Device = z.infer<typeof DeviceSchema>;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Extract the `rel=next` target from an RFC 8288 Link header. */
export function nextLink(header: string | null, base: string): string | undefined {
  if (!header) return undefined;
  for (const match of header.matchAll(/<([^>]*)>\s*;\s*rel="?([^",;]+)"?/gi)) {
    if (match[2].toLowerCase() === 'next') {
      return new URL(match[1], base).toString();
    }
  }
  return undefined;
}

export function classifyCameraError(status: number, detail: string): CameraErrorKind {
  if (/offline|not online|unreachable|not connected/i.test(detail)) return 'offline';
  if (/footage|recording|retention|no video|not available|outside/i.test(detail)) return 'no-footage';
  if (/not supported|unsupported|does not support/i.test(detail)) return 'unsupported';
  if (status === 404) return 'not-found';
  return 'rejected';
}

export function isCameraDevice(device: Pick<Device, 'model' | 'productType'>): boolean {
  return device.productType === 'camera' || /^MV/i.test(device.model ?? '');
}

// Snapshot generation is an MV feature; other camera product lines are listed but skipped
export function supportsSnapshots(model: string): boolean {
  return /^MV/i.test(model);
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

export class MerakiClient implements SnapshotApi {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly imagePollAttempts: number;
  private readonly imagePollIntervalMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: MerakiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.imagePollAttempts = Math.max(1, options.imagePollAttempts ?? 10);
    this.imagePollIntervalMs = options.imagePollIntervalMs ?? 3_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? console;
  }

  async listOrganizations(): Promise<Organization[]> {
    return this.getAll('/organizations', OrganizationSchema);
  }

  async listNetworks(organization: Organization): Promise<Network[]> {
    const networks = await this.getAll(
      `/organizations/${encodeURIComponent(organization.id)}/networks?perPage=1000`,
      NetworkSchema,
    );
    return networks.map((n) => ({
      id: n.id,
      name: n.name,
      organizationId: n.organizationId,
      productTypes: n.productTypes,
    }));
  }

  async listCameras(network: Network): Promise<Camera[]> {
    const devices = await this.getAll(`/networks/${encodeURIComponent(network.id)}/devices`, DeviceSchema);
    return devices.filter(isCameraDevice).map((device) => {
      const model = device.model ?? '';
      return {
        id: device.serial,
        serial: device.serial,
        name: device.name ?? '',
        model,
        networkId: device.networkId ?? network.id,
        snapshotCapable: supportsSnapshots(model),
      };
    });
  }

  async requestSnapshot(camera: Camera, timestamp?: Date): Promise<string> {
    const path = `/devices/${encodeURIComponent(camera.serial)}/camera/generateSnapshot`;
    const body = timestamp ? { timestamp: timestamp.toISOString() } : {};
    const response = await this.send(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      const error = await this.failure(response, `Snapshot request for ${camera.serial}`);
      if (error instanceof ApiRequestError) {
        throw new PermanentCameraError(
          error.message,
          classifyCameraError(error.status, error.detail),
          error.status,
          { cause: error },
        );
      }
      throw error;
    }
    const snapshot = await this.parseBody(response, SnapshotSchema, `Snapshot request for ${camera.serial}`);
    return snapshot.url;
  }

  /**
   * Download a generated snapshot. The URL answers 403/404 until the camera
   * has uploaded the image, so those are polled rather than treated as errors.
   */
  async fetchImage(url: string): Promise<Buffer> {
    for (let poll = 1; ; poll++) {
      // Pre-signed URL: the API key must not be sent along
      const response = await this.send(url, { method: 'GET' });
      if (response.ok) {
        return Buffer.from(await response.arrayBuffer());
      }
      if (response.status !== 403 && response.status !== 404) {
        const detail = await readErrorDetail(response);
        throw new ApiRequestError(
          `Snapshot download failed with HTTP ${response.status}: ${detail}`,
          response.status,
          detail,
        );
      }
      await response.body?.cancel();
      if (poll >= this.imagePollAttempts) {
        throw new TransientApiError(`Snapshot image was not ready after ${poll} attempt(s)`);
      }
      await sleep(this.imagePollIntervalMs);
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };
  }

  private async getAll<T>(path: string, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const items: T[] = [];
    let url: string | undefined = `${this.baseUrl}${path}`;
    while (url) {
      const response = await this.send(url, { method: 'GET', headers: this.headers() });
      if (!response.ok) {
        throw await this.failure(response, `GET ${pathOf(url)}`);
      }
      items.push(...(await this.parseBody(response, z.array(itemSchema), `GET ${pathOf(url)}`)));
      url = nextLink(response.headers.get('link'), url);
    }
    return items;
  }

  /** Issue one call, retrying rate limits, server errors and network failures. */
  private async send(url: string, init: RequestInit): Promise<Response> {
    const what = `${init.method ?? 'GET'} ${pathOf(url)}`;
    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (error) {
        if (attempt > this.maxRetries) {
          throw new TransientApiError(`${what} failed after ${attempt} attempt(s): ${errorMessage(error)}`, {
            cause: error,
          });
        }
        const wait = this.backoff(attempt);
        this.logger.warn(`Meraki: ${what} failed (${errorMessage(error)}), retrying in ${wait}ms`);
        await sleep(wait);
        continue;
      }

      if (response.status !== 429 && response.status < 500) {
        return response;
      }
      await response.body?.cancel();
      if (attempt > this.maxRetries) {
        const reason = response.status === 429 ? 'rate limited' : `HTTP ${response.status}`;
        throw new TransientApiError(`${what} ${reason} after ${attempt} attempt(s)`);
      }
      const wait = this.backoff(attempt, response.headers.get('retry-after'));
      this.logger.warn(`Meraki: ${what} returned HTTP ${response.status}, retrying in ${wait}ms`);
      await sleep(wait);
    }
  }

  private backoff(attempt: number, retryAfter?: string | null): number {
    const seconds = retryAfter ? Number(retryAfter) : Number.NaN;
    const wait = Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : this.baseDelayMs * 2 ** (attempt - 1);
    return Math.min(wait, this.maxDelayMs);
  }

  private async failure(response: Response, what: string): Promise<Error> {
    const detail = await readErrorDetail(response);
    if (response.status === 401) {
      return new AuthError(`Meraki rejected the API key: ${detail}`);
    }
    return new ApiRequestError(`${what} failed with HTTP ${response.status}: ${detail}`, response.status, detail);
  }

  private async parseBody<T>(
    response: Response,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    what: string,
  ): Promise<T> {
    const result = schema.safeParse(parseJson(await response.text()));
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ApiRequestError(
        `${what} returned an unexpected body${where}: ${issue?.message ?? 'invalid'}`,
        response.status,
      );
    }
    return result.data;
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text();
  const body = ErrorBodySchema.safeParse(parseJson(text));
  if (body.success) {
    return body.data.errors.join('; ');
  }
  return text.trim().slice(0, 200) || response.statusText || `HTTP ${response.status}`;
}
