import fs from 'fs';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Server } from 'http';
import { runSnapshotCollection, type RunDependencies } from '../src/jobs/collectSnapshots.js';
import { AuthError, PermanentCameraError } from '../src/services/errors.js';
import { FakeSnapshotApi, camera, network, org, quietLogger, tempDir } from './helpers.js';

let server: Server | undefined;

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
  }
});

function siteApi(): FakeSnapshotApi {
  return new FakeSnapshotApi([
    {
      organization: org('101', 'O'),
      networks: [
        {
          network: network('N_1', '101', 'N'),
          cameras: [camera('Q2-1', 'N_1', 'C1'), camera('Q2-2', 'N_1', 'C2'), camera('Q2-3', 'N_1', 'C3')],
        },
      ],
    },
  ]);
}

function deps(api: FakeSnapshotApi, overrides: Pick<RunDependencies, 'env'> = {}) {
  const createApi = vi.fn(() => api);
  const logger = quietLogger();
  return { createApi, logger, env: {}, cwd: tempDir('job-cwd'), ...overrides };
}

describe('runSnapshotCollection', () => {
  it('exits 0 and writes what it could when one camera fails', async () => {
    const api = siteApi();
    api.snapshotFailures.set('Q2-2', new PermanentCameraError('Camera is offline', 'offline', 400));
    const outputDir = tempDir('job-out');
    const d = deps(api);

    const outcome = await runSnapshotCollection({ apiKey: 'test-key', outputDir, outputHtml: true }, d);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.saved?.files.map((f) => f.relativePath)).toEqual(['O/N/C1.jpg', 'O/N/C3.jpg']);
    expect(fs.existsSync(path.join(outputDir, 'O', 'N', 'C2.jpg'))).toBe(false);
    expect(outcome.htmlPath).toBe(path.join(outputDir, 'index.html'));
    expect(d.logger.log).toHaveBeenCalledWith('Summary: 3 camera(s): 2 succeeded, 0 unavailable, 1 failed');
  });

  it('uses the API key from the environment', async () => {
    const d = deps(siteApi(), { env: { MERAKI_DASHBOARD_API_KEY: 'env-key' } });

    const outcome = await runSnapshotCollection({ outputDir: tempDir('job-out') }, d);

    expect(outcome.exitCode).toBe(0);
    expect(d.createApi).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'env-key' }), d.logger);
  });

  it('fails without an API key', async () => {
    const d = deps(siteApi());

    const outcome = await runSnapshotCollection({ outputDir: tempDir('job-out') }, d);

    expect(outcome.exitCode).toBe(1);
    expect(d.createApi).not.toHaveBeenCalled();
    expect(d.logger.error).toHaveBeenCalledWith(
      'Error: missing Meraki dashboard API key. Pass --apikey or set MERAKI_DASHBOARD_API_KEY',
    );
  });

  it('fails on an unparseable time before contacting the API', async () => {
    const d = deps(siteApi());

    const outcome = await runSnapshotCollection({ apiKey: 'test-key', time: 'last tuesday' }, d);

    expect(outcome.exitCode).toBe(1);
    expect(d.createApi).not.toHaveBeenCalled();
  });

  it('sends the parsed time with every snapshot request', async () => {
    const api = siteApi();

    await runSnapshotCollection(
      { apiKey: 'test-key', time: '2024-03-05 10:00:00', outputDir: tempDir('job-out') },
      deps(api),
    );

    expect(api.snapshotCalls.map((c) => c.timestamp)).toEqual([
      new Date(2024, 2, 5, 10, 0, 0),
      new Date(2024, 2, 5, 10, 0, 0),
      new Date(2024, 2, 5, 10, 0, 0),
    ]);
  });

  it('fails when the key is rejected', async () => {
    const d = deps(new FakeSnapshotApi(new AuthError('Meraki rejected the API key: Invalid API key')));

    const outcome = await runSnapshotCollection({ apiKey: 'test-key', outputDir: tempDir('job-out') }, d);

    expect(outcome.exitCode).toBe(1);
    expect(d.logger.error).toHaveBeenCalledWith(
      'Failed to connect to Meraki: Meraki rejected the API key: Invalid API key',
    );
  });

  it('fails when the key is revoked during the run', async () => {
    const api = siteApi();
    api.snapshotFailures.set('Q2-2', new AuthError('Meraki rejected the API key: Invalid API key'));
    const d = deps(api);

    const outcome = await runSnapshotCollection({ apiKey: 'test-key', outputDir: tempDir('job-out') }, d);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.report).toBeUndefined();
    expect(d.logger.error).toHaveBeenCalledWith(
      'Failed to connect to Meraki: Meraki rejected the API key: Invalid API key',
    );
  });

  it('fails when the output directory cannot be created', async () => {
    const blocker = path.join(tempDir('job-out'), 'file.txt');
    fs.writeFileSync(blocker, 'x');

    const outcome = await runSnapshotCollection(
      { apiKey: 'test-key', outputDir: path.join(blocker, 'snapshots') },
      deps(siteApi()),
    );

    expect(outcome.exitCode).toBe(1);
    expect(outcome.report).toBeDefined();
  });

  it('serves the report only when it was rendered', async () => {
    const withoutHtml = deps(siteApi());
    const plain = await runSnapshotCollection(
      { apiKey: 'test-key', outputDir: tempDir('job-out'), serve: true, port: 0 },
      withoutHtml,
    );
    expect(plain.server).toBeUndefined();
    expect(withoutHtml.logger.warn).toHaveBeenCalledWith('Server: --serve needs --outputhtml, not starting');

    const served = await runSnapshotCollection(
      { apiKey: 'test-key', outputDir: tempDir('job-out'), outputHtml: true, serve: true, port: 0 },
      deps(siteApi()),
    );
    server = served.server;
    expect(served.server?.listening).toBe(true);
  });
});
