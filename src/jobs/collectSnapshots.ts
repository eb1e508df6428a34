import type { Server } from 'http';
import { collect } from '../services/collector.js';
import { loadConfig, type AppConfig } from '../services/config.js';
import { AuthError, EnumerationError, OutputDirectoryError, errorMessage } from '../services/errors.js';
import { MerakiClient, type SnapshotApi } from '../services/meraki.js';
import { formatSummary, summarize } from '../services/report.js';
import { save } from '../services/storage.js';
import { describeSnapshotTime, parseSnapshotTime, type SnapshotTime } from '../services/time.js';
import { render } from '../services/views.js';
import { startReportServer } from '../server.js';
import type { CollectionReport, Logger, SaveOutcome } from '../types.js';

export interface RunOptions {
  apiKey?: string;
  time?: string;
  outputDir?: string;
  outputHtml?: boolean;
  organization?: string;
  concurrency?: number;
  serve?: boolean;
  port?: number;
}

export interface RunDependencies {
  createApi?: (config: AppConfig & { apiKey: string }, logger: Logger) => SnapshotApi;
  startServer?: (outputDir: string, port: number, logger: Logger) => Promise<Server>;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface RunOutcome {
  exitCode: number;
  report?: CollectionReport;
  saved?: SaveOutcome;
  htmlPath?: string;
  server?: Server;
}

export const DEFAULT_REPORT_PORT = 8080;

function defaultApi(config: AppConfig & { apiKey: string }, logger: Logger): SnapshotApi {
  return new MerakiClient({ ...config, logger });
}

function step(logger: Logger, n: number, title: string): void {
  logger.log('');
  logger.log(`Step ${n}: ${title}`);
}

/**
 * One collection run. Resolves with exit code 0 whenever the run completes,
 * even if some cameras failed; 1 only for fatal conditions.
 */
export async function runSnapshotCollection(options: RunOptions, deps: RunDependencies = {}): Promise<RunOutcome> {
  const logger = deps.logger ?? console;

  let time: SnapshotTime | undefined;
  let config: AppConfig;
  try {
    time = options.time ? parseSnapshotTime(options.time) : undefined;
    config = loadConfig(
      { apiKey: options.apiKey, outputDir: options.outputDir, concurrency: options.concurrency },
      deps.env,
      deps.cwd,
    );
  } catch (error) {
    logger.error(`Error: ${errorMessage(error)}`);
    return { exitCode: 1 };
  }

  const { apiKey } = config;
  if (!apiKey) {
    logger.error('Error: missing Meraki dashboard API key. Pass --apikey or set MERAKI_DASHBOARD_API_KEY');
    return { exitCode: 1 };
  }

  logger.log('-- Start --');
  logger.log('Running with the following parameters:');
  logger.log(`Output directory: ${config.outputDir}`);
  logger.log(`Output HTML report: ${options.outputHtml ? 'yes' : 'no'}`);
  logger.log(`Date / Time: ${describeSnapshotTime(time)}`);
  if (options.organization) logger.log(`Organization: ${options.organization}`);

  step(logger, 1, 'Collect snapshots');
  const api = (deps.createApi ?? defaultApi)({ ...config, apiKey }, logger);
  let report: CollectionReport;
  try {
    report = await collect(api, {
      timestamp: time?.date,
      organization: options.organization,
      concurrency: config.concurrency,
      logger,
    });
  } catch (error) {
    if (error instanceof AuthError) {
      logger.error(`Failed to connect to Meraki: ${error.message}`);
    } else if (error instanceof EnumerationError) {
      logger.error(`Failed to enumerate cameras: ${error.message}`);
    } else {
      logger.error(`Collection failed: ${errorMessage(error)}`);
    }
    return { exitCode: 1 };
  }

  step(logger, 2, 'Save snapshots');
  let saved: SaveOutcome;
  try {
    saved = save(report, config.outputDir, logger);
  } catch (error) {
    if (error instanceof OutputDirectoryError) {
      logger.error(error.message);
      return { exitCode: 1, report };
    }
    throw error;
  }

  let htmlPath: string | undefined;
  if (options.outputHtml) {
    step(logger, 3, 'Render web report');
    try {
      htmlPath = render(report, saved.files, config.outputDir);
      logger.log(`Report: saved to ${htmlPath}`);
    } catch (error) {
      logger.error(`Report: could not write the HTML report: ${errorMessage(error)}`);
    }
  }

  const summary = summarize(report);
  logger.log('');
  logger.log(`Summary: ${formatSummary(summary)}`);
  if (saved.failures.length > 0) {
    logger.warn(`Summary: ${saved.failures.length} snapshot(s) could not be written`);
  }

  let server: Server | undefined;
  if (options.serve && htmlPath) {
    try {
      server = await (deps.startServer ?? startReportServer)(
        config.outputDir,
        options.port ?? DEFAULT_REPORT_PORT,
        logger,
      );
    } catch (error) {
      logger.error(`Server: could not start: ${errorMessage(error)}`);
    }
  } else if (options.serve) {
    logger.warn('Server: --serve needs --outputhtml, not starting');
  }

  return { exitCode: 0, report, saved, htmlPath, server };
}
