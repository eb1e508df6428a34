#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { runSnapshotCollection } from './jobs/collectSnapshots.js';
import { errorMessage } from './services/errors.js';
import { ACCEPTED_TIME_FORMATS } from './services/time.js';

function positiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || String(n) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

interface CliOptions {
  apikey?: string;
  time?: string;
  outputdir?: string;
  outputhtml: boolean;
  org?: string;
  concurrency?: number;
  serve: boolean;
  port: number;
}

const program = new Command();

program
  .name('snapshot-collector')
  .description(
    'Run bulk collection of snapshots from Meraki MV cameras.\n\n' +
      'If a date & time is not given, snapshots are collected for the current date & time.',
  )
  // -h belongs to --outputhtml
  .helpOption('--help', 'display help for command')
  .option('-k, --apikey <key>', 'Meraki dashboard API key (env: MERAKI_DASHBOARD_API_KEY)')
  .option('-t, --time <time>', `date & time to collect snapshots for (${ACCEPTED_TIME_FORMATS.join(' | ')})`)
  .option('-o, --outputdir <dir>', 'output directory (default: "snapshots")')
  .option('-h, --outputhtml', 'output HTML report', false)
  .option('--org <organization>', 'only collect from this organization (id or name)')
  .option('-c, --concurrency <n>', 'snapshot requests in flight at once', positiveInt)
  .option('--serve', 'serve the HTML report after the run', false)
  .option('--port <port>', 'port for --serve', positiveInt, 8080)
  .action(async (opts: CliOptions) => {
    const outcome = await runSnapshotCollection({
      apiKey: opts.apikey,
      time: opts.time,
      outputDir: opts.outputdir,
      outputHtml: opts.outputhtml,
      organization: opts.org,
      concurrency: opts.concurrency,
      serve: opts.serve,
      port: opts.port,
    });
    process.exitCode = outcome.exitCode;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exitCode = 1;
});
