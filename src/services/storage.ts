import fs from 'fs';
import path from 'path';
import type { CollectionReport, FileFailure, Logger, SaveOutcome, SavedFile, SuccessResult } from '../types.js';
import { OutputDirectoryError, errorMessage } from './errors.js';
import { reportResults } from './report.js';

export function sanitizeSegment(name: string, fallback: string): string {
  const cleaned = name.trim().replace(/[^a-zA-Z0-9._-]/g, '_').replace(/^\.+/, '_');
  return cleaned || fallback;
}

/**
 * Relative paths for every successful result, in report order. Names that
 * collide (case-insensitively) inside a directory get the serial appended,
 * then a counter; the first camera keeps the plain name.
 */
export function planSnapshotPaths(results: readonly SuccessResult[]): string[] {
  const used = new Set<string>();
  return results.map((result) => {
    const dir = path.posix.join(
      sanitizeSegment(result.organization.name, sanitizeSegment(result.organization.id, 'organization')),
      sanitizeSegment(result.network.name, sanitizeSegment(result.network.id, 'network')),
    );
    const serial = sanitizeSegment(result.camera.serial, 'camera');
    const base = sanitizeSegment(result.camera.name, serial);

    let candidate = path.posix.join(dir, `${base}.jpg`);
    if (used.has(candidate.toLowerCase())) {
      candidate = path.posix.join(dir, `${base}_${serial}.jpg`);
    }
    for (let n = 2; used.has(candidate.toLowerCase()); n++) {
      candidate = path.posix.join(dir, `${base}_${serial}-${n}.jpg`);
    }
    used.add(candidate.toLowerCase());
    return candidate;
  });
}

function ensureOutputDir(outputDir: string): void {
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.accessSync(outputDir, fs.constants.W_OK);
  } catch (error) {
    throw new OutputDirectoryError(`Cannot use output directory ${outputDir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Write every successful snapshot below `outputDir`. A failed write is
 * reported in `failures` and does not stop the others.
 */
export function save(report: CollectionReport, outputDir: string, logger: Logger = console): SaveOutcome {
  ensureOutputDir(outputDir);

  const successes = reportResults(report).filter((r): r is SuccessResult => r.status === 'success');
  const relativePaths = planSnapshotPaths(successes);
  const files: SavedFile[] = [];
  const failures: FileFailure[] = [];

  successes.forEach((result, i) => {
    const relativePath = relativePaths[i];
    const filePath = path.join(outputDir, ...relativePath.split('/'));
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, result.image);
      files.push({ result, path: filePath, relativePath });
    } catch (error) {
      const reason = errorMessage(error);
      failures.push({ result, path: filePath, reason });
      logger.error(`Storage: could not write ${filePath}: ${reason}`);
    }
  });

  logger.log(`Storage: saved ${files.length} snapshot(s) to ${outputDir}`);
  return { files, failures };
}
