import { format } from 'date-fns';
import fs from 'fs';
import path from 'path';
import type { CollectionReport, NetworkReport, SavedFile, SnapshotResult } from '../types.js';
import { cameraLabel, summarize } from './report.js';

// Local time, as the run banner prints it
const REPORT_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export const REPORT_FILE_NAME = 'index.html';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function statusBadge(result: SnapshotResult, saved: boolean): string {
  if (result.status === 'success' && saved) return `<span class="badge badge-ok">Saved</span>`;
  if (result.status === 'success') return `<span class="badge badge-err">Not saved</span>`;
  if (result.status === 'unavailable') return `<span class="badge badge-muted">Unavailable</span>`;
  return `<span class="badge badge-err">Error</span>`;
}

function failureReason(result: SnapshotResult): string {
  if (result.status === 'success') return 'Image could not be written to disk';
  return result.reason;
}

function snapshotFigure(file: SavedFile): string {
  const label = escapeHtml(cameraLabel(file.result.camera));
  const src = escapeHtml(file.relativePath);
  return `<figure class="snapshot">
        <a href="${src}"><img src="${src}" alt="${label}" loading="lazy"></a>
        <figcaption>${label} ${statusBadge(file.result, true)}</figcaption>
      </figure>`;
}

function missingEntry(result: SnapshotResult): string {
  return `<li>${escapeHtml(cameraLabel(result.camera))} ${statusBadge(result, false)}
        <span class="detail">${escapeHtml(failureReason(result))}</span></li>`;
}

function networkSection(network: NetworkReport, savedBy: Map<SnapshotResult, SavedFile>): string {
  const figures: string[] = [];
  const missing: string[] = [];
  for (const result of network.results) {
    const file = savedBy.get(result);
    if (file) {
      figures.push(snapshotFigure(file));
    } else {
      missing.push(missingEntry(result));
    }
  }

  let body = '';
  if (network.error) {
    body = `<p class="error">${escapeHtml(network.error)}</p>`;
  } else if (network.results.length === 0) {
    body = `<p class="empty">No cameras</p>`;
  }

  return `<section class="network">
    <h3>${escapeHtml(network.network.name)}</h3>
    ${body}
    ${figures.length ? `<div class="grid">
      ${figures.join('\n      ')}
    </div>` : ''}
    ${missing.length ? `<ul class="missing">
      ${missing.join('\n      ')}
    </ul>` : ''}
  </section>`;
}

/**
 * Build the HTML index. Images are referenced by the relative paths in
 * `files`; results without a saved file are listed without an image.
 */
export function renderReport(report: CollectionReport, files: readonly SavedFile[]): string {
  const savedBy = new Map(files.map((f): [SnapshotResult, SavedFile] => [f.result, f]));
  const summary = summarize(report);
  const when = report.requestedTime ? format(report.requestedTime, REPORT_TIME_FORMAT) : 'Now';

  const organizations = report.organizations.map((org) => `
  <section class="organization">
    <h2>${escapeHtml(org.organization.name)}</h2>
    ${org.error ? `<p class="error">${escapeHtml(org.error)}</p>` : ''}
    ${org.networks.length === 0 && !org.error ? `<p class="empty">No networks</p>` : ''}
    ${org.networks.map((n) => networkSection(n, savedBy)).join('\n')}
  </section>`).join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Camera Snapshots</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0 2rem 2rem; }
    .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(320px, 1fr)); gap: 1rem; }
    .snapshot img { width: 100%; border-radius: 4px; }
    .badge { font-size: .75rem; padding: .1rem .4rem; border-radius: 3px; }
    .badge-ok { background: #d4f5dd; } .badge-err { background: #fbd5d5; } .badge-muted { background: #e5e5e5; }
    .error { color: #b00020; } .empty, .detail { color: #666; }
  </style>
</head>
<body>
  <header>
    <h1>Camera Snapshots</h1>
    <p>Snapshot time: ${escapeHtml(when)} &middot; Generated ${escapeHtml(format(report.generatedAt, REPORT_TIME_FORMAT))}</p>
    <p class="summary">${summary.success} succeeded, ${summary.unavailable} unavailable, ${summary.error} failed</p>
  </header>
  <main>${organizations}
  </main>
</body>
</html>
`;
}

/** Write the index next to the saved images and return its path. */
export function render(report: CollectionReport, files: readonly SavedFile[], outputDir: string): string {
  const filePath = path.join(outputDir, REPORT_FILE_NAME);
  fs.writeFileSync(filePath, renderReport(report, files), 'utf8');
  return filePath;
}
