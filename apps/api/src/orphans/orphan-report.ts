import type { OrphanScanResult } from './orphans.types';

const SIZE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

export function humanSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024 || unit === 'TiB') {
      return `${Math.round(value).toLocaleString('en-US')} ${unit}`;
    }
    value /= 1024;
  }
  return `${bytes} B`;
}

/**
 * Plain-text report for the CLI: one block per category that has orphans,
 * then any diagnostics collected during the run.
 */
export function renderOrphanReport(result: OrphanScanResult): string {
  const lines: string[] = [];
  const withOrphans = result.reports
    .filter((r) => r.files.length > 0)
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));

  if (!withOrphans.length) {
    lines.push('No orphaned files found.');
  }

  for (const report of withOrphans) {
    lines.push('', `===== ${report.category} =====`);
    for (const file of report.files) {
      lines.push(`${file.path}    (${humanSize(file.size)})`);
    }
    lines.push(`Total: ${report.files.length} file(s), ${humanSize(report.totalBytes)}`);
  }

  if (result.diagnostics.length) {
    lines.push('', '===== Diagnostics =====');
    for (const d of result.diagnostics) {
      lines.push(`[${d.kind}] ${d.message}`);
    }
  }

  return lines.join('\n');
}
