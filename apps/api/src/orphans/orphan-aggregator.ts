import type {
  CategoryMapping,
  CategoryReport,
  ClassificationOutcome,
  DiskFile,
} from './orphans.types';

function emptyReport(category: string, root: string | null): CategoryReport {
  return {
    category,
    root,
    files: [],
    totalBytes: 0,
    counts: { tracked: 0, orphaned: 0, ignored: 0, excluded: 0 },
  };
}

/**
 * Group outcomes per category. Every category in `categories` gets a report,
 * even with nothing orphaned, so configured folders always show up.
 * File order follows the order outcomes arrive in.
 */
export function aggregateOutcomes(
  outcomes: Iterable<ClassificationOutcome>,
  categories?: CategoryMapping,
): Map<string, CategoryReport> {
  const reports = new Map<string, CategoryReport>();
  for (const [category, root] of categories ?? []) {
    reports.set(category, emptyReport(category, root));
  }

  for (const outcome of outcomes) {
    const { category } = outcome.file;
    let report = reports.get(category);
    if (!report) {
      report = emptyReport(category, null);
      reports.set(category, report);
    }
    report.counts[outcome.status] += 1;
    if (outcome.status === 'orphaned') {
      report.files.push(outcome.file);
      report.totalBytes += outcome.file.size;
    }
  }

  return reports;
}

export function sortFilesByPath(files: readonly DiskFile[]): DiskFile[] {
  return [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
