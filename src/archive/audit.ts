import { MAX_BOUNDARY_LENGTH, boundaryMarker } from '../boundary.js';
import { HRX_REPORT_SCHEMA_VERSION } from '../reportSchema.js';
import type { HrxPath } from '../path.js';
import type { HrxAuditReport, HrxEntry, HrxIssue } from '../types.js';
import type { SerializableHrx } from '../writer/serialize.js';
import { describeViolation, listContentViolations, type HrxContent } from './content.js';

const MARKER_PATTERN = /(?:^|\n)<(=+)>/g;

/** Audit an archive at its current boundary length without throwing. */
export function auditArchive(archive: SerializableHrx): HrxAuditReport {
  const width = archive.boundaryLength;
  const issues: HrxIssue[] = [];
  let files = 0;
  let directories = 0;
  let last: [HrxPath, HrxEntry] | undefined;

  for (const pair of archive.entries) {
    if (pair[1].data.type === 'file') files += 1;
    else directories += 1;
    last = pair;
  }

  for (const violation of listContentViolations(archive, width)) {
    issues.push({
      code: 'HRX_BOUNDARY_IN_CONTENT',
      severity: 'error',
      message: describeViolation(violation, width),
      ...(violation.location === 'root-comment' ? {} : { entryName: violation.path }),
      details: { location: violation.location, boundaryLength: width }
    });
  }

  const safe = issues.length > 0 ? findSafeBoundaryLength(archive, width) : undefined;
  if (safe !== undefined && safe <= MAX_BOUNDARY_LENGTH) {
    issues.push({
      code: 'HRX_SAFE_BOUNDARY_LENGTH',
      severity: 'info',
      message: `Boundary ${boundaryMarker(safe)} does not occur in any comment or body`,
      details: { boundaryLength: safe }
    });
  }

  if (files + directories === 0 && archive.comment === undefined) {
    issues.push({
      code: 'HRX_EMPTY_ARCHIVE',
      severity: 'warning',
      message: 'Archive has no entries and no comment; its serialized form is empty and cannot be parsed back'
    });
  }

  const trailing = last?.[1].data;
  if (last && archive.comment === undefined && trailing?.type === 'file' && trailing.body === '') {
    issues.push({
      code: 'HRX_TRAILING_EMPTY_BODY',
      severity: 'warning',
      message: `Empty body of "${last[0]}" ends the archive and reads back as no body`,
      entryName: last[0].toString()
    });
  }

  const summary = {
    entries: files + directories,
    files,
    directories,
    warnings: issues.filter((issue) => issue.severity === 'warning').length,
    errors: issues.filter((issue) => issue.severity === 'error').length
  };
  return {
    schemaVersion: HRX_REPORT_SCHEMA_VERSION,
    ok: summary.errors === 0,
    boundaryLength: width,
    summary,
    issues
  };
}

/** Smallest boundary length >= `min` that no comment or body collides with. */
export function findSafeBoundaryLength(archive: HrxContent, min = 1): number {
  const taken = new Set<number>();
  const collect = (text: string | undefined): void => {
    if (text === undefined) return;
    for (const match of text.matchAll(MARKER_PATTERN)) {
      const run = match[1];
      if (run !== undefined) taken.add(run.length);
    }
  };

  collect(archive.comment);
  for (const [, entry] of archive.entries) {
    collect(entry.comment);
    if (entry.data.type === 'file') collect(entry.data.body);
  }

  let width = Math.max(1, Math.floor(min));
  while (taken.has(width)) width += 1;
  return width;
}
