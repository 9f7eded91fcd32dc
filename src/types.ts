import type { HrxLimits } from './limits.js';
export type { HrxLimits } from './limits.js';

/** Contents of a file entry; `body` is absent when the file has no body section. */
export type HrxFileData = {
  type: 'file';
  body?: string;
};

/** A directory entry never carries a body. */
export type HrxDirectoryData = {
  type: 'directory';
};

/** Entry payload, tagged by `type`. */
export type HrxEntryData = HrxFileData | HrxDirectoryData;

/** A single archive entry with optional comment. */
export type HrxEntry = {
  comment?: string;
  data: HrxEntryData;
};

/** Location of the first text that contains the boundary. */
export type ContentViolation =
  | { location: 'root-comment' }
  | { location: 'entry-comment'; path: string }
  | { location: 'entry-data'; path: string };

/** Options for parsing HRX text. */
export type HrxParseOptions = {
  limits?: HrxLimits;
};

/** Severity level for audit issues. */
export type HrxIssueSeverity = 'info' | 'warning' | 'error';

/** A single audit issue. */
export type HrxIssue = {
  code: string;
  severity: HrxIssueSeverity;
  message: string;
  entryName?: string;
  details?: Record<string, string | number>;
};

/** Audit summary for an archive at its current boundary length. */
export type HrxAuditReport = {
  schemaVersion: string;
  ok: boolean;
  boundaryLength: number;
  summary: {
    entries: number;
    files: number;
    directories: number;
    warnings: number;
    errors: number;
  };
  issues: HrxIssue[];
};
