export { HrxArchive, parseArchive } from './archive/HrxArchive.js';
export { HrxEntryMap, directoryEntry, fileEntry } from './archive/entries.js';
export { findContentViolation, listContentViolations } from './archive/content.js';
export type { HrxContent } from './archive/content.js';
export { auditArchive, findSafeBoundaryLength } from './archive/audit.js';
export { HrxPath, parsePath } from './path.js';
export { MAX_BOUNDARY_LENGTH, boundaryMarker, discoverBoundaryLength, findBoundaryLength } from './boundary.js';
export { parseHrx, parseWithBoundary } from './reader/parse.js';
export type { ParsedHrx } from './reader/parse.js';
export { serializeArchive, serializeToWritable } from './writer/serialize.js';
export type { SerializableHrx } from './writer/serialize.js';
export { StringSink } from './writer/Sink.js';
export type { HrxWritable, TextSink } from './writer/Sink.js';
export { HrxError } from './errors.js';
export type { HrxDuplicate, HrxErrorCode } from './errors.js';
export { DEFAULT_LIMITS } from './limits.js';
export { HRX_REPORT_SCHEMA_VERSION } from './reportSchema.js';
export type {
  ContentViolation,
  HrxAuditReport,
  HrxDirectoryData,
  HrxEntry,
  HrxEntryData,
  HrxFileData,
  HrxIssue,
  HrxIssueSeverity,
  HrxLimits,
  HrxParseOptions
} from './types.js';
