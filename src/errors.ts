import { HRX_REPORT_SCHEMA_VERSION } from './reportSchema.js';
import type { ContentViolation, HrxEntry } from './types.js';

/** Stable HRX error codes. */
export type HrxErrorCode =
  | 'HRX_NO_BOUNDARY'
  | 'HRX_BAD_HEADER'
  | 'HRX_TRUNCATED'
  | 'HRX_MISSING_BODY'
  | 'HRX_DIRECTORY_BODY'
  | 'HRX_MISPLACED_COMMENT'
  | 'HRX_DUPLICATE_ENTRY'
  | 'HRX_FILE_AS_DIRECTORY'
  | 'HRX_PATH_EMPTY_COMPONENT'
  | 'HRX_PATH_FORBIDDEN_CHARACTER'
  | 'HRX_PATH_RESERVED_COMPONENT'
  | 'HRX_BOUNDARY_IN_CONTENT'
  | 'HRX_INVALID_BOUNDARY_LENGTH'
  | 'HRX_LIMIT_EXCEEDED'
  | 'HRX_SINK_FAILED';

/** Both sides of a duplicate-path conflict. */
export type HrxDuplicate = {
  existing: HrxEntry;
  incoming: HrxEntry;
};

const BASE_CONTEXT_SHADOW_KEYS = new Set<string>([
  'schemaVersion',
  'name',
  'code',
  'message',
  'hint',
  'context'
]);

/** Error thrown for HRX parsing, validation, and write failures. */
export class HrxError extends Error {
  /** Machine-readable error code. */
  readonly code: HrxErrorCode;
  /** Path related to the error (raw text for path errors), if available. */
  readonly entryName?: string | undefined;
  /** Descendant path for `HRX_FILE_AS_DIRECTORY`. */
  readonly childName?: string | undefined;
  /** Character offset into the parsed text, if available. */
  readonly offset?: number | undefined;
  /** Conflicting entries for `HRX_DUPLICATE_ENTRY`. */
  readonly duplicate?: HrxDuplicate | undefined;
  /** Where the boundary was found for `HRX_BOUNDARY_IN_CONTENT`. */
  readonly violation?: ContentViolation | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create an HrxError with a stable code. */
  constructor(
    code: HrxErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      childName?: string | undefined;
      offset?: number | undefined;
      duplicate?: HrxDuplicate | undefined;
      violation?: ContentViolation | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'HrxError';
    this.code = code;
    this.entryName = options?.entryName;
    this.childName = options?.childName;
    this.offset = options?.offset;
    this.duplicate = options?.duplicate;
    this.violation = options?.violation;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: HrxErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    childName?: string;
    offset?: number;
    violation?: ContentViolation;
  } {
    const shadowed = new Set<string>(BASE_CONTEXT_SHADOW_KEYS);
    if (this.entryName !== undefined) shadowed.add('entryName');
    if (this.childName !== undefined) shadowed.add('childName');
    if (this.offset !== undefined) shadowed.add('offset');
    if (this.violation !== undefined) shadowed.add('violation');
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      if (!shadowed.has(key)) context[key] = value;
    }
    return {
      schemaVersion: HRX_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: hintFor(this.code, this.message),
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.childName !== undefined ? { childName: this.childName } : {}),
      ...(this.offset !== undefined ? { offset: this.offset } : {}),
      ...(this.violation !== undefined ? { violation: { ...this.violation } } : {})
    };
  }
}

function hintFor(code: HrxErrorCode, message: string): string {
  switch (code) {
    case 'HRX_BOUNDARY_IN_CONTENT':
      return 'Pick a different boundary length or remove the boundary from the reported text';
    case 'HRX_DUPLICATE_ENTRY':
    case 'HRX_FILE_AS_DIRECTORY':
      return 'Rename or remove one of the conflicting entries';
    case 'HRX_SINK_FAILED':
      return 'Discard the partial output and serialize again to a fresh sink';
    default:
      return message;
  }
}
