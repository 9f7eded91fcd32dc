import { assertBoundaryLength } from '../boundary.js';
import { parseHrx } from '../reader/parse.js';
import type { HrxAuditReport, HrxParseOptions } from '../types.js';
import { StringSink, type HrxWritable, type TextSink } from '../writer/Sink.js';
import { serializeArchive, serializeToWritable } from '../writer/serialize.js';
import { auditArchive } from './audit.js';
import { assertContentValid } from './content.js';
import { HrxEntryMap } from './entries.js';

/**
 * A Human-Readable Archive: an optional comment plus insertion-ordered entries,
 * all separated by a boundary of `boundaryLength` `=` characters.
 *
 * No comment or body may contain a newline followed by the boundary (or start
 * with it). Comments and entries are plain mutable data, so the rule is checked
 * on demand: when parsing, when changing the boundary length, in
 * {@link HrxArchive.validateContent}, and before serializing.
 *
 * @example
 * ```ts
 * const archive = HrxArchive.parse('<===> input.scss\nul { margin: 0 }\n');
 * archive.boundaryLength; // 3
 * archive.toString(); // '<===> input.scss\nul { margin: 0 }\n'
 * ```
 */
export class HrxArchive {
  /** Archive-level comment, written after all entries. */
  comment: string | undefined;
  /** Entries in serialization order. */
  readonly entries: HrxEntryMap;
  private boundaryLengthValue: number;

  /** Create an empty archive; throws HRX_INVALID_BOUNDARY_LENGTH outside 1..MAX_BOUNDARY_LENGTH. */
  constructor(boundaryLength: number) {
    assertBoundaryLength(boundaryLength);
    this.boundaryLengthValue = boundaryLength;
    this.comment = undefined;
    this.entries = new HrxEntryMap();
  }

  /** Parse HRX text, discovering its boundary from the first marker. */
  static parse(text: string, options?: HrxParseOptions): HrxArchive {
    const parsed = parseHrx(text, options);
    const archive = new HrxArchive(parsed.boundaryLength);
    archive.comment = parsed.comment;
    for (const [path, entry] of parsed.entries) archive.entries.set(path, entry);
    return archive;
  }

  /** Number of `=` characters in the boundary. */
  get boundaryLength(): number {
    return this.boundaryLengthValue;
  }

  /**
   * Switch to a new boundary length.
   *
   * Throws HRX_BOUNDARY_IN_CONTENT naming the first text that contains the new
   * boundary; the archive is left unchanged in that case.
   */
  setBoundaryLength(length: number): void {
    assertBoundaryLength(length);
    assertContentValid(this, length);
    this.boundaryLengthValue = length;
  }

  /**
   * Check every comment and body against the current boundary.
   *
   * Stricter than a plain substring search for newline + marker: a text that
   * starts with the marker is rejected as well, since it would follow a header
   * line and read back as a new block.
   */
  validateContent(): void {
    assertContentValid(this, this.boundaryLengthValue);
  }

  /** Serialize into `sink`; see {@link serializeArchive}. */
  serialize(sink: TextSink): void {
    serializeArchive(this, sink);
  }

  /** Serialize as UTF-8 into a web or Node writable stream. */
  async writeTo(writable: HrxWritable): Promise<void> {
    await serializeToWritable(this, writable);
  }

  /** Report every content problem at the current boundary length. */
  audit(): HrxAuditReport {
    return auditArchive(this);
  }

  /** Serialized HRX text; throws like {@link HrxArchive.serialize}. */
  toString(): string {
    const sink = new StringSink();
    this.serialize(sink);
    return sink.toString();
  }
}

/** Parse HRX text into an {@link HrxArchive}. */
export function parseArchive(text: string, options?: HrxParseOptions): HrxArchive {
  return HrxArchive.parse(text, options);
}
