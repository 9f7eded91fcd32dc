import { HrxEntryMap, directoryEntry, fileEntry } from '../archive/entries.js';
import { boundaryMarker, discoverBoundaryLength } from '../boundary.js';
import { HrxError, type HrxErrorCode } from '../errors.js';
import { enforceLimit, resolveLimits } from '../limits.js';
import { HrxPath } from '../path.js';
import type { HrxEntry, HrxParseOptions } from '../types.js';

/** Result of parsing HRX text. */
export type ParsedHrx = {
  boundaryLength: number;
  comment: string | undefined;
  entries: HrxEntryMap;
};

type CommentBlock = {
  kind: 'comment';
  offset: number;
  body: string;
};

type EntryBlock = {
  kind: 'entry';
  offset: number;
  rawPath: string;
  isDirectory: boolean;
  body: string | undefined;
};

type Block = CommentBlock | EntryBlock;

/** Discover the boundary width of `text` and parse it. */
export function parseHrx(text: string, options?: HrxParseOptions): ParsedHrx {
  const limits = resolveLimits(options?.limits);
  enforceLimit('maxInputLength', text.length, limits.maxInputLength);
  const width = discoverBoundaryLength(text);
  enforceLimit('maxBoundaryLength', width, limits.maxBoundaryLength);
  return parseWithBoundary(text, width, options);
}

/**
 * Parse `text` whose boundary width is already known.
 *
 * Either the whole archive is returned or an HrxError is thrown; nothing partial
 * escapes.
 */
export function parseWithBoundary(text: string, width: number, options?: HrxParseOptions): ParsedHrx {
  const limits = resolveLimits(options?.limits);
  const marker = boundaryMarker(width);
  if (!text.startsWith(marker)) {
    throw grammarError('HRX_BAD_HEADER', `Archive must start with the boundary ${marker}`, text, 0);
  }

  const scanner = new BlockScanner(text, marker);
  const builder = new EntryBuilder(text);
  let pending: CommentBlock | undefined;

  while (!scanner.done) {
    const block = scanner.next();
    if (block.kind === 'comment') {
      if (pending) {
        throw grammarError('HRX_MISPLACED_COMMENT', 'A comment must be followed by an entry or end the archive', text, block.offset);
      }
      pending = block;
      continue;
    }
    enforceLimit('maxEntries', builder.entries.size + 1, limits.maxEntries);
    builder.add(block, pending?.body);
    pending = undefined;
  }

  return { boundaryLength: width, comment: pending?.body, entries: builder.entries };
}

/** @internal */
class BlockScanner {
  private position = 0;
  private readonly delimiter: string;

  constructor(
    private readonly text: string,
    private readonly marker: string
  ) {
    this.delimiter = `\n${marker}`;
  }

  get done(): boolean {
    return this.position >= this.text.length;
  }

  /** Read the block starting at the current position, which holds a marker. */
  next(): Block {
    const { text, marker } = this;
    const offset = this.position;
    const lineEnd = text.indexOf('\n', offset + marker.length);
    if (lineEnd === -1) {
      throw grammarError('HRX_TRUNCATED', 'Boundary line is not terminated by a newline', text, text.length);
    }
    const header = text.slice(offset + marker.length, lineEnd);
    const bodyStart = lineEnd + 1;
    const body = this.readBody(bodyStart);

    if (header.length === 0) {
      if (body !== undefined) return { kind: 'comment', offset, body };
      // A bare marker line at the very end is an empty comment.
      if (bodyStart >= text.length) return { kind: 'comment', offset, body: '' };
      throw grammarError('HRX_MISSING_BODY', 'Comment has no body', text, offset);
    }

    if (!header.startsWith(' ')) {
      throw grammarError('HRX_BAD_HEADER', `Expected a space and a path after ${marker}`, text, offset + marker.length);
    }
    const path = header.slice(1);
    const isDirectory = path.endsWith('/');
    const rawPath = isDirectory ? path.slice(0, -1) : path;
    if (isDirectory && body !== undefined) {
      throw grammarError('HRX_DIRECTORY_BODY', `Directory "${rawPath}" cannot have a body`, text, bodyStart, rawPath);
    }
    return { kind: 'entry', offset, rawPath, isDirectory, body };
  }

  /**
   * A body runs to the newline before the next marker, or to the end of input.
   * Nothing after the header line at all means there is no body.
   */
  private readBody(start: number): string | undefined {
    const { text } = this;
    if (start >= text.length || text.startsWith(this.marker, start)) {
      this.position = start;
      return undefined;
    }
    const end = text.indexOf(this.delimiter, start);
    if (end === -1) {
      this.position = text.length;
      return text.slice(start);
    }
    this.position = end + 1;
    return text.slice(start, end);
  }
}

/** @internal */
class EntryBuilder {
  readonly entries = new HrxEntryMap();
  /** Paths that have at least one descendant entry. */
  private readonly parents = new Set<string>();

  constructor(private readonly text: string) {}

  add(block: EntryBlock, comment: string | undefined): void {
    const path = this.parsePath(block);
    const entry: HrxEntry = block.isDirectory ? directoryEntry(comment) : fileEntry(block.body, comment);

    const existing = this.entries.get(path);
    if (existing) {
      throw new HrxError('HRX_DUPLICATE_ENTRY', `Duplicate entry "${path}"`, {
        entryName: path.toString(),
        offset: block.offset,
        duplicate: { existing, incoming: entry },
        context: {
          ...positionContext(this.text, block.offset),
          existingType: existing.data.type,
          incomingType: entry.data.type
        }
      });
    }

    const ancestors = path.ancestors();
    for (const ancestor of ancestors) {
      if (this.entries.get(ancestor)?.data.type === 'file') {
        throw this.fileAsDirectory(ancestor, path, block.offset);
      }
    }
    if (entry.data.type === 'file' && this.parents.has(path.toString())) {
      const child = [...this.entries.keys()].find((candidate) => path.isAncestorOf(candidate));
      if (child) throw this.fileAsDirectory(path, child, block.offset);
    }

    this.entries.set(path, entry);
    for (const ancestor of ancestors) this.parents.add(ancestor.toString());
  }

  private parsePath(block: EntryBlock): HrxPath {
    try {
      return HrxPath.parse(block.rawPath);
    } catch (err) {
      if (!(err instanceof HrxError)) throw err;
      throw new HrxError(err.code, err.message, {
        entryName: block.rawPath,
        offset: block.offset,
        context: { ...err.context, ...positionContext(this.text, block.offset) },
        cause: err
      });
    }
  }

  private fileAsDirectory(file: HrxPath, child: HrxPath, offset: number): HrxError {
    return new HrxError('HRX_FILE_AS_DIRECTORY', `File "${file}" is used as the parent of "${child}"`, {
      entryName: file.toString(),
      childName: child.toString(),
      offset,
      context: positionContext(this.text, offset)
    });
  }
}

function grammarError(
  code: HrxErrorCode,
  message: string,
  text: string,
  offset: number,
  entryName?: string
): HrxError {
  return new HrxError(code, message, {
    entryName,
    offset,
    context: positionContext(text, offset)
  });
}

/** 1-based line and column of `offset`. */
function positionContext(text: string, offset: number): Record<string, string> {
  let line = 1;
  let lineStart = 0;
  let index = text.indexOf('\n');
  while (index !== -1 && index < offset) {
    line += 1;
    lineStart = index + 1;
    index = text.indexOf('\n', lineStart);
  }
  return { line: String(line), column: String(offset - lineStart + 1) };
}
