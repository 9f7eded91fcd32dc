import { assertContentValid, type HrxContent } from '../archive/content.js';
import { boundaryMarker } from '../boundary.js';
import { HrxError } from '../errors.js';
import { toWebWritable, type HrxWritable, type TextSink } from './Sink.js';

const TEXT_ENCODER = new TextEncoder();

/** Anything serializable: archive texts plus the boundary length to write them with. */
export type SerializableHrx = HrxContent & {
  readonly boundaryLength: number;
};

/**
 * Write `archive` to `sink`.
 *
 * Content is validated before the first write; a boundary found in a comment or
 * body throws HRX_BOUNDARY_IN_CONTENT and leaves the sink untouched. A throwing
 * sink surfaces as HRX_SINK_FAILED and may leave a partial prefix behind.
 */
export function serializeArchive(archive: SerializableHrx, sink: TextSink): void {
  assertContentValid(archive, archive.boundaryLength);
  let written = 0;
  for (const chunk of emitChunks(archive, archive.boundaryLength)) {
    try {
      sink.write(chunk);
    } catch (err) {
      throw sinkError(err, written);
    }
    written += chunk.length;
  }
}

/**
 * Write `archive` as UTF-8 to a web or Node writable stream, then close it.
 *
 * If a write fails, or the archive's entries throw while being read, the stream
 * is aborted with that error before it is rethrown.
 */
export async function serializeToWritable(archive: SerializableHrx, writable: HrxWritable): Promise<void> {
  assertContentValid(archive, archive.boundaryLength);
  const writer = toWebWritable(writable).getWriter();
  let written = 0;
  try {
    for (const chunk of emitChunks(archive, archive.boundaryLength)) {
      await writer.write(TEXT_ENCODER.encode(chunk)).catch((err: unknown) => {
        throw sinkError(err, written);
      });
      written += chunk.length;
    }
    await writer.close().catch((err: unknown) => {
      throw sinkError(err, written);
    });
  } catch (err) {
    // Already-errored streams reject abort; the first error is the one rethrown.
    await writer.abort(err).catch(() => {});
    throw err;
  } finally {
    writer.releaseLock();
  }
}

/**
 * Header lines end in a newline. A comment or body is followed by a newline only
 * when another block comes after it, so the last text in the archive runs to the
 * end of the output.
 *
 * @internal
 */
function* emitChunks(archive: HrxContent, width: number): Generator<string> {
  let separate = false;
  for (const [header, text] of emitBlocks(archive, boundaryMarker(width))) {
    if (separate) yield '\n';
    yield header;
    if (text !== undefined && text.length > 0) yield text;
    separate = text !== undefined;
  }
}

function* emitBlocks(archive: HrxContent, marker: string): Generator<[string, string | undefined]> {
  for (const [path, entry] of archive.entries) {
    if (entry.comment !== undefined) yield [`${marker}\n`, entry.comment];
    if (entry.data.type === 'directory') {
      yield [`${marker} ${path}/\n`, undefined];
    } else {
      yield [`${marker} ${path}\n`, entry.data.body];
    }
  }
  if (archive.comment !== undefined) yield [`${marker}\n`, archive.comment];
}

function sinkError(err: unknown, written: number): HrxError {
  if (err instanceof HrxError && err.code === 'HRX_SINK_FAILED') return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new HrxError('HRX_SINK_FAILED', `Failed to write archive: ${reason}`, {
    cause: err,
    context: { charactersWritten: String(written) }
  });
}
