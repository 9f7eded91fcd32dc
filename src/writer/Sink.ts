import { Writable } from 'node:stream';

/** Synchronous destination for serialized text. */
export interface TextSink {
  write(chunk: string): void;
}

/** Collects serialized text in memory. */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];
  private lengthValue = 0;

  /** Characters written so far. */
  get length(): number {
    return this.lengthValue;
  }

  write(chunk: string): void {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.lengthValue += chunk.length;
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/** Byte destinations accepted by `serializeToWritable`. */
export type HrxWritable = WritableStream<Uint8Array> | Writable;

export function toWebWritable(stream: HrxWritable): WritableStream<Uint8Array> {
  if (!(stream instanceof Writable)) return stream;
  return Writable.toWeb(stream) as WritableStream<Uint8Array>;
}
