import { HrxError } from './errors.js';

const BOUNDARY_PATTERN = /(?:^|\n)<(=+)>/;

/** Widest boundary an archive may use. */
export const MAX_BOUNDARY_LENGTH = 1024 * 1024;

/** Build the boundary marker of the given width, e.g. `<===>` for 3. */
export function boundaryMarker(width: number): string {
  assertBoundaryLength(width);
  return `<${'='.repeat(width)}>`;
}

/** Width of the first boundary at the start of the text or after a newline, if any. */
export function findBoundaryLength(text: string): number | undefined {
  const match = BOUNDARY_PATTERN.exec(text);
  return match?.[1]?.length;
}

/** Width of the first boundary; throws HRX_NO_BOUNDARY when the text has none. */
export function discoverBoundaryLength(text: string): number {
  const width = findBoundaryLength(text);
  if (width === undefined) {
    throw new HrxError('HRX_NO_BOUNDARY', 'No boundary marker found in input');
  }
  return width;
}

/** Throws HRX_INVALID_BOUNDARY_LENGTH unless `length` is an integer in 1..MAX_BOUNDARY_LENGTH. */
export function assertBoundaryLength(length: number): void {
  if (Number.isInteger(length) && length >= 1 && length <= MAX_BOUNDARY_LENGTH) return;
  throw new HrxError(
    'HRX_INVALID_BOUNDARY_LENGTH',
    `Boundary length must be an integer from 1 to ${MAX_BOUNDARY_LENGTH}, got ${length}`,
    { context: { boundaryLength: String(length), max: String(MAX_BOUNDARY_LENGTH) } }
  );
}
