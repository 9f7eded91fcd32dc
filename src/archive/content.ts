import { boundaryMarker } from '../boundary.js';
import { HrxError } from '../errors.js';
import type { HrxPath } from '../path.js';
import type { ContentViolation, HrxEntry } from '../types.js';

/** The texts of an archive that must stay free of the boundary. */
export type HrxContent = {
  readonly comment: string | undefined;
  readonly entries: Iterable<[HrxPath, HrxEntry]>;
};

/**
 * First comment or body (root comment, then each entry's comment and body in
 * order) that would collide with the boundary of `width`.
 *
 * A text collides when it contains a newline followed by the marker, or starts
 * with the marker.
 */
export function findContentViolation(content: HrxContent, width: number): ContentViolation | undefined {
  for (const violation of iterViolations(content, width)) return violation;
  return undefined;
}

/** Every colliding text, in the same order as {@link findContentViolation}. */
export function listContentViolations(content: HrxContent, width: number): ContentViolation[] {
  return [...iterViolations(content, width)];
}

/** Throw HRX_BOUNDARY_IN_CONTENT for the first colliding text. */
export function assertContentValid(content: HrxContent, width: number): void {
  const violation = findContentViolation(content, width);
  if (!violation) return;
  throw new HrxError('HRX_BOUNDARY_IN_CONTENT', describeViolation(violation, width), {
    ...(violation.location === 'root-comment' ? {} : { entryName: violation.path }),
    violation,
    context: { boundaryLength: String(width) }
  });
}

export function describeViolation(violation: ContentViolation, width: number): string {
  const marker = boundaryMarker(width);
  switch (violation.location) {
    case 'root-comment':
      return `Archive comment contains the boundary ${marker}`;
    case 'entry-comment':
      return `Comment of "${violation.path}" contains the boundary ${marker}`;
    case 'entry-data':
      return `Body of "${violation.path}" contains the boundary ${marker}`;
  }
}

function* iterViolations(content: HrxContent, width: number): Generator<ContentViolation> {
  const marker = boundaryMarker(width);
  const delimiter = `\n${marker}`;
  const collides = (text: string | undefined): boolean =>
    text !== undefined && (text.startsWith(marker) || text.includes(delimiter));

  if (collides(content.comment)) yield { location: 'root-comment' };
  for (const [path, entry] of content.entries) {
    if (collides(entry.comment)) yield { location: 'entry-comment', path: path.toString() };
    if (entry.data.type === 'file' && collides(entry.data.body)) {
      yield { location: 'entry-data', path: path.toString() };
    }
  }
}
