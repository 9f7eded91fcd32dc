import { HrxError } from './errors.js';

/** Resource ceilings applied while parsing. */
export type HrxLimits = {
  /** Maximum input length in UTF-16 code units. */
  maxInputLength?: number;
  /** Maximum number of entries in one archive. */
  maxEntries?: number;
  /** Maximum discovered boundary width. */
  maxBoundaryLength?: number;
};

export const DEFAULT_LIMITS = Object.freeze({
  maxInputLength: 256 * 1024 * 1024,
  maxEntries: 100_000,
  maxBoundaryLength: 1024
} satisfies Required<HrxLimits>);

export function resolveLimits(limits?: HrxLimits): Required<HrxLimits> {
  return {
    maxInputLength: limits?.maxInputLength ?? DEFAULT_LIMITS.maxInputLength,
    maxEntries: limits?.maxEntries ?? DEFAULT_LIMITS.maxEntries,
    maxBoundaryLength: limits?.maxBoundaryLength ?? DEFAULT_LIMITS.maxBoundaryLength
  };
}

export function enforceLimit(limit: keyof HrxLimits, value: number, max: number): void {
  if (value <= max) return;
  throw new HrxError('HRX_LIMIT_EXCEEDED', `${limit} exceeded (${value} > ${max})`, {
    context: { limit, value: String(value), max: String(max) }
  });
}
