import { HrxError } from './errors.js';

const RESERVED_COMPONENTS = new Set(['.', '..']);

/**
 * Verified-valid path to an archive entry.
 *
 * Paths are `/`-separated components. Each component is non-empty, is neither
 * `.` nor `..`, and holds only characters above U+001F other than `/`, `\` and `:`.
 * Instances are only created by {@link HrxPath.parse}.
 */
export class HrxPath {
  private constructor(private readonly value: string) {}

  /** Validate `raw` and wrap it; throws HrxError with the raw text as `entryName`. */
  static parse(raw: string): HrxPath {
    const components = raw.split('/');
    for (const component of components) {
      if (component.length === 0) {
        throw new HrxError('HRX_PATH_EMPTY_COMPONENT', `Path "${raw}" has an empty component`, {
          entryName: raw
        });
      }
      const forbidden = findForbiddenCharacter(component);
      if (forbidden !== undefined) {
        throw new HrxError('HRX_PATH_FORBIDDEN_CHARACTER', `Path "${raw}" contains a forbidden character`, {
          entryName: raw,
          context: { codePoint: `U+${forbidden.toString(16).toUpperCase().padStart(4, '0')}` }
        });
      }
      if (RESERVED_COMPONENTS.has(component)) {
        throw new HrxError('HRX_PATH_RESERVED_COMPONENT', `Path "${raw}" contains "${component}"`, {
          entryName: raw,
          context: { component }
        });
      }
    }
    return new HrxPath(raw);
  }

  get components(): string[] {
    return this.value.split('/');
  }

  /** Last component. */
  get name(): string {
    const index = this.value.lastIndexOf('/');
    return index === -1 ? this.value : this.value.slice(index + 1);
  }

  parent(): HrxPath | undefined {
    const index = this.value.lastIndexOf('/');
    return index === -1 ? undefined : new HrxPath(this.value.slice(0, index));
  }

  /** Strict ancestors, nearest to the root first. */
  ancestors(): HrxPath[] {
    const out: HrxPath[] = [];
    let index = this.value.indexOf('/');
    while (index !== -1) {
      out.push(new HrxPath(this.value.slice(0, index)));
      index = this.value.indexOf('/', index + 1);
    }
    return out;
  }

  isAncestorOf(other: HrxPath | string): boolean {
    return other.toString().startsWith(`${this.value}/`);
  }

  equals(other: HrxPath | string): boolean {
    return this.value === other.toString();
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** Validate and construct an {@link HrxPath}. */
export function parsePath(raw: string): HrxPath {
  return HrxPath.parse(raw);
}

function findForbiddenCharacter(component: string): number | undefined {
  for (const ch of component) {
    const codePoint = ch.codePointAt(0);
    if (codePoint === undefined) continue;
    if (codePoint <= 0x1f || ch === '/' || ch === '\\' || ch === ':') return codePoint;
  }
  return undefined;
}
