/**
 * Lookup Registries
 *
 * Read-only sets of known element ids, supported scale ids and domain tags.
 * Built once per run from reference data and passed explicitly into the
 * transform; nothing in the pipeline reads them from module state, so the
 * same registries can be shared across rows processed in parallel.
 */

import { SKA_DOMAINS, SUPPORTED_SCALES, type SkaDomain } from './constants.js';
import { normalizeSpace } from '../transformation/field-normalizer.js';
import type { RawText } from './types.js';

/**
 * Registries consumed by key validation
 */
export interface LookupRegistries {
  readonly elements: ReadonlySet<string>;
  readonly scales: ReadonlySet<string>;
  readonly domains: ReadonlySet<SkaDomain>;
}

/**
 * Registry construction input
 */
export interface LookupRegistriesInit {
  readonly elements: Iterable<string>;
  /** Defaults to IM and LV */
  readonly scales?: Iterable<string>;
  /** Defaults to SKILL, KNOWLEDGE and ABILITY */
  readonly domains?: Iterable<SkaDomain>;
}

/**
 * Set whose mutators throw, so registries stay read-only at runtime too
 */
class FrozenSet<T> extends Set<T> {
  private sealed = false;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
  }

  override add(value: T): this {
    if (this.sealed) {
      throw new TypeError('Lookup registry is read-only');
    }
    return super.add(value);
  }

  override delete(_value: T): boolean {
    throw new TypeError('Lookup registry is read-only');
  }

  override clear(): void {
    throw new TypeError('Lookup registry is read-only');
  }
}

/**
 * Build immutable lookup registries
 *
 * Ids get the same whitespace normalization as rating rows; empty ids are
 * ignored.
 */
export function createLookupRegistries(init: LookupRegistriesInit): LookupRegistries {
  const clean = (values: Iterable<string>): string[] =>
    Array.from(values, (v) => normalizeSpace(v)).filter((v) => v.length > 0);

  return Object.freeze({
    elements: new FrozenSet(clean(init.elements)),
    scales: new FrozenSet(clean(init.scales ?? SUPPORTED_SCALES)),
    domains: new FrozenSet<SkaDomain>(init.domains ?? SKA_DOMAINS),
  });
}

/**
 * Collect distinct, non-empty element ids from extracted rows
 *
 * Used to build the ElementSet from the content model reference, or from
 * the rating extracts themselves when no reference is available.
 */
export function collectElementIds(
  rows: Iterable<{ readonly element_id?: RawText }>
): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    const id = normalizeSpace(row.element_id);
    if (id) {
      seen.add(id);
    }
  }
  return [...seen];
}
