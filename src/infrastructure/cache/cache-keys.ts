import { CACHE_CONSTANTS } from './cache.constants';
import { Filters, formatFilterValue } from '../../common/utils/filters';
import { InvalidArgumentError } from '../../common/errors/ledger.errors';

type CanonicalFilter = [name: string, value: string];

/**
 * Sorted name/value pairs, with "no filter" values dropped.
 */
function canonicalize(filters: Filters): CanonicalFilter[] {
  const entries: CanonicalFilter[] = [];
  for (const name of Object.keys(filters).sort()) {
    const value = formatFilterValue(filters[name]);
    if (value !== undefined) {
      entries.push([name, value]);
    }
  }
  return entries;
}

/**
 * Builds the cache keys of one resource and remembers every list key that
 * has been written to the cache, so that a mutation can invalidate all of
 * them. A remembered key is dropped once its entry has expired.
 *
 * - one entity: `<resource>_<id>`
 * - unfiltered list: `<resource>_all`
 * - filtered list: `<resource>_<name>=<value>&...` (names sorted)
 *
 * A filter whose value equals the resource default is left out of the
 * signature, so `{ view: 'all' }` and `{}` share a key when `all` is the
 * default view.
 */
export class ResourceCacheKeys {
  // list key -> expiry of its cached entry (epoch ms)
  private readonly collections = new Map<string, number>();
  private readonly defaults: ReadonlyMap<string, string>;

  constructor(
    readonly resource: string,
    defaults: Filters = {},
  ) {
    if (resource.trim() === '') {
      throw new InvalidArgumentError('resource must be a non-empty string');
    }
    this.defaults = new Map(canonicalize(defaults));
  }

  private compose(suffix: string): string {
    return `${this.resource}${CACHE_CONSTANTS.RESOURCE_SEPARATOR}${suffix}`;
  }

  get all(): string {
    return this.compose(CACHE_CONSTANTS.ALL_SUFFIX);
  }

  entity(id: string | number): string {
    const raw = String(id).trim();
    if (raw === '' || raw === CACHE_CONSTANTS.ALL_SUFFIX) {
      throw new InvalidArgumentError(`"${id}" is not a valid ${this.resource} id`);
    }
    return this.compose(encodeURIComponent(raw));
  }

  collection(filters: Filters = {}): string {
    const signature = canonicalize(filters)
      .filter(([name, value]) => this.defaults.get(name) !== value)
      .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`)
      .join('&');

    return signature === '' ? this.all : this.compose(signature);
  }

  /**
   * True when `defaults` fold out of keys exactly as this builder's do.
   */
  hasDefaults(defaults: Filters): boolean {
    const other = canonicalize(defaults);
    return (
      other.length === this.defaults.size &&
      other.every(([name, value]) => this.defaults.get(name) === value)
    );
  }

  /**
   * Records that list `key` now holds a cached entry until `expiresAt`.
   */
  track(key: string, expiresAt: number): void {
    this.prune();
    this.collections.set(key, expiresAt);
  }

  private prune(): void {
    const now = Date.now();
    for (const [key, expiresAt] of this.collections) {
      if (expiresAt <= now) {
        this.collections.delete(key);
      }
    }
  }

  /**
   * Every key a mutation of this resource can make stale: the entity key
   * (when `id` is given), the unfiltered list and each list key cached
   * since it was last invalidated.
   */
  invalidation(id?: string | number): string[] {
    this.prune();
    const keys = id === undefined ? [] : [this.entity(id)];
    keys.push(this.all);
    for (const key of this.collections.keys()) {
      if (key !== this.all) {
        keys.push(key);
      }
    }
    return keys;
  }

  /**
   * Stops tracking removed list keys. The next cached read of such a list
   * tracks its key again.
   */
  forget(keys: Iterable<string>): void {
    for (const key of keys) {
      this.collections.delete(key);
    }
  }

  registeredCollections(): string[] {
    this.prune();
    return [...this.collections.keys()];
  }
}
