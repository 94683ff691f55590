/**
 * Cache system constants
 */
export const CACHE_CONSTANTS = {
  /**
   * Separator between the namespace and a key in the backend
   */
  KEY_SEPARATOR: ':',

  /**
   * Separator between a resource name and the rest of its key
   */
  RESOURCE_SEPARATOR: '_',

  /**
   * Suffix of the unfiltered list key: "<resource>_all"
   */
  ALL_SUFFIX: 'all',

  /**
   * Namespace used when none is configured
   */
  DEFAULT_NAMESPACE: 'ledger',

  /**
   * Default TTL in seconds (5 minutes)
   */
  DEFAULT_TTL: 300,
} as const;
