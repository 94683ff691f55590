export type FilterValue = string | number | boolean | Date | null | undefined;

export type Filters = Readonly<Record<string, FilterValue>>;

/**
 * Renders a filter value the way it goes on the wire.
 * Returns undefined for values that mean "no filter".
 */
export function formatFilterValue(value: FilterValue): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isFilterValue(value: unknown): value is FilterValue {
  return (
    value === undefined ||
    value === null ||
    value instanceof Date ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/** Calendar dates are sent as `YYYY-MM-DD` */
export const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
