/**
 * Injection token of the fetch implementation used for API calls
 */
export const FETCH = Symbol('FETCH');

export type FetchFn = typeof fetch;

export const JSON_MEDIA_TYPE = 'application/json';
