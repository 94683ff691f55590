export const PRODUCTION_API_URL = 'https://api.freeagent.com';
export const SANDBOX_API_URL = 'https://api.sandbox.freeagent.com';

export interface ApiConfig {
  baseUrl: string;
  accessToken: string;
  userAgent: string;
}

export interface CacheConfig {
  enabled: boolean;
  namespace: string;
  /** Default TTL in seconds */
  ttl: number;
  redisUrl?: string;
}

export interface LedgerConfig {
  nodeEnv: string;
  api: ApiConfig;
  cache: CacheConfig;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

function resolveBaseUrl(): string {
  const explicit = process.env.LEDGER_API_URL;
  if (explicit && explicit.trim() !== '') {
    return explicit.trim();
  }
  return parseFlag(process.env.LEDGER_SANDBOX, false) ? SANDBOX_API_URL : PRODUCTION_API_URL;
}

export default (): LedgerConfig => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  api: {
    baseUrl: resolveBaseUrl(),
    accessToken: process.env.LEDGER_ACCESS_TOKEN || '',
    userAgent: process.env.LEDGER_USER_AGENT || 'ledger-client/1.0',
  },
  cache: {
    enabled: parseFlag(process.env.CACHE_ENABLED, true),
    namespace: process.env.CACHE_NAMESPACE || 'ledger',
    ttl: parseInt(process.env.CACHE_TTL || '300', 10),
    redisUrl:
      process.env.CACHE_REDIS_URL && process.env.CACHE_REDIS_URL.trim() !== ''
        ? process.env.CACHE_REDIS_URL
        : undefined,
  },
});
