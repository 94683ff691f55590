import { validationSchema } from './validation';
import configuration, { PRODUCTION_API_URL, SANDBOX_API_URL } from './configuration';

describe('validationSchema', () => {
  it('requires an access token', () => {
    const { error } = validationSchema.validate({});

    expect(error?.message).toBe('LEDGER_ACCESS_TOKEN is required to call the accounting API');
  });

  it('fills in cache defaults', () => {
    const { error, value } = validationSchema.validate({ LEDGER_ACCESS_TOKEN: 'test-token' });

    expect(error).toBeUndefined();
    expect(value.CACHE_ENABLED).toBe('true');
    expect(value.CACHE_NAMESPACE).toBe('ledger');
    expect(value.CACHE_TTL).toBe(300);
  });

  it('rejects a ttl below one second', () => {
    const { error } = validationSchema.validate({
      LEDGER_ACCESS_TOKEN: 'test-token',
      CACHE_TTL: '0',
    });

    expect(error?.message).toBe('"CACHE_TTL" must be greater than or equal to 1');
  });
});

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('targets production unless told otherwise', () => {
    delete process.env.LEDGER_API_URL;
    delete process.env.LEDGER_SANDBOX;

    expect(configuration().api.baseUrl).toBe(PRODUCTION_API_URL);
  });

  it('switches to the sandbox host', () => {
    delete process.env.LEDGER_API_URL;
    process.env.LEDGER_SANDBOX = '1';

    expect(configuration().api.baseUrl).toBe(SANDBOX_API_URL);
  });

  it('prefers an explicit base url', () => {
    process.env.LEDGER_API_URL = 'http://localhost:4010';
    process.env.LEDGER_SANDBOX = 'true';

    expect(configuration().api.baseUrl).toBe('http://localhost:4010');
  });

  it('reads cache settings', () => {
    process.env.CACHE_ENABLED = 'false';
    process.env.CACHE_TTL = '60';
    process.env.CACHE_REDIS_URL = '';

    const { cache } = configuration();

    expect(cache.enabled).toBe(false);
    expect(cache.ttl).toBe(60);
    expect(cache.redisUrl).toBeUndefined();
  });
});
