import { ConfigService } from '@nestjs/config';
import { createCache } from 'cache-manager';
import { Keyv } from 'keyv';
import { CacheService } from './cache.service';
import { CacheStoreService } from './cache-store.service';
import { InvalidArgumentError } from '../../common/errors/ledger.errors';

function createService(cache: { enabled?: boolean; ttl?: number } = {}): CacheService {
  const config = new ConfigService({
    cache: { enabled: true, ttl: 300, namespace: 'test', ...cache },
  });
  const store = new CacheStoreService(createCache({ stores: [new Keyv()] }), config);
  return new CacheService(store, config);
}

describe('CacheService', () => {
  const T0 = 1_700_000_000_000;
  let now: jest.SpyInstance<number, []>;
  let service: CacheService;

  beforeEach(() => {
    now = jest.spyOn(Date, 'now').mockReturnValue(T0);
    service = createService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getOrFetch', () => {
    it('fetches once for two reads in a row', async () => {
      const fetcher = jest.fn().mockResolvedValue({ id: '123', amount: '10.0' });

      const first = await service.getOrFetch('txn_123', fetcher);
      const second = await service.getOrFetch('txn_123', fetcher);

      expect(fetcher).toHaveBeenCalledTimes(1);
      expect(first).toEqual({ id: '123', amount: '10.0' });
      expect(second).toEqual(first);
    });

    it('refetches once the ttl has elapsed', async () => {
      const fetchA = jest.fn().mockResolvedValueOnce('V1').mockResolvedValueOnce('V2');

      await expect(service.getOrFetch('txn_123', fetchA, { ttl: 300 })).resolves.toBe('V1');
      await expect(service.getOrFetch('txn_123', fetchA, { ttl: 300 })).resolves.toBe('V1');
      expect(fetchA).toHaveBeenCalledTimes(1);

      now.mockReturnValue(T0 + 5 * 60 * 1000);

      await expect(service.getOrFetch('txn_123', fetchA, { ttl: 300 })).resolves.toBe('V2');
      expect(fetchA).toHaveBeenCalledTimes(2);
    });

    it('uses the configured ttl by default', async () => {
      service = createService({ ttl: 60 });
      const fetcher = jest.fn().mockResolvedValue('value');

      await service.getOrFetch('projects_1', fetcher);
      now.mockReturnValue(T0 + 59_999);
      await service.getOrFetch('projects_1', fetcher);
      expect(fetcher).toHaveBeenCalledTimes(1);

      now.mockReturnValue(T0 + 60_000);
      await service.getOrFetch('projects_1', fetcher);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('rethrows a failed fetch and caches nothing', async () => {
      const failure = new Error('socket hang up');
      const fetcher = jest.fn().mockRejectedValueOnce(failure).mockResolvedValueOnce('recovered');

      await expect(service.getOrFetch('txn_1', fetcher)).rejects.toBe(failure);
      await expect(service.getOrFetch('txn_1', fetcher)).resolves.toBe('recovered');
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('caches empty results like any other', async () => {
      const emptyList = jest.fn().mockResolvedValue([]);
      const nothing = jest.fn().mockResolvedValue(null);

      await service.getOrFetch('txn_all', emptyList);
      await service.getOrFetch('txn_all', emptyList);
      await service.getOrFetch('txn_404', nothing);
      await expect(service.getOrFetch('txn_404', nothing)).resolves.toBeNull();

      expect(emptyList).toHaveBeenCalledTimes(1);
      expect(nothing).toHaveBeenCalledTimes(1);
    });

    it('lets concurrent misses fetch independently', async () => {
      const fetcher = jest.fn().mockResolvedValue('value');

      await Promise.all([
        service.getOrFetch('txn_2', fetcher),
        service.getOrFetch('txn_2', fetcher),
      ]);

      expect(fetcher).toHaveBeenCalledTimes(2);
      await service.getOrFetch('txn_2', fetcher);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('refuses a ttl that is not positive', async () => {
      const fetcher = jest.fn().mockResolvedValue('value');

      await expect(service.getOrFetch('txn_3', fetcher, { ttl: 0 })).rejects.toThrow(
        InvalidArgumentError,
      );
      await expect(service.getOrFetch('txn_3', fetcher, { ttl: Number.NaN })).rejects.toThrow(
        'ttl must be a positive finite number of seconds',
      );
      expect(fetcher).not.toHaveBeenCalled();
    });
  });

  describe('mutateAndInvalidate', () => {
    it('invalidates the entity key named by the mutation', async () => {
      const keys = service.keysFor('txn');
      const fetcher = jest.fn().mockResolvedValue({ id: '123' });
      await service.getOrFetch(keys.entity('123'), fetcher);

      await service.mutateAndInvalidate(async () => ({ id: '123' }), keys.invalidation('123'));
      await service.getOrFetch(keys.entity('123'), fetcher);

      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('invalidates the unfiltered list on create', async () => {
      const keys = service.keysFor('txn');
      const listFetcher = jest.fn().mockResolvedValue([]);
      await service.getOrFetchList(keys, {}, listFetcher);

      await service.mutateAndInvalidate(async () => ({ id: '124' }), keys.invalidation());
      await service.getOrFetchList(keys, {}, listFetcher);

      expect(listFetcher).toHaveBeenCalledTimes(2);
    });

    it('invalidates filtered lists of the resource only', async () => {
      const txn = service.keysFor('txn');
      const other = service.keysFor('projects');
      const januaryFetcher = jest.fn().mockResolvedValue(['jan']);
      const projectsFetcher = jest.fn().mockResolvedValue(['p']);
      const january = { from_date: '2024-01-01', to_date: '2024-01-31' };
      await service.getOrFetchList(txn, january, januaryFetcher);
      await service.getOrFetchList(other, {}, projectsFetcher);

      await service.mutateAndInvalidate(async () => undefined, txn.invalidation('5'));
      await service.getOrFetchList(txn, january, januaryFetcher);
      await service.getOrFetchList(other, {}, projectsFetcher);

      expect(januaryFetcher).toHaveBeenCalledTimes(2);
      expect(projectsFetcher).toHaveBeenCalledTimes(1);
    });

    it('returns the result of the mutation', async () => {
      const keys = service.keysFor('txn');

      await expect(
        service.mutateAndInvalidate(async () => ({ id: '9', amount: '1.00' }), keys.invalidation()),
      ).resolves.toEqual({ id: '9', amount: '1.00' });
    });

    it('leaves the cache alone when the mutation fails', async () => {
      const keys = service.keysFor('txn');
      const entityFetcher = jest.fn().mockResolvedValue({ id: '123' });
      const listFetcher = jest.fn().mockResolvedValue([{ id: '123' }]);
      await service.getOrFetch(keys.entity('123'), entityFetcher);
      await service.getOrFetchList(keys, {}, listFetcher);
      const failure = new Error('422 Unprocessable Entity');

      await expect(
        service.mutateAndInvalidate(() => Promise.reject(failure), keys.invalidation('123')),
      ).rejects.toBe(failure);

      await service.getOrFetch(keys.entity('123'), entityFetcher);
      await service.getOrFetchList(keys, {}, listFetcher);
      expect(entityFetcher).toHaveBeenCalledTimes(1);
      expect(listFetcher).toHaveBeenCalledTimes(1);
      expect(keys.registeredCollections()).toEqual(['txn_all']);
    });

    it('forgets invalidated list keys', async () => {
      const keys = service.keysFor('txn');
      await service.getOrFetchList(keys, { view: 'explained' }, async () => []);
      expect(keys.registeredCollections()).toEqual(['txn_view=explained']);

      await service.mutateAndInvalidate(async () => undefined, keys.invalidation());

      expect(keys.registeredCollections()).toEqual([]);
    });

    it('drops a list stored by a read that overlapped an earlier mutation', async () => {
      const keys = service.keysFor('timeslips');
      const filters = { from_date: '2024-01-01' };
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        markStarted = resolve;
      });
      let release: (value: string[]) => void = () => undefined;
      const refetched = new Promise<string[]>((resolve) => {
        release = resolve;
      });

      const pending = service.getOrFetchList(keys, filters, () => {
        markStarted();
        return refetched;
      });
      await started;
      await service.mutateAndInvalidate(async () => 'first', keys.invalidation());
      release(['stale']);
      await expect(pending).resolves.toEqual(['stale']);

      expect(keys.invalidation()).toEqual(['timeslips_all', 'timeslips_from_date=2024-01-01']);
      await service.mutateAndInvalidate(async () => 'second', keys.invalidation());

      const fetcher = jest.fn().mockResolvedValue(['fresh']);
      await expect(service.getOrFetchList(keys, filters, fetcher)).resolves.toEqual(['fresh']);
      expect(fetcher).toHaveBeenCalledTimes(1);
    });

    it('does not track a list whose fetch failed', async () => {
      const keys = service.keysFor('txn');

      await expect(
        service.getOrFetchList(keys, { view: 'explained' }, () => Promise.reject(new Error('timeout'))),
      ).rejects.toThrow('timeout');

      expect(keys.registeredCollections()).toEqual([]);
    });
  });

  describe('key determinism', () => {
    it('hits for identical filters and misses for different ones', async () => {
      const keys = service.keysFor('timeslips');
      const fetcher = jest.fn().mockResolvedValue([]);

      await service.getOrFetchList(keys, { from_date: '2024-01-01', to_date: '2024-01-31' }, fetcher);
      await service.getOrFetchList(keys, { to_date: '2024-01-31', from_date: '2024-01-01' }, fetcher);
      expect(fetcher).toHaveBeenCalledTimes(1);

      await service.getOrFetchList(keys, { from_date: '2024-02-01', to_date: '2024-02-29' }, fetcher);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });
  });

  describe('keysFor', () => {
    it('hands out one key builder per resource', () => {
      expect(service.keysFor('contacts')).toBe(service.keysFor('contacts'));
      expect(service.keysFor('bank_transactions', { view: 'all' })).toBe(
        service.keysFor('bank_transactions', { view: 'all' }),
      );
    });

    it('refuses the same resource with other defaults', () => {
      service.keysFor('bank_transactions', { view: 'all' });

      expect(() => service.keysFor('bank_transactions', { view: 'unexplained' })).toThrow(
        new InvalidArgumentError('"bank_transactions" is already registered with other defaults'),
      );
      expect(() => service.keysFor('bank_transactions')).toThrow(InvalidArgumentError);
    });
  });

  describe('when disabled', () => {
    beforeEach(() => {
      service = createService({ enabled: false });
    });

    it('always calls the fetcher', async () => {
      const fetcher = jest.fn().mockResolvedValue('value');

      await service.getOrFetch('txn_1', fetcher);
      await service.getOrFetch('txn_1', fetcher);

      expect(service.isEnabled()).toBe(false);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('still runs mutations', async () => {
      await expect(service.mutateAndInvalidate(async () => 'done', ['txn_1'])).resolves.toBe('done');
    });
  });

  it('empties the store on reset', async () => {
    const keys = service.keysFor('txn');
    const fetcher = jest.fn().mockResolvedValue('value');
    await service.getOrFetchList(keys, { view: 'explained' }, fetcher);

    await service.reset();
    expect(keys.registeredCollections()).toEqual([]);
    await service.getOrFetchList(keys, { view: 'explained' }, fetcher);

    expect(fetcher).toHaveBeenCalledTimes(2);
  });
});
