import { BankAccountsService } from './bank-accounts.service';
import {
  FetchMock,
  createFetchMock,
  createTestingStack,
  jsonResponse,
  requestAt,
} from '../../testing/fake-api';

const ACCOUNT_URL = 'https://api.test/v2/bank_accounts/1';

const accountBody = {
  url: ACCOUNT_URL,
  type: 'StandardBankAccount',
  name: 'Business Current',
  bank_name: 'Test Bank',
  sort_code: '00-00-00',
  current_balance: '1520.40',
  currency: 'GBP',
  is_primary: true,
  is_personal: false,
};

describe('BankAccountsService', () => {
  let fetchMock: FetchMock;
  let service: BankAccountsService;

  beforeEach(() => {
    fetchMock = createFetchMock();
    const { apiClient, cacheService } = createTestingStack(fetchMock);
    service = new BankAccountsService(apiClient, cacheService);
  });

  it('maps bank accounts', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ bank_accounts: [accountBody] }));

    await expect(service.getAll()).resolves.toEqual([
      {
        url: ACCOUNT_URL,
        type: 'StandardBankAccount',
        name: 'Business Current',
        bankName: 'Test Bank',
        sortCode: '00-00-00',
        currentBalance: '1520.40',
        currency: 'GBP',
        isPrimary: true,
        isPersonal: false,
      },
    ]);
    expect(requestAt(fetchMock, 0).url).toBe('https://api.test/v2/bank_accounts');
  });

  it('shares one cache entry between the default view and no view', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ bank_accounts: [accountBody] }));

    await service.getAll();
    await service.getAll({ view: 'all' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('asks for one kind of account', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ bank_accounts: [] }));

    await service.getAll({ view: 'credit_card_accounts' });

    expect(requestAt(fetchMock, 0).url).toBe('https://api.test/v2/bank_accounts?view=credit_card_accounts');
  });

  it('drops the cached account and lists after a rename', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ bank_account: accountBody }))
      .mockResolvedValueOnce(jsonResponse({ bank_accounts: [accountBody] }))
      .mockResolvedValueOnce(jsonResponse({ bank_account: { ...accountBody, name: 'Operations' } }))
      .mockResolvedValueOnce(jsonResponse({ bank_account: { ...accountBody, name: 'Operations' } }))
      .mockResolvedValueOnce(jsonResponse({ bank_accounts: [{ ...accountBody, name: 'Operations' }] }));

    await service.getById('1');
    await service.getAll({ view: 'standard_bank_accounts' });
    await service.update('1', { name: 'Operations' });
    const account = await service.getById('1');
    const accounts = await service.getAll({ view: 'standard_bank_accounts' });

    expect(requestAt(fetchMock, 2)).toMatchObject({
      url: ACCOUNT_URL,
      method: 'PUT',
      body: { bank_account: { name: 'Operations' } },
    });
    expect(account.name).toBe('Operations');
    expect(accounts[0].name).toBe('Operations');
    expect(fetchMock).toHaveBeenCalledTimes(5);
  });

  it('creates an account', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ bank_account: accountBody }, 201));

    const created = await service.create({ type: 'StandardBankAccount', name: 'Business Current' });

    expect(requestAt(fetchMock, 0)).toMatchObject({
      url: 'https://api.test/v2/bank_accounts',
      method: 'POST',
      body: { bank_account: { type: 'StandardBankAccount', name: 'Business Current' } },
    });
    expect(created.url).toBe(ACCOUNT_URL);
  });
});
