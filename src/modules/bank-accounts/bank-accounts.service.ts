import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { toQuery } from '../../common/utils/serialization';
import { BankAccount } from '../../models/bank-account.model';
import { BankAccountFiltersDto } from './dto/bank-account-filters.dto';

const BANK_ACCOUNTS: ResourceDefinition<BankAccount> = {
  model: BankAccount,
  path: 'v2/bank_accounts',
  resource: 'bank_accounts',
  singular: 'bank_account',
  plural: 'bank_accounts',
  defaults: { view: 'all' },
};

@Injectable()
export class BankAccountsService extends CachedResourceService<BankAccount> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, BANK_ACCOUNTS);
  }

  async getAll(filters: BankAccountFiltersDto = {}): Promise<BankAccount[]> {
    return this.list(toQuery(BankAccountFiltersDto, filters));
  }

  async create(bankAccount: Partial<BankAccount>): Promise<BankAccount> {
    return this.insert(bankAccount);
  }
}
