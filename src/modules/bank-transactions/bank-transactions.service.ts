import { Injectable } from '@nestjs/common';
import { ApiClientService } from '../../infrastructure/http/api-client.service';
import { CacheService } from '../../infrastructure/cache/cache.service';
import {
  CachedResourceService,
  ResourceDefinition,
} from '../../common/resource/cached-resource.service';
import { InvalidArgumentError } from '../../common/errors/ledger.errors';
import { requireId } from '../../common/utils/require-id';
import { toPayload, toQuery } from '../../common/utils/serialization';
import { BankTransaction, StatementUpload } from '../../models/bank-transaction.model';
import { BankTransactionFiltersDto } from './dto/bank-transaction-filters.dto';

const BANK_TRANSACTIONS: ResourceDefinition<BankTransaction> = {
  model: BankTransaction,
  path: 'v2/bank_transactions',
  resource: 'bank_transactions',
  singular: 'bank_transaction',
  plural: 'bank_transactions',
  defaults: { view: 'all' },
};

@Injectable()
export class BankTransactionsService extends CachedResourceService<BankTransaction> {
  constructor(apiClient: ApiClientService, cacheService: CacheService) {
    super(apiClient, cacheService, BANK_TRANSACTIONS);
  }

  async getAll(filters: BankTransactionFiltersDto = {}): Promise<BankTransaction[]> {
    return this.list(toQuery(BankTransactionFiltersDto, filters));
  }

  async getUnexplained(bankAccount?: string): Promise<BankTransaction[]> {
    return this.getAll({ bankAccount, view: 'unexplained' });
  }

  async getExplained(bankAccount?: string): Promise<BankTransaction[]> {
    return this.getAll({ bankAccount, view: 'explained' });
  }

  async create(transaction: Partial<BankTransaction>): Promise<BankTransaction> {
    return this.insert(transaction);
  }

  /**
   * Imports a bank statement into `bankAccount`. Resolves with the
   * transactions the API created, if it lists them.
   */
  async uploadStatement(
    bankAccount: string,
    statement: string,
    fileType?: string,
  ): Promise<BankTransaction[]> {
    const account = requireId(bankAccount, 'bankAccount');
    if (statement === '') {
      throw new InvalidArgumentError('statement must not be empty');
    }

    return this.cacheService.mutateAndInvalidate(async () => {
      const body = await this.apiClient.post(
        `${BANK_TRANSACTIONS.path}/statement`,
        toPayload(StatementUpload, { statement, fileType }, 'statement'),
        { bank_account: account },
      );
      this.logger.log(`Uploaded statement to ${account}`);
      return body === undefined ? [] : this.readRecords(body);
    }, this.keys.invalidation());
  }
}
