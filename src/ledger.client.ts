import { Injectable } from '@nestjs/common';
import { CacheService } from './infrastructure/cache/cache.service';
import { BankAccountsService } from './modules/bank-accounts/bank-accounts.service';
import { BankTransactionsService } from './modules/bank-transactions/bank-transactions.service';
import { ContactsService } from './modules/contacts/contacts.service';
import { InvoicesService } from './modules/invoices/invoices.service';
import { ProjectsService } from './modules/projects/projects.service';
import { TasksService } from './modules/tasks/tasks.service';
import { TimeslipsService } from './modules/timeslips/timeslips.service';
import { UsersService } from './modules/users/users.service';

/**
 * Entry point to the accounting API: one service per resource, all sharing
 * the same cache.
 */
@Injectable()
export class LedgerClient {
  constructor(
    readonly bankAccounts: BankAccountsService,
    readonly bankTransactions: BankTransactionsService,
    readonly contacts: ContactsService,
    readonly invoices: InvoicesService,
    readonly projects: ProjectsService,
    readonly tasks: TasksService,
    readonly timeslips: TimeslipsService,
    readonly users: UsersService,
    private readonly cacheService: CacheService,
  ) {}

  async clearCache(): Promise<void> {
    await this.cacheService.reset();
  }
}
