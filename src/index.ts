import 'reflect-metadata';

export {
  createLedgerClient,
  createLedgerContext,
  CreateLedgerClientOptions,
  LedgerSession,
} from './bootstrap';
export { LedgerModule, LedgerModuleOptions } from './ledger.module';
export { LedgerClient } from './ledger.client';

export { BankAccountsService } from './modules/bank-accounts/bank-accounts.service';
export { BankTransactionsService } from './modules/bank-transactions/bank-transactions.service';
export { ContactsService } from './modules/contacts/contacts.service';
export { InvoicesService } from './modules/invoices/invoices.service';
export { ProjectsService } from './modules/projects/projects.service';
export { TasksService } from './modules/tasks/tasks.service';
export { TimeslipsService } from './modules/timeslips/timeslips.service';
export { UsersService } from './modules/users/users.service';

export { BankAccountFiltersDto } from './modules/bank-accounts/dto/bank-account-filters.dto';
export { BankTransactionFiltersDto } from './modules/bank-transactions/dto/bank-transaction-filters.dto';
export { ContactFiltersDto } from './modules/contacts/dto/contact-filters.dto';
export { InvoiceFiltersDto } from './modules/invoices/dto/invoice-filters.dto';
export { ProjectFiltersDto } from './modules/projects/dto/project-filters.dto';
export { TaskFiltersDto } from './modules/tasks/dto/task-filters.dto';
export { TimeslipFiltersDto } from './modules/timeslips/dto/timeslip-filters.dto';
export { UserFiltersDto } from './modules/users/dto/user-filters.dto';

export { BankAccount } from './models/bank-account.model';
export { BankTransaction, StatementUpload } from './models/bank-transaction.model';
export { Contact } from './models/contact.model';
export { Invoice, InvoiceItem } from './models/invoice.model';
export { Project } from './models/project.model';
export { Task } from './models/task.model';
export { Timeslip, Timer } from './models/timeslip.model';
export { User } from './models/user.model';

export { CacheService } from './infrastructure/cache/cache.service';
export { CacheStoreService } from './infrastructure/cache/cache-store.service';
export { ResourceCacheKeys } from './infrastructure/cache/cache-keys';
export { CacheOptions, CacheFetcher, CacheMutator, CacheLookup } from './infrastructure/cache/cache.types';
export { ApiClientService } from './infrastructure/http/api-client.service';
export { FETCH, FetchFn } from './infrastructure/http/http.constants';

export { ApiRequestError, ApiResponseError, InvalidArgumentError } from './common/errors/ledger.errors';
export { toHttpException } from './utils/error';
export { LedgerConfig } from './config/configuration';
