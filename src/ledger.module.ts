import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { validationSchema } from './config/validation';
import { CacheModule } from './infrastructure/cache/cache.module';
import { HttpModule } from './infrastructure/http/http.module';
import { BankAccountsModule } from './modules/bank-accounts/bank-accounts.module';
import { BankTransactionsModule } from './modules/bank-transactions/bank-transactions.module';
import { ContactsModule } from './modules/contacts/contacts.module';
import { InvoicesModule } from './modules/invoices/invoices.module';
import { ProjectsModule } from './modules/projects/projects.module';
import { TasksModule } from './modules/tasks/tasks.module';
import { TimeslipsModule } from './modules/timeslips/timeslips.module';
import { UsersModule } from './modules/users/users.module';
import { LedgerClient } from './ledger.client';

export interface LedgerModuleOptions {
  /** `.env` file(s) to read; defaults to `.env` in the working directory */
  envFilePath?: string | string[];
  /** Read configuration from process.env only */
  ignoreEnvFile?: boolean;
}

@Module({})
export class LedgerModule {
  /**
   * Environment is validated when this is called, so set process.env first.
   */
  static forRoot(options: LedgerModuleOptions = {}): DynamicModule {
    return {
      module: LedgerModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: options.envFilePath,
          ignoreEnvFile: options.ignoreEnvFile,
          load: [configuration],
          validationSchema,
          validationOptions: {
            allowUnknown: true,
            abortEarly: false,
          },
        }),
        CacheModule,
        HttpModule,
        BankAccountsModule,
        BankTransactionsModule,
        ContactsModule,
        InvoicesModule,
        ProjectsModule,
        TasksModule,
        TimeslipsModule,
        UsersModule,
      ],
      providers: [LedgerClient],
      exports: [LedgerClient],
    };
  }
}
