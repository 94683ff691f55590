import { Module } from '@nestjs/common';
import { BankTransactionsService } from './bank-transactions.service';

@Module({
  providers: [BankTransactionsService],
  exports: [BankTransactionsService],
})
export class BankTransactionsModule {}
