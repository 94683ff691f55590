import { Expose } from 'class-transformer';
import { IsDate, IsIn, IsOptional, IsString, Matches } from 'class-validator';
import { DATE_ONLY_PATTERN } from '../../../common/utils/filters';

export const BANK_TRANSACTION_VIEWS = [
  'all',
  'unexplained',
  'explained',
  'manual',
  'imported',
  'marked_for_review',
] as const;

export type BankTransactionView = (typeof BANK_TRANSACTION_VIEWS)[number];

export class BankTransactionFiltersDto {
  @Expose({ name: 'bank_account' })
  @IsOptional()
  @IsString()
  bankAccount?: string;

  @IsOptional()
  @IsIn(BANK_TRANSACTION_VIEWS)
  view?: BankTransactionView;

  @Expose({ name: 'from_date' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'fromDate must be a YYYY-MM-DD date' })
  fromDate?: string;

  @Expose({ name: 'to_date' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'toDate must be a YYYY-MM-DD date' })
  toDate?: string;

  @Expose({ name: 'updated_since' })
  @IsOptional()
  @IsDate()
  updatedSince?: Date;
}
