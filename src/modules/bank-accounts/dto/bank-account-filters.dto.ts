import { IsIn, IsOptional } from 'class-validator';

export const BANK_ACCOUNT_VIEWS = [
  'all',
  'standard_bank_accounts',
  'credit_card_accounts',
  'paypal_accounts',
] as const;

export type BankAccountView = (typeof BANK_ACCOUNT_VIEWS)[number];

export class BankAccountFiltersDto {
  @IsOptional()
  @IsIn(BANK_ACCOUNT_VIEWS)
  view?: BankAccountView;
}
