import { Expose } from 'class-transformer';

export class BankAccount {
  @Expose()
  url?: string;

  // StandardBankAccount, CreditCardAccount, PaypalAccount
  @Expose()
  type?: string;

  @Expose()
  name?: string;

  @Expose({ name: 'nominal_code' })
  nominalCode?: string;

  @Expose({ name: 'account_number' })
  accountNumber?: string;

  @Expose({ name: 'sort_code' })
  sortCode?: string;

  @Expose({ name: 'secondary_sort_code' })
  secondarySortCode?: string;

  @Expose()
  iban?: string;

  @Expose()
  bic?: string;

  @Expose({ name: 'opening_balance' })
  openingBalance?: string;

  @Expose({ name: 'current_balance' })
  currentBalance?: string;

  @Expose({ name: 'bank_name' })
  bankName?: string;

  @Expose()
  currency?: string;

  @Expose({ name: 'is_primary' })
  isPrimary?: boolean;

  @Expose()
  status?: string;

  @Expose({ name: 'is_personal' })
  isPersonal?: boolean;

  @Expose({ name: 'bank_feed_id' })
  bankFeedId?: string;

  @Expose({ name: 'bank_feed_status' })
  bankFeedStatus?: string;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
