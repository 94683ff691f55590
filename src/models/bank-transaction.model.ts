import { Expose } from 'class-transformer';

export class BankTransaction {
  @Expose()
  url?: string;

  @Expose({ name: 'bank_account' })
  bankAccount?: string;

  @Expose({ name: 'dated_on' })
  datedOn?: string;

  @Expose()
  description?: string;

  @Expose({ name: 'full_description' })
  fullDescription?: string;

  @Expose()
  amount?: string;

  @Expose({ name: 'unexplained_amount' })
  unexplainedAmount?: string;

  @Expose({ name: 'is_explained' })
  isExplained?: boolean;

  @Expose({ name: 'is_manual' })
  isManual?: boolean;

  @Expose({ name: 'is_locked' })
  isLocked?: boolean;

  @Expose({ name: 'uploaded_at' })
  uploadedAt?: string;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}

/**
 * Body of a bank statement upload. `statement` holds the file contents,
 * base64 encoded for OFX/QIF/CSV files.
 */
export class StatementUpload {
  @Expose()
  statement?: string;

  @Expose({ name: 'file_type' })
  fileType?: string;
}
