import { Expose } from 'class-transformer';
import { IsBoolean, IsDate, IsIn, IsOptional, IsString, Matches } from 'class-validator';

// `last_<n>_months` is accepted alongside the fixed views
export const INVOICE_VIEW_PATTERN =
  /^(all|recent_open_or_overdue|open|overdue|open_or_overdue|draft|scheduled_to_email|thank_you_emails|reminder_emails|last_\d+_months)$/;

export const INVOICE_SORTS = [
  'created_at',
  '-created_at',
  'updated_at',
  '-updated_at',
] as const;

export type InvoiceSort = (typeof INVOICE_SORTS)[number];

export class InvoiceFiltersDto {
  @IsOptional()
  @IsString()
  @Matches(INVOICE_VIEW_PATTERN, { message: 'view is not a known invoice view' })
  view?: string;

  @IsOptional()
  @IsString()
  contact?: string;

  @IsOptional()
  @IsString()
  project?: string;

  @IsOptional()
  @IsIn(INVOICE_SORTS)
  sort?: InvoiceSort;

  @Expose({ name: 'updated_since' })
  @IsOptional()
  @IsDate()
  updatedSince?: Date;

  @Expose({ name: 'nested_invoice_items' })
  @IsOptional()
  @IsBoolean()
  nestedInvoiceItems?: boolean;
}
