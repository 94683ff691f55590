import { Expose, Type } from 'class-transformer';

export class InvoiceItem {
  @Expose()
  url?: string;

  @Expose()
  position?: number;

  @Expose()
  description?: string;

  @Expose({ name: 'item_type' })
  itemType?: string;

  @Expose()
  quantity?: string;

  @Expose()
  price?: string;

  @Expose({ name: 'sales_tax_rate' })
  salesTaxRate?: string;

  @Expose()
  category?: string;

  @Expose()
  project?: string;
}

export class Invoice {
  @Expose()
  url?: string;

  @Expose()
  contact?: string;

  @Expose()
  project?: string;

  @Expose()
  reference?: string;

  @Expose({ name: 'dated_on' })
  datedOn?: string;

  @Expose({ name: 'due_on' })
  dueOn?: string;

  @Expose({ name: 'paid_on' })
  paidOn?: string;

  // Draft, Scheduled, Open, Overdue, Paid, Cancelled...
  @Expose()
  status?: string;

  @Expose()
  currency?: string;

  @Expose({ name: 'exchange_rate' })
  exchangeRate?: string;

  @Expose({ name: 'net_value' })
  netValue?: string;

  @Expose({ name: 'total_value' })
  totalValue?: string;

  @Expose({ name: 'paid_value' })
  paidValue?: string;

  @Expose({ name: 'due_value' })
  dueValue?: string;

  @Expose({ name: 'payment_terms_in_days' })
  paymentTermsInDays?: number;

  @Expose()
  comments?: string;

  @Expose({ name: 'invoice_items' })
  @Type(() => InvoiceItem)
  invoiceItems?: InvoiceItem[];

  @Expose({ name: 'sent_at' })
  sentAt?: string;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
