import { Expose } from 'class-transformer';

export class Project {
  @Expose()
  url?: string;

  @Expose()
  contact?: string;

  @Expose({ name: 'contact_name' })
  contactName?: string;

  @Expose()
  name?: string;

  // Active, Completed, Cancelled, Hidden
  @Expose()
  status?: string;

  @Expose({ name: 'contract_po_reference' })
  contractPoReference?: string;

  @Expose({ name: 'uses_project_invoice_sequence' })
  usesProjectInvoiceSequence?: boolean;

  @Expose()
  currency?: string;

  @Expose()
  budget?: string;

  @Expose({ name: 'budget_units' })
  budgetUnits?: string;

  @Expose({ name: 'hours_per_day' })
  hoursPerDay?: string;

  @Expose({ name: 'normal_billing_rate' })
  normalBillingRate?: string;

  @Expose({ name: 'billing_period' })
  billingPeriod?: string;

  @Expose({ name: 'is_ir35' })
  isIr35?: boolean;

  @Expose({ name: 'starts_on' })
  startsOn?: string;

  @Expose({ name: 'ends_on' })
  endsOn?: string;

  @Expose({ name: 'is_deletable' })
  isDeletable?: boolean;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
