import { Expose } from 'class-transformer';

export class Task {
  @Expose()
  url?: string;

  @Expose()
  project?: string;

  @Expose()
  name?: string;

  @Expose({ name: 'is_billable' })
  isBillable?: boolean;

  @Expose({ name: 'billing_rate' })
  billingRate?: string;

  @Expose({ name: 'billing_period' })
  billingPeriod?: string;

  @Expose()
  status?: string;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
