import { Expose, Type } from 'class-transformer';

export class Timer {
  @Expose()
  running?: boolean;

  @Expose({ name: 'start_from' })
  startFrom?: string;
}

export class Timeslip {
  @Expose()
  url?: string;

  @Expose()
  user?: string;

  @Expose()
  project?: string;

  @Expose()
  task?: string;

  @Expose({ name: 'dated_on' })
  datedOn?: string;

  @Expose()
  hours?: string;

  @Expose()
  comment?: string;

  @Expose({ name: 'billed_on_invoice' })
  billedOnInvoice?: string;

  @Expose()
  @Type(() => Timer)
  timer?: Timer;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
