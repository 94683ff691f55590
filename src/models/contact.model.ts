import { Expose } from 'class-transformer';

export class Contact {
  @Expose()
  url?: string;

  @Expose({ name: 'first_name' })
  firstName?: string;

  @Expose({ name: 'last_name' })
  lastName?: string;

  @Expose({ name: 'organisation_name' })
  organisationName?: string;

  @Expose()
  email?: string;

  @Expose({ name: 'billing_email' })
  billingEmail?: string;

  @Expose({ name: 'phone_number' })
  phoneNumber?: string;

  @Expose()
  mobile?: string;

  @Expose()
  address1?: string;

  @Expose()
  address2?: string;

  @Expose()
  town?: string;

  @Expose()
  region?: string;

  @Expose()
  postcode?: string;

  @Expose()
  country?: string;

  @Expose()
  locale?: string;

  @Expose({ name: 'charge_sales_tax' })
  chargeSalesTax?: string;

  @Expose({ name: 'sales_tax_registration_number' })
  salesTaxRegistrationNumber?: string;

  @Expose({ name: 'default_payment_terms_in_days' })
  defaultPaymentTermsInDays?: number;

  @Expose({ name: 'active_projects_count' })
  activeProjectsCount?: number;

  @Expose({ name: 'account_balance' })
  accountBalance?: string;

  @Expose()
  status?: string;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
