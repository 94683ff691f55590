import { Expose } from 'class-transformer';

export class User {
  @Expose()
  url?: string;

  @Expose({ name: 'first_name' })
  firstName?: string;

  @Expose({ name: 'last_name' })
  lastName?: string;

  @Expose()
  email?: string;

  // Owner, Director, Partner, Company Secretary, Employee, Shareholder, Accountant
  @Expose()
  role?: string;

  @Expose()
  hidden?: boolean;

  @Expose({ name: 'permission_level' })
  permissionLevel?: number;

  @Expose({ name: 'opening_mileage' })
  openingMileage?: string;

  @Expose({ name: 'ni_number' })
  niNumber?: string;

  @Expose({ name: 'unique_tax_reference' })
  uniqueTaxReference?: string;

  @Expose({ name: 'send_invitation' })
  sendInvitation?: boolean;

  @Expose({ name: 'created_at' })
  createdAt?: string;

  @Expose({ name: 'updated_at' })
  updatedAt?: string;
}
