import { Expose } from 'class-transformer';
import { IsDate, IsIn, IsOptional } from 'class-validator';

export const CONTACT_VIEWS = [
  'all',
  'active',
  'clients',
  'suppliers',
  'active_projects',
  'completed_projects',
  'open_clients',
  'open_suppliers',
  'hidden',
] as const;

export const CONTACT_SORTS = [
  'name',
  '-name',
  'created_at',
  '-created_at',
  'updated_at',
  '-updated_at',
] as const;

export type ContactView = (typeof CONTACT_VIEWS)[number];
export type ContactSort = (typeof CONTACT_SORTS)[number];

export class ContactFiltersDto {
  @IsOptional()
  @IsIn(CONTACT_VIEWS)
  view?: ContactView;

  @IsOptional()
  @IsIn(CONTACT_SORTS)
  sort?: ContactSort;

  @Expose({ name: 'updated_since' })
  @IsOptional()
  @IsDate()
  updatedSince?: Date;
}
