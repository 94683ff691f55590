import { IsIn, IsOptional, IsString } from 'class-validator';

export const PROJECT_VIEWS = ['all', 'active', 'completed', 'cancelled', 'hidden'] as const;

export const PROJECT_SORTS = [
  'name',
  '-name',
  'contact_name',
  '-contact_name',
  'contact_display_name',
  '-contact_display_name',
  'created_at',
  '-created_at',
  'updated_at',
  '-updated_at',
] as const;

export type ProjectView = (typeof PROJECT_VIEWS)[number];
export type ProjectSort = (typeof PROJECT_SORTS)[number];

export class ProjectFiltersDto {
  @IsOptional()
  @IsIn(PROJECT_VIEWS)
  view?: ProjectView;

  @IsOptional()
  @IsString()
  contact?: string;

  @IsOptional()
  @IsIn(PROJECT_SORTS)
  sort?: ProjectSort;
}
