import { Expose } from 'class-transformer';
import { IsDate, IsIn, IsOptional, IsString } from 'class-validator';

export const TASK_VIEWS = ['all', 'active', 'completed', 'hidden'] as const;

export const TASK_SORTS = [
  'name',
  '-name',
  'project',
  '-project',
  'billing_rate',
  '-billing_rate',
  'created_at',
  '-created_at',
  'updated_at',
  '-updated_at',
] as const;

export type TaskView = (typeof TASK_VIEWS)[number];
export type TaskSort = (typeof TASK_SORTS)[number];

export class TaskFiltersDto {
  @IsOptional()
  @IsString()
  project?: string;

  @IsOptional()
  @IsIn(TASK_VIEWS)
  view?: TaskView;

  @IsOptional()
  @IsIn(TASK_SORTS)
  sort?: TaskSort;

  @Expose({ name: 'updated_since' })
  @IsOptional()
  @IsDate()
  updatedSince?: Date;
}
