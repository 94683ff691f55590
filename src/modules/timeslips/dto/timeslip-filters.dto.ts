import { Expose } from 'class-transformer';
import { IsBoolean, IsDate, IsIn, IsOptional, IsString, Matches } from 'class-validator';
import { DATE_ONLY_PATTERN } from '../../../common/utils/filters';

export const TIMESLIP_VIEWS = ['all', 'unbilled', 'running'] as const;

export type TimeslipView = (typeof TIMESLIP_VIEWS)[number];

export class TimeslipFiltersDto {
  @Expose({ name: 'from_date' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'fromDate must be a YYYY-MM-DD date' })
  fromDate?: string;

  @Expose({ name: 'to_date' })
  @IsOptional()
  @Matches(DATE_ONLY_PATTERN, { message: 'toDate must be a YYYY-MM-DD date' })
  toDate?: string;

  @Expose({ name: 'updated_since' })
  @IsOptional()
  @IsDate()
  updatedSince?: Date;

  @IsOptional()
  @IsIn(TIMESLIP_VIEWS)
  view?: TimeslipView;

  // Embeds user, project and task records in each timeslip
  @IsOptional()
  @IsBoolean()
  nested?: boolean;

  @IsOptional()
  @IsString()
  user?: string;

  @IsOptional()
  @IsString()
  task?: string;

  @IsOptional()
  @IsString()
  project?: string;
}
