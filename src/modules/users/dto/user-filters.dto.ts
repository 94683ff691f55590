import { IsIn, IsOptional } from 'class-validator';

export const USER_VIEWS = ['all', 'staff', 'active_staff', 'advisors', 'active_advisors'] as const;

export type UserView = (typeof USER_VIEWS)[number];

export class UserFiltersDto {
  @IsOptional()
  @IsIn(USER_VIEWS)
  view?: UserView;
}
