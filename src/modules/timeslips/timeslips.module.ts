import { Module } from '@nestjs/common';
import { TimeslipsService } from './timeslips.service';

@Module({
  providers: [TimeslipsService],
  exports: [TimeslipsService],
})
export class TimeslipsModule {}
