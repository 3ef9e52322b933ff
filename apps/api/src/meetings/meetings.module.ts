import { Module } from '@nestjs/common';
import { SchedulingModule } from '../scheduling/scheduling.module.js';
import { MeetingsController } from './meetings.controller.js';

@Module({
  imports: [SchedulingModule],
  controllers: [MeetingsController],
})
export class MeetingsModule {}
