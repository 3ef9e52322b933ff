import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module.js';
import { ConfigService } from '../config/config.service.js';
import { MeetingStore } from './meeting-store.js';
import { SchedulerService } from './scheduler.service.js';
import { CLOCK, MEETINGS_FILE, systemClock } from './scheduling.constants.js';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MEETINGS_FILE,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => config.meetingsFile,
    },
    { provide: CLOCK, useValue: systemClock },
    MeetingStore,
    SchedulerService,
  ],
  exports: [SchedulerService, CLOCK],
})
export class SchedulingModule {}
