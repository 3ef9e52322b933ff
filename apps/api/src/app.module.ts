import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { LoggingModule } from './logging/logging.module.js';
import { SchedulingModule } from './scheduling/scheduling.module.js';
import { MeetingsModule } from './meetings/meetings.module.js';
import { VoiceModule } from './voice/voice.module.js';

@Module({
  imports: [ConfigModule, LoggingModule, SchedulingModule, MeetingsModule, VoiceModule],
})
export class AppModule {}
