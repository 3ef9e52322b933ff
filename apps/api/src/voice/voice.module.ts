import { Module } from '@nestjs/common';
import { AgentModule } from '@voicedesk/agent';
import { ConfigService } from '../config/config.service.js';
import { SchedulingModule } from '../scheduling/scheduling.module.js';
import { CallSessionStore } from './call-session.store.js';
import { VoiceAssistantService } from './voice-assistant.service.js';
import { VoiceController } from './voice.controller.js';
import { SESSION_OPTIONS, type CallSessionOptions } from './voice.tokens.js';

@Module({
  imports: [AgentModule.forRoot(), SchedulingModule],
  controllers: [VoiceController],
  providers: [
    {
      provide: SESSION_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): CallSessionOptions => ({
        idleTtlMs: config.sessionIdleTtlMs,
        maxMessages: config.sessionMaxTurns,
        maxSessions: config.sessionMaxCalls,
      }),
    },
    CallSessionStore,
    VoiceAssistantService,
  ],
})
export class VoiceModule {}
