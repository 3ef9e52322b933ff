import { Inject, Injectable, Logger } from '@nestjs/common';
import { AgentService } from '@voicedesk/agent';
import type { Intent } from '@voicedesk/types';
import { SchedulerService } from '../scheduling/scheduler.service.js';
import { CLOCK, type Clock } from '../scheduling/scheduling.constants.js';
import { CallSessionStore } from './call-session.store.js';

export interface TurnResult {
  intent: Intent;
  // What gets spoken back to the caller
  reply: string;
  scheduled?: { success: boolean; message: string };
}

export const FALLBACK_REPLY = 'Sorry, I am having trouble right now. Could you try again in a moment?';

@Injectable()
export class VoiceAssistantService {
  private readonly logger = new Logger(VoiceAssistantService.name);

  constructor(
    @Inject(AgentService) private readonly agent: AgentService,
    @Inject(SchedulerService) private readonly scheduler: SchedulerService,
    @Inject(CallSessionStore) private readonly sessions: CallSessionStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * One caller utterance: record it, classify it, answer it. Scheduling
   * requests with usable details are booked and answered with the booking
   * result instead of the generated reply.
   */
  async handleTurn(callId: string, speech: string): Promise<TurnResult> {
    const history = this.sessions.append(callId, { role: 'user', content: speech });
    const intent = await this.agent.classifyIntent(callId, speech);

    let reply: string;
    try {
      reply = await this.agent.reply(callId, intent, history);
    } catch (e) {
      this.logger.error(
        `Reply generation failed for call ${callId}`,
        e instanceof Error ? e.stack : String(e),
      );
      reply = FALLBACK_REPLY;
    }

    const scheduled = intent === 'scheduling' ? await this.tryScheduling(callId, speech) : undefined;
    const spoken = scheduled?.message ?? reply;
    this.sessions.append(callId, { role: 'assistant', content: spoken });

    return scheduled ? { intent, reply: spoken, scheduled } : { intent, reply: spoken };
  }

  private async tryScheduling(
    callId: string,
    speech: string,
  ): Promise<TurnResult['scheduled'] | undefined> {
    const details = await this.agent.extractMeetingDetails(callId, speech, this.clock.now());
    if (!details) return undefined;

    const outcome = await this.scheduler.schedule(details);
    this.logger.log(
      `Call ${callId} scheduling attempt: ${outcome.success ? 'booked' : outcome.error.code}`,
    );
    return { success: outcome.success, message: outcome.message };
  }

  endCall(callId: string): void {
    this.sessions.end(callId);
  }
}
