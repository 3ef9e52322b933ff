import { Inject, Injectable } from '@nestjs/common';
import type { ConversationMessage, Intent, MeetingDetails } from '@voicedesk/types';
import type { LLM } from '../llm/types.js';
import { AGENT_LLM } from './agent.tokens.js';
import { classifyIntent } from '../nodes/classifyIntent.js';
import { generateReply } from '../nodes/generateReply.js';
import { extractMeetingDetails } from '../nodes/extractMeetingDetails.js';

/**
 * Language side of a call: intent, spoken replies and meeting details.
 * Every method is scoped to a call id for log correlation.
 */
@Injectable()
export class AgentService {
  constructor(@Inject(AGENT_LLM) private readonly llm: LLM) {}

  classifyIntent(callId: string, text: string): Promise<Intent> {
    return classifyIntent(this.llm, text, { callId });
  }

  reply(callId: string, intent: Intent, history: ConversationMessage[]): Promise<string> {
    return generateReply(this.llm, intent, history, { callId });
  }

  extractMeetingDetails(callId: string, text: string, now: Date): Promise<MeetingDetails | null> {
    return extractMeetingDetails(this.llm, text, now, { callId });
  }
}
