import type { ConversationMessage, Intent } from '@voicedesk/types';
import type { LLM, LlmCallMetadata } from '../llm/types.js';
import { assistantSystemFor } from '../prompts/ASSISTANT_SYSTEM.js';

export async function generateReply(
  llm: LLM,
  intent: Intent,
  history: ConversationMessage[],
  metadata: LlmCallMetadata = {},
): Promise<string> {
  const reply = await llm.chat({
    system: assistantSystemFor(intent),
    messages: history,
    temperature: 0.4,
    maxTokens: 200,
    metadata: { ...metadata, requestType: 'reply' },
  });
  return reply.trim();
}
