import { Logger } from '@nestjs/common';
import type { Intent } from '@voicedesk/types';
import type { LLM, LlmCallMetadata } from '../llm/types.js';
import { INTENT_SYSTEM } from '../prompts/INTENT_SYSTEM.js';

const logger = new Logger('classifyIntent');

/**
 * Maps a raw model answer onto an intent. Anything that is not clearly about
 * scheduling is treated as conversation.
 */
export const parseIntent = (raw: string): Intent =>
  raw.trim().toLowerCase().includes('schedul') ? 'scheduling' : 'conversation';

export async function classifyIntent(
  llm: LLM,
  text: string,
  metadata: LlmCallMetadata = {},
): Promise<Intent> {
  if (!text.trim()) return 'conversation';

  try {
    const raw = await llm.text({
      system: INTENT_SYSTEM,
      user: text,
      temperature: 0,
      maxTokens: 5,
      timeoutMs: 8_000,
      metadata: { ...metadata, requestType: 'intent' },
    });
    return parseIntent(raw);
  } catch (e) {
    logger.warn({
      msg: 'intent classification failed; falling back to conversation',
      callId: metadata.callId,
      error: e instanceof Error ? e.message : String(e),
    });
    return 'conversation';
  }
}
