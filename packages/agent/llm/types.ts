import type { ConversationMessage } from '@voicedesk/types';

export type LLMProvider = 'openai' | 'azure-openai' | 'anthropic';

export interface LlmCallMetadata {
  // Telephony call the request belongs to, used for log correlation
  callId?: string;
  // Optional model override for this call (e.g., 'gpt-4o-mini', 'claude-3-5-haiku-20241022')
  model?: string;
  requestType?: string;
}

export interface LlmCallOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  metadata?: LlmCallMetadata;
}

export interface LLM {
  text(args: { system?: string; user: string } & LlmCallOptions): Promise<string>;

  // multi-turn variant used for live conversations
  chat(args: { system?: string; messages: ConversationMessage[] } & LlmCallOptions): Promise<string>;
}
