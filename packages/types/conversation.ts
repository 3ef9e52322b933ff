export type Intent = 'scheduling' | 'conversation';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}
