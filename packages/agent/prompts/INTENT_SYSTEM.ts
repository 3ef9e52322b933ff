export const INTENT_SYSTEM = `Analyze if the caller wants to schedule a meeting or just have a conversation.
Respond with exactly one word: either 'scheduling' or 'conversation'.`;
