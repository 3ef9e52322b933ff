/**
 * Central export for all agent prompts
 */
export { INTENT_SYSTEM } from './INTENT_SYSTEM.js';
export {
  SCHEDULING_ASSISTANT_SYSTEM,
  CONVERSATION_ASSISTANT_SYSTEM,
  assistantSystemFor,
} from './ASSISTANT_SYSTEM.js';
export { buildExtractMeetingSystemPrompt } from './EXTRACT_MEETING_SYSTEM.js';
