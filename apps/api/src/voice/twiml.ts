import twilio from 'twilio';

const { VoiceResponse } = twilio.twiml;

export const GREETING = 'Hello! I am your AI assistant. How can I help you today?';
export const REPROMPT = 'Sorry, I did not catch that. Could you say it again?';
export const PROCESS_SPEECH_PATH = '/voice/process-speech';

/**
 * Says `text`, then listens for the next utterance and posts it back to the
 * speech handler.
 */
export function sayAndGather(text: string, timeoutSeconds: number): string {
  const response = new VoiceResponse();
  response.say(text);
  response.gather({
    input: ['speech'],
    timeout: timeoutSeconds,
    action: PROCESS_SPEECH_PATH,
    method: 'POST',
  });
  return response.toString();
}

// Greeting is spoken inside the gather so the caller can barge in.
export function greetAndGather(timeoutSeconds: number): string {
  const response = new VoiceResponse();
  const gather = response.gather({
    input: ['speech'],
    timeout: timeoutSeconds,
    action: PROCESS_SPEECH_PATH,
    method: 'POST',
  });
  gather.say(GREETING);
  return response.toString();
}
