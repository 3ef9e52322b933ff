import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { MeetingDetails } from '@voicedesk/types';
import type { LLM, LlmCallMetadata } from '../llm/types.js';
import { buildExtractMeetingSystemPrompt } from '../prompts/EXTRACT_MEETING_SYSTEM.js';

const logger = new Logger('extractMeetingDetails');

// Models are loose with types here: durations come back as "30", attendees as "Ann, Bob".
const LlmOut = z.object({
  title: z.string().nullish(),
  datetime: z.string().nullish(),
  duration: z.union([z.number(), z.string()]).nullish(),
  attendees: z.union([z.array(z.string()), z.string()]).nullish(),
});
type LlmOutType = z.infer<typeof LlmOut>;

const toDuration = (value: LlmOutType['duration']): number | undefined => {
  if (value === null || value === undefined) return undefined;
  const num = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(num) ? Math.round(num) : undefined;
};

const toAttendees = (value: LlmOutType['attendees']): string[] => {
  if (!value) return [];
  const list = Array.isArray(value) ? value : value.split(',');
  return list.map((a) => a.trim()).filter((a) => a.length > 0);
};

/**
 * Pulls the JSON object out of a model answer, tolerating prose or code fences
 * around it.
 */
export const sliceJson = (raw: string): string => {
  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  return first >= 0 && last > first ? raw.slice(first, last + 1) : raw;
};

export async function extractMeetingDetails(
  llm: LLM,
  text: string,
  now: Date,
  metadata: LlmCallMetadata = {},
): Promise<MeetingDetails | null> {
  if (!text.trim()) return null;

  let out: LlmOutType;
  try {
    const raw = await llm.text({
      system: buildExtractMeetingSystemPrompt(now.toISOString()),
      user: text,
      temperature: 0,
      maxTokens: 200,
      timeoutMs: 12_000,
      metadata: { ...metadata, requestType: 'extract_meeting' },
    });
    out = LlmOut.parse(JSON.parse(sliceJson(raw)));
  } catch (e) {
    logger.warn({
      msg: 'meeting detail extraction failed',
      callId: metadata.callId,
      error: e instanceof Error ? e.message : String(e),
    });
    return null;
  }

  const parsed = MeetingDetails.safeParse({
    title: out.title ?? undefined,
    datetime: out.datetime ?? undefined,
    duration: toDuration(out.duration),
    attendees: toAttendees(out.attendees),
  });

  if (!parsed.success) {
    logger.debug({
      msg: 'extracted details incomplete',
      callId: metadata.callId,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }

  return parsed.data;
}
