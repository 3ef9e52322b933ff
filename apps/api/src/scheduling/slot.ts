import type { Meeting } from '@voicedesk/types';
import { parseIsoTimestamp } from './datetime.js';

/** Half-open interval `[start, end)`. */
export interface Slot {
  start: Date;
  end: Date;
}

export function meetingSlot(meeting: Meeting): Slot {
  const start = parseIsoTimestamp(meeting.start);
  const end = parseIsoTimestamp(meeting.end);
  if (!start || !end) {
    throw new Error(`Stored meeting "${meeting.summary}" has an unreadable start or end`);
  }
  return { start, end };
}
