import { z } from 'zod';
import type { SchedulingErrorJson } from './errors.js';

/**
 * A booked meeting as persisted. `start` and `end` are ISO-8601 timestamps with
 * an explicit offset; the interval is half-open, `[start, end)`.
 */
export const Meeting = z.object({
  summary: z.string().min(1),
  start: z.string(),
  end: z.string(),
  attendees: z.array(z.string()),
});

export type Meeting = z.infer<typeof Meeting>;

export const MeetingList = z.array(Meeting);

/**
 * What the voice and HTTP layers hand to the scheduler. `datetime` is any
 * ISO-8601 date or date-time; without an offset it is read as UTC.
 */
export const MeetingDetails = z.object({
  title: z.string().trim().min(1, 'title is required'),
  datetime: z.string().trim().min(1, 'datetime is required'),
  duration: z.number().int().positive().optional(),
  attendees: z.array(z.string()).optional(),
});

export type MeetingDetails = z.infer<typeof MeetingDetails>;

export type ScheduleOutcome =
  | { success: true; message: string; meeting: Meeting }
  | { success: false; message: string; error: SchedulingErrorJson };
