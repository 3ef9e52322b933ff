import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InternalSchedulingError,
  MalformedInputError,
  type Meeting,
  MeetingDetails,
  type ScheduleOutcome,
  SlotConflictError,
  SlotValidationError,
  type VoiceDeskError,
  isVoiceDeskError,
} from '@voicedesk/types';
import { MeetingStore } from './meeting-store.js';
import { CLOCK, type Clock, DEFAULT_DURATION_MINUTES } from './scheduling.constants.js';
import { addMinutes, formatIsoWithOffset, formatSlotLabel, parseIsoTimestamp } from './datetime.js';
import { validateSlot } from './slot-validator.js';
import { hasConflict } from './conflict-detector.js';
import { SerialQueue } from './serial-queue.js';

export interface ScheduleRequest {
  summary: string;
  start: string;
  durationMinutes?: number;
  attendees?: string[];
}

const failure = (error: VoiceDeskError): ScheduleOutcome => ({
  success: false,
  message: error.message,
  error: error.toJSON(),
});

/**
 * Books meetings: parse, validate, check for conflicts, append and persist.
 *
 * Attempts go through a single-writer queue so the conflict check and the
 * append of one request cannot interleave with another request in this
 * process. Nothing is thrown past this class; every failure comes back as an
 * outcome with an error kind.
 */
@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly writes = new SerialQueue();

  constructor(
    @Inject(MeetingStore) private readonly store: MeetingStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  listMeetings(): Meeting[] {
    return this.store.list();
  }

  /**
   * Entry point for the voice and HTTP layers: `{ title, datetime, duration?, attendees? }`.
   */
  async schedule(details: unknown): Promise<ScheduleOutcome> {
    const parsed = MeetingDetails.safeParse(details);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || 'details'}: ${issue.message}` : 'invalid meeting details';
      this.logger.warn(`Rejected malformed meeting details (${detail})`);
      return failure(new MalformedInputError(detail));
    }

    const { title, datetime, duration, attendees } = parsed.data;
    return this.scheduleMeeting({
      summary: title,
      start: datetime,
      durationMinutes: duration,
      attendees,
    });
  }

  async scheduleMeeting({
    summary,
    start: startInput,
    durationMinutes = DEFAULT_DURATION_MINUTES,
    attendees = [],
  }: ScheduleRequest): Promise<ScheduleOutcome> {
    const title = summary.trim();
    if (!title) {
      return failure(new MalformedInputError('a meeting title is required'));
    }

    const start = parseIsoTimestamp(startInput);
    if (!start) {
      return failure(
        new MalformedInputError(`"${startInput}" is not a valid ISO-8601 date or date-time`, {
          datetime: startInput,
        }),
      );
    }

    if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
      return failure(new MalformedInputError('duration must be a positive number of minutes'));
    }

    const slot = { start, end: addMinutes(start, durationMinutes) };

    try {
      return await this.writes.run(async (): Promise<ScheduleOutcome> => {
        const verdict = validateSlot(slot, this.clock.now());
        if (!verdict.ok) {
          this.logger.debug(`Slot ${formatSlotLabel(start)} rejected: ${verdict.rule}`);
          return failure(new SlotValidationError(verdict.reason, verdict.rule));
        }

        const meeting: Meeting = {
          summary: title,
          start: formatIsoWithOffset(slot.start),
          end: formatIsoWithOffset(slot.end),
          attendees: [...attendees],
        };

        if (hasConflict(slot, this.store.all())) {
          this.logger.debug(`Slot ${meeting.start}..${meeting.end} overlaps a booked meeting`);
          return failure(new SlotConflictError(meeting.start, meeting.end));
        }

        await this.store.append(meeting);
        this.logger.log(`Scheduled "${meeting.summary}" ${meeting.start}..${meeting.end}`);

        return {
          success: true,
          message: `Meeting scheduled successfully for ${formatSlotLabel(slot.start)}`,
          meeting,
        };
      });
    } catch (e) {
      if (isVoiceDeskError(e)) {
        this.logger.error(`Scheduling failed: ${e.message}`, JSON.stringify(e.metadata ?? {}));
        return failure(e);
      }
      this.logger.error('Unexpected scheduling failure', e instanceof Error ? e.stack : String(e));
      return failure(new InternalSchedulingError(e));
    }
  }
}
