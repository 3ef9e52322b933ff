import type { Slot } from './slot.js';
import {
  BUSINESS_HOURS,
  MAXIMUM_FUTURE_DAYS,
  MINIMUM_NOTICE_MS,
  WEEKEND_DAYS,
} from './scheduling.constants.js';

export type SlotRule =
  | 'minimum_notice'
  | 'maximum_horizon'
  | 'business_hours_start'
  | 'business_hours_end'
  | 'weekend';

export type SlotValidation = { ok: true } | { ok: false; rule: SlotRule; reason: string };

const DAY_MS = 24 * 60 * 60 * 1000;

const reject = (rule: SlotRule, reason: string): SlotValidation => ({ ok: false, rule, reason });

/**
 * Checks a candidate slot against the booking rules, in order; the first
 * failing rule is reported.
 *
 * The end-of-day rule looks at the hour of `end` only, so a slot ending at
 * 16:59 passes and one ending at 17:00 does not, whatever day `end` falls on.
 */
export function validateSlot({ start, end }: Slot, now: Date): SlotValidation {
  if (start.getTime() < now.getTime() + MINIMUM_NOTICE_MS) {
    return reject('minimum_notice', 'Meeting must be scheduled at least 1 hour in advance');
  }

  if (start.getTime() > now.getTime() + MAXIMUM_FUTURE_DAYS * DAY_MS) {
    return reject(
      'maximum_horizon',
      `Cannot schedule meetings more than ${MAXIMUM_FUTURE_DAYS} days in advance`,
    );
  }

  const startHour = start.getUTCHours();
  if (startHour < BUSINESS_HOURS.start || startHour >= BUSINESS_HOURS.end) {
    return reject(
      'business_hours_start',
      'Meetings can only be scheduled during business hours (9 AM - 5 PM)',
    );
  }

  if (end.getUTCHours() >= BUSINESS_HOURS.end) {
    return reject('business_hours_end', 'Meeting would extend beyond business hours');
  }

  if (WEEKEND_DAYS.has(start.getUTCDay())) {
    return reject('weekend', 'Meetings cannot be scheduled on weekends');
  }

  return { ok: true };
}
