// Business rules below are evaluated on UTC wall-clock time.
export const BUSINESS_HOURS = { start: 9, end: 17 } as const;

// Date#getUTCDay numbering: Sunday = 0, Saturday = 6
export const WEEKEND_DAYS: ReadonlySet<number> = new Set([0, 6]);

export const MINIMUM_NOTICE_MS = 60 * 60 * 1000;
export const MAXIMUM_FUTURE_DAYS = 60;
export const DEFAULT_DURATION_MINUTES = 60;

export const MEETINGS_FILE = Symbol('MEETINGS_FILE'); // path of the JSON meeting store
export const CLOCK = Symbol('CLOCK');

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
