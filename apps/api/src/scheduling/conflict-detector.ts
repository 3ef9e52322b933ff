import type { Meeting } from '@voicedesk/types';
import { meetingSlot, type Slot } from './slot.js';

// Touching intervals (one ends exactly when the other starts) do not overlap.
export const slotsOverlap = (left: Slot, right: Slot): boolean =>
  left.start < right.end && left.end > right.start;

export function hasConflict(candidate: Slot, existing: readonly Meeting[]): boolean {
  return existing.some((meeting) => slotsOverlap(candidate, meetingSlot(meeting)));
}
