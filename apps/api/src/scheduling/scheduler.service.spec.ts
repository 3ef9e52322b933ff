import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ErrorCode } from '@voicedesk/types';
import { MeetingStore } from './meeting-store.js';
import { SchedulerService } from './scheduler.service.js';
import type { Clock } from './scheduling.constants.js';

// Monday 08:00 UTC
const clock: Clock = { now: () => new Date('2024-01-08T08:00:00Z') };

describe('SchedulerService', () => {
  let dir: string;
  let store: MeetingStore;
  let scheduler: SchedulerService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'voicedesk-scheduler-'));
    store = new MeetingStore(join(dir, 'meetings.json'));
    await store.load();
    scheduler = new SchedulerService(store, clock);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('books a valid slot and persists it', async () => {
    const outcome = await scheduler.schedule({ title: 'Sync', datetime: '2024-01-08T10:00:00', duration: 30 });

    expect(outcome).toEqual({
      success: true,
      message: 'Meeting scheduled successfully for 2024-01-08 10:00',
      meeting: {
        summary: 'Sync',
        start: '2024-01-08T10:00:00+00:00',
        end: '2024-01-08T10:30:00+00:00',
        attendees: [],
      },
    });

    const reloaded = new MeetingStore(join(dir, 'meetings.json'));
    await reloaded.load();
    expect(reloaded.list()).toEqual(scheduler.listMeetings());
    expect(reloaded.size).toBe(1);
  });

  it('defaults to one hour and keeps attendees in order', async () => {
    const outcome = await scheduler.schedule({
      title: 'Planning',
      datetime: '2024-01-10T13:00:00Z',
      attendees: ['dana@example.com', 'eli@example.com'],
    });

    expect(outcome.success).toBe(true);
    expect(scheduler.listMeetings()).toEqual([
      {
        summary: 'Planning',
        start: '2024-01-10T13:00:00+00:00',
        end: '2024-01-10T14:00:00+00:00',
        attendees: ['dana@example.com', 'eli@example.com'],
      },
    ]);
  });

  it('normalizes offsets to UTC', async () => {
    await scheduler.schedule({ title: 'Remote', datetime: '2024-01-08T12:00:00+02:00', duration: 15 });

    expect(scheduler.listMeetings()[0]).toMatchObject({
      start: '2024-01-08T10:00:00+00:00',
      end: '2024-01-08T10:15:00+00:00',
    });
  });

  it('books meetings longer than a day when the end hour is inside business hours', async () => {
    const outcome = await scheduler.schedule({ title: 'Offsite', datetime: '2024-01-09T10:00:00', duration: 1500 });

    expect(outcome).toMatchObject({
      success: true,
      message: 'Meeting scheduled successfully for 2024-01-09 10:00',
      meeting: { start: '2024-01-09T10:00:00+00:00', end: '2024-01-10T11:00:00+00:00' },
    });
  });

  it('rejects weekends with the validation message', async () => {
    const outcome = await scheduler.schedule({ title: 'Sync', datetime: '2024-01-13T10:00:00' });

    expect(outcome.success).toBe(false);
    expect(outcome.message).toBe('Meetings cannot be scheduled on weekends');
    expect(outcome).toMatchObject({ error: { kind: 'validation', code: ErrorCode.E_SLOT_INVALID } });
    expect(scheduler.listMeetings()).toEqual([]);
  });

  it('rejects short notice without touching the store', async () => {
    const outcome = await scheduler.schedule({ title: 'Now', datetime: '2024-01-08T08:30:00' });

    expect(outcome.message).toBe('Meeting must be scheduled at least 1 hour in advance');
    expect(scheduler.listMeetings()).toHaveLength(0);
  });

  it('rejects overlaps but allows touching slots', async () => {
    const first = await scheduler.schedule({ title: 'A', datetime: '2024-01-09T10:00:00' });
    const overlapping = await scheduler.schedule({ title: 'B', datetime: '2024-01-09T10:30:00' });
    const touching = await scheduler.schedule({ title: 'C', datetime: '2024-01-09T11:00:00' });

    expect(first.success).toBe(true);
    expect(overlapping).toEqual({
      success: false,
      message: 'Time slot is not available',
      error: {
        code: ErrorCode.E_SLOT_CONFLICT,
        kind: 'conflict',
        message: 'Time slot is not available',
        metadata: { start: '2024-01-09T10:30:00+00:00', end: '2024-01-09T11:30:00+00:00' },
      },
    });
    expect(touching.success).toBe(true);
    expect(scheduler.listMeetings().map((m) => m.summary)).toEqual(['A', 'C']);
  });

  it('books only one of two concurrent requests for the same slot', async () => {
    const [left, right] = await Promise.all([
      scheduler.schedule({ title: 'Left', datetime: '2024-01-09T10:00:00' }),
      scheduler.schedule({ title: 'Right', datetime: '2024-01-09T10:00:00' }),
    ]);

    expect(left.success).toBe(true);
    expect(right.success).toBe(false);
    expect(right.message).toBe('Time slot is not available');
    expect(scheduler.listMeetings()).toHaveLength(1);
  });

  it('reports unparsable datetimes as malformed input', async () => {
    const outcome = await scheduler.schedule({ title: 'Sync', datetime: 'next tuesday' });

    expect(outcome).toMatchObject({
      success: false,
      message: 'Failed to schedule meeting: "next tuesday" is not a valid ISO-8601 date or date-time',
      error: { kind: 'malformed_input', code: ErrorCode.E_INPUT_MALFORMED },
    });
  });

  it('reports missing fields as malformed input', async () => {
    const outcome = await scheduler.schedule({ datetime: '2024-01-09T10:00:00' });

    expect(outcome.message).toBe('Failed to schedule meeting: title: Required');
    expect(outcome).toMatchObject({ error: { kind: 'malformed_input' } });
  });

  it('rejects a non-positive duration', async () => {
    const outcome = await scheduler.scheduleMeeting({
      summary: 'Sync',
      start: '2024-01-09T10:00:00',
      durationMinutes: 0,
    });

    expect(outcome.message).toBe('Failed to schedule meeting: duration must be a positive number of minutes');
  });

  it('reports storage failures separately from bad requests', async () => {
    // replace the data directory with a plain file so the write fails
    await rm(dir, { recursive: true, force: true });
    await writeFile(dir, 'not a directory', 'utf8');

    const outcome = await scheduler.schedule({ title: 'Sync', datetime: '2024-01-09T10:00:00' });

    expect(outcome).toMatchObject({
      success: false,
      message: 'Meeting storage is unavailable, please try again later',
      error: { kind: 'storage', code: ErrorCode.E_STORAGE_UNAVAILABLE },
    });
    expect(scheduler.listMeetings()).toEqual([]);
  });
});
