import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  BadRequestException,
  ConflictException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ErrorCode } from '@voicedesk/types';
import { MeetingStore } from '../scheduling/meeting-store.js';
import { SchedulerService } from '../scheduling/scheduler.service.js';
import { MeetingsController } from './meetings.controller.js';

describe('MeetingsController', () => {
  let dir: string;
  let controller: MeetingsController;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'voicedesk-meetings-'));
    const store = new MeetingStore(join(dir, 'meetings.json'));
    await store.load();
    const scheduler = new SchedulerService(store, { now: () => new Date('2024-01-08T08:00:00Z') });
    controller = new MeetingsController(scheduler);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a meeting and lists it', async () => {
    const created = await controller.create({ title: 'Sync', datetime: '2024-01-08T10:00:00', duration: 30 });

    expect(created.message).toBe('Meeting scheduled successfully for 2024-01-08 10:00');
    expect(controller.list()).toEqual([created.meeting]);
  });

  it('answers 409 for a taken slot', async () => {
    await controller.create({ title: 'Sync', datetime: '2024-01-09T10:00:00' });

    const error = await controller
      .create({ title: 'Clash', datetime: '2024-01-09T10:30:00' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConflictException);
    expect(error).toMatchObject({
      response: { code: ErrorCode.E_SLOT_CONFLICT, message: 'Time slot is not available' },
    });
  });

  it('answers 422 for a slot outside the rules', async () => {
    await expect(controller.create({ title: 'Sync', datetime: '2024-01-13T10:00:00' })).rejects.toBeInstanceOf(
      UnprocessableEntityException,
    );
  });

  it('answers 400 for malformed input', async () => {
    await expect(controller.create({ title: 'Sync', datetime: 'whenever' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
    expect(controller.list()).toEqual([]);
  });
});
