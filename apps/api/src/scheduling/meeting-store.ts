import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { type Meeting, MeetingList, StorageError } from '@voicedesk/types';
import { MEETINGS_FILE } from './scheduling.constants.js';
import { parseIsoTimestamp } from './datetime.js';

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Insertion-ordered meeting list backed by a JSON file.
 *
 * Every append rewrites the whole file (temp file + rename) before it
 * resolves. Callers are expected to serialize appends; see SchedulerService.
 */
@Injectable()
export class MeetingStore implements OnModuleInit {
  private readonly logger = new Logger(MeetingStore.name);
  private readonly filePath: string;
  private meetings: Meeting[] = [];

  constructor(@Inject(MEETINGS_FILE) filePath: string) {
    this.filePath = resolve(process.cwd(), filePath);
  }

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  get size(): number {
    return this.meetings.length;
  }

  /**
   * Reads the file, or creates it empty when it does not exist yet.
   * @throws StorageError when the file cannot be read or holds invalid data
   */
  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (e) {
      if (!isNotFound(e)) throw new StorageError('read', this.filePath, e);
      this.logger.log(`No meeting store at ${this.filePath}; creating an empty one`);
      this.meetings = [];
      await this.persist();
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      throw new StorageError('read', this.filePath, e);
    }

    const parsed = MeetingList.safeParse(data);
    if (!parsed.success) {
      throw new StorageError('read', this.filePath, parsed.error.issues[0]?.message ?? 'invalid meeting list');
    }

    const unreadable = parsed.data.find(
      (m) => parseIsoTimestamp(m.start) === null || parseIsoTimestamp(m.end) === null,
    );
    if (unreadable) {
      throw new StorageError('read', this.filePath, `meeting "${unreadable.summary}" has an invalid timestamp`);
    }

    this.meetings = parsed.data;
    this.logger.log(`Loaded ${this.meetings.length} meeting(s) from ${this.filePath}`);
  }

  /** Live read-only view, for scans inside the write queue. */
  all(): readonly Meeting[] {
    return this.meetings;
  }

  /** Snapshot copy; mutating it does not touch the store. */
  list(): Meeting[] {
    return this.meetings.map((m) => ({ ...m, attendees: [...m.attendees] }));
  }

  /**
   * Appends and flushes. On a failed write the meeting is dropped again so the
   * in-memory list matches the file.
   * @throws StorageError
   */
  async append(meeting: Meeting): Promise<void> {
    this.meetings.push(meeting);
    try {
      await this.persist();
    } catch (e) {
      this.meetings.pop();
      throw e;
    }
  }

  private async persist(): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(this.meetings, null, 2)}\n`, 'utf8');
      await rename(tmpPath, this.filePath);
    } catch (e) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove ${tmpPath}: ${String(cleanupError)}`);
      });
      throw new StorageError('write', this.filePath, e);
    }
  }
}
