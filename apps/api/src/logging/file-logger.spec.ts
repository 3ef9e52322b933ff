import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Test } from '@nestjs/testing';
import { ConfigModule } from '../config/config.module.js';
import { ConfigService } from '../config/config.service.js';
import { FileLogger, serializeLogEntry } from './file-logger.js';
import { LoggingModule } from './logging.module.js';

describe('serializeLogEntry', () => {
  it('renders objects as JSON and errors by stack', () => {
    expect(serializeLogEntry({ callId: 'CA-1' })).toBe('{"callId":"CA-1"}');
    expect(serializeLogEntry(42)).toBe('42');
    const err = new Error('boom');
    expect(serializeLogEntry(err)).toBe(err.stack);
  });
});

describe('FileLogger', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('appends enabled levels to the log file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'voicedesk-log-'));
    const logFilePath = join(dir, 'nested', 'api.log');
    const logger = new FileLogger('Test', { logFilePath, levels: ['log', 'warn'], mirrorToConsole: false });

    logger.log('meeting booked', { id: 1 });
    logger.debug('not written');
    logger.warn('slow disk');
    await logger.close();

    const lines = (await readFile(logFilePath, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[LOG\] meeting booked \{"id":1\}$/);
    expect(lines[1]).toMatch(/\[WARN\] slow disk$/);
  });

  it('flushes and closes the log file when the application shuts down', async () => {
    dir = await mkdtemp(join(tmpdir(), 'voicedesk-log-'));
    const logFilePath = join(dir, 'api.log');
    const moduleRef = await Test.createTestingModule({ imports: [ConfigModule, LoggingModule] })
      .overrideProvider(ConfigService)
      .useValue(new ConfigService({ LOG_FILE: logFilePath, LOG_TO_CONSOLE: 'false' }))
      .compile();

    moduleRef.get(FileLogger).log('booted');
    await moduleRef.close();

    const contents = await readFile(logFilePath, 'utf8');
    expect(contents).toMatch(/^\[[^\]]+\] \[LOG\] booted\n$/);
  });
});
