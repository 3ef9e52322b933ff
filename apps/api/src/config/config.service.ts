import { Injectable } from '@nestjs/common';
import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      if (!raw) return fallback;
      const parsed = Number(raw);
      return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
    });

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  MEETINGS_FILE: z.string().min(1).default('meetings.json'),
  SESSION_IDLE_TTL_SEC: positiveInt(15 * 60),
  SESSION_MAX_TURNS: positiveInt(20),
  SESSION_MAX_CALLS: positiveInt(1000),
  VOICE_GATHER_TIMEOUT_SEC: positiveInt(3),
  LOG_LEVEL: z.string().optional(),
  LOG_FILE: z.string().default('logs/voicedesk-api.log'),
  LOG_TO_CONSOLE: z.string().optional(),
  LLM_PROVIDER: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'] as const;
export type AppLogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is AppLogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

@Injectable()
export class ConfigService {
  readonly env: Env;

  constructor(source: NodeJS.ProcessEnv = process.env) {
    this.env = EnvSchema.parse(source);
  }

  get port(): number {
    return this.env.PORT;
  }

  get meetingsFile(): string {
    return this.env.MEETINGS_FILE;
  }

  get sessionIdleTtlMs(): number {
    return this.env.SESSION_IDLE_TTL_SEC * 1000;
  }

  get sessionMaxTurns(): number {
    return this.env.SESSION_MAX_TURNS;
  }

  get sessionMaxCalls(): number {
    return this.env.SESSION_MAX_CALLS;
  }

  get gatherTimeoutSeconds(): number {
    return this.env.VOICE_GATHER_TIMEOUT_SEC;
  }

  // Comma list, unknown entries dropped; defaults to log,error,warn
  get logLevels(): AppLogLevel[] {
    const raw = this.env.LOG_LEVEL;
    if (!raw) return ['log', 'error', 'warn'];
    const levels = raw
      .split(',')
      .map((level) => level.trim())
      .filter(isLogLevel);
    return levels.length > 0 ? levels : ['log', 'error', 'warn'];
  }

  get logFile(): string {
    return this.env.LOG_FILE;
  }

  get logToConsole(): boolean {
    return this.env.LOG_TO_CONSOLE !== 'false';
  }
}
