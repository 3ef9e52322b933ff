export const SESSION_OPTIONS = Symbol('SESSION_OPTIONS');

export interface CallSessionOptions {
  idleTtlMs: number;
  // Oldest messages are dropped beyond this many
  maxMessages: number;
  // Least recently active call is dropped beyond this many
  maxSessions: number;
}
