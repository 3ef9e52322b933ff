import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { LRUCache } from 'lru-cache';
import type { ConversationMessage } from '@voicedesk/types';
import { SESSION_OPTIONS, type CallSessionOptions } from './voice.tokens.js';

interface CallSession {
  callId: string;
  messages: ConversationMessage[];
}

/**
 * Conversation history per telephony call.
 *
 * A session starts with the first message of a call and ends when the call
 * completes, when it has been idle longer than `idleTtlMs`, or with the
 * process. At most `maxSessions` calls are held; the least recently active
 * one goes first. History is capped at `maxMessages`.
 */
@Injectable()
export class CallSessionStore implements OnModuleDestroy {
  private readonly logger = new Logger(CallSessionStore.name);
  private readonly sessions: LRUCache<string, CallSession>;

  constructor(@Inject(SESSION_OPTIONS) private readonly options: CallSessionOptions) {
    this.sessions = new LRUCache<string, CallSession>({
      max: options.maxSessions,
      ttl: options.idleTtlMs,
      updateAgeOnGet: true,
      dispose: (_session, callId, reason) => {
        if (reason === 'evict' || reason === 'expire') {
          this.logger.debug(`Session for call ${callId} dropped (${reason})`);
        }
      },
    });
  }

  onModuleDestroy(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }

  has(callId: string): boolean {
    return this.sessions.has(callId);
  }

  append(callId: string, message: ConversationMessage): ConversationMessage[] {
    let session = this.sessions.get(callId);
    if (!session) {
      session = { callId, messages: [] };
      this.sessions.set(callId, session);
      this.logger.debug(`Session opened for call ${callId}`);
    }

    session.messages.push(message);
    if (session.messages.length > this.options.maxMessages) {
      session.messages.splice(0, session.messages.length - this.options.maxMessages);
    }
    return [...session.messages];
  }

  // Reading the history does not count as activity.
  history(callId: string): ConversationMessage[] {
    return [...(this.sessions.peek(callId)?.messages ?? [])];
  }

  end(callId: string): boolean {
    const removed = this.sessions.delete(callId);
    if (removed) this.logger.debug(`Session closed for call ${callId}`);
    return removed;
  }
}
