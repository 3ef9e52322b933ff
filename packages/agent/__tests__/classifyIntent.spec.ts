import { describe, it, expect, vi } from 'vitest';
import { classifyIntent, parseIntent } from '../nodes/classifyIntent.js';
import { INTENT_SYSTEM } from '../prompts/INTENT_SYSTEM.js';
import type { LLM } from '../llm/types.js';

const makeLlm = (text: LLM['text']): LLM => ({
  text,
  chat: vi.fn<LLM['chat']>(),
});

describe('parseIntent', () => {
  it('accepts the bare label in any casing and punctuation', () => {
    expect(parseIntent('Scheduling.')).toBe('scheduling');
    expect(parseIntent("'scheduling'")).toBe('scheduling');
    expect(parseIntent('conversation')).toBe('conversation');
  });

  it('treats unknown answers as conversation', () => {
    expect(parseIntent('I am not sure')).toBe('conversation');
    expect(parseIntent('')).toBe('conversation');
  });
});

describe('classifyIntent', () => {
  it('asks the model with the intent prompt', async () => {
    const text = vi.fn<LLM['text']>().mockResolvedValue('scheduling');

    const intent = await classifyIntent(makeLlm(text), 'Book me in with Dana tomorrow at ten');

    expect(intent).toBe('scheduling');
    expect(text).toHaveBeenCalledWith(
      expect.objectContaining({
        system: INTENT_SYSTEM,
        user: 'Book me in with Dana tomorrow at ten',
        temperature: 0,
      }),
    );
  });

  it('skips the model for empty speech', async () => {
    const text = vi.fn<LLM['text']>();

    expect(await classifyIntent(makeLlm(text), '   ')).toBe('conversation');
    expect(text).not.toHaveBeenCalled();
  });

  it('falls back to conversation when the model call fails', async () => {
    const text = vi.fn<LLM['text']>().mockRejectedValue(new Error('timeout'));

    expect(await classifyIntent(makeLlm(text), 'hello there')).toBe('conversation');
  });
});
