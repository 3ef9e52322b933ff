import { describe, it, expect, vi } from 'vitest';
import { extractMeetingDetails, sliceJson } from '../nodes/extractMeetingDetails.js';
import type { LLM } from '../llm/types.js';

const now = new Date('2024-01-08T08:00:00Z');

const llmAnswering = (answer: string): LLM => ({
  text: vi.fn<LLM['text']>().mockResolvedValue(answer),
  chat: vi.fn<LLM['chat']>(),
});

describe('sliceJson', () => {
  it('strips code fences around the object', () => {
    expect(sliceJson('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('extractMeetingDetails', () => {
  it('returns validated details', async () => {
    const llm = llmAnswering(
      '{"title":"Sync","datetime":"2024-01-08T10:00:00","duration":30,"attendees":["dana@example.com"]}',
    );

    await expect(extractMeetingDetails(llm, 'Sync at ten for half an hour with Dana', now)).resolves.toEqual({
      title: 'Sync',
      datetime: '2024-01-08T10:00:00',
      duration: 30,
      attendees: ['dana@example.com'],
    });
  });

  it('normalizes loosely typed fields', async () => {
    const llm = llmAnswering(
      'Here you go: {"title":" Budget review ","datetime":"2024-01-09T14:00:00","duration":"45","attendees":"Ann, Bob"}',
    );

    await expect(extractMeetingDetails(llm, 'budget review', now)).resolves.toEqual({
      title: 'Budget review',
      datetime: '2024-01-09T14:00:00',
      duration: 45,
      attendees: ['Ann', 'Bob'],
    });
  });

  it('includes the current time in the prompt', async () => {
    const llm = llmAnswering('{}');

    await extractMeetingDetails(llm, 'next monday', now);

    expect(vi.mocked(llm.text).mock.calls[0]?.[0].system).toContain('2024-01-08T08:00:00.000Z');
  });

  it('returns null when no date was given', async () => {
    const llm = llmAnswering('{"title": null, "datetime": null}');

    await expect(extractMeetingDetails(llm, 'just chatting', now)).resolves.toBeNull();
  });

  it('returns null for non-JSON output', async () => {
    const llm = llmAnswering('Sorry, I cannot help with that.');

    await expect(extractMeetingDetails(llm, 'book something', now)).resolves.toBeNull();
  });
});
