/**
 * Unit tests for src/lib/transcript/sentence-buffer.ts
 */

import { SentenceBuffer, SentenceBufferBank, formatLine } from '../sentence-buffer';
import type { AppendMetadata } from '../sentence-buffer';

// ============================================================================
// Test Helpers
// ============================================================================

function meta(second: number, language = 'en'): AppendMetadata {
  return {
    timestamp: `2026-01-05T10:00:0${second}.000Z`,
    language,
    status: 'original',
  };
}

// ============================================================================
// formatLine TESTS
// ============================================================================

describe('formatLine', () => {
  it('should prefix the text with the speaker label', () => {
    expect(formatLine({ speaker: 'Doctor', text: 'Hello.' })).toBe('[Doctor]: Hello.');
  });
});

// ============================================================================
// SentenceBuffer TESTS
// ============================================================================

describe('SentenceBuffer', () => {
  let buffer: SentenceBuffer;

  beforeEach(() => {
    buffer = new SentenceBuffer('original');
  });

  it('should start idle and empty', () => {
    expect(buffer.getState()).toBe('idle');
    expect(buffer.getPending()).toBeNull();
    expect(buffer.render()).toBe('');
  });

  it('should accumulate fragments of one speaker', () => {
    const result = buffer.appendFinal('Doctor', 'Hello', meta(1));

    expect(result).toEqual({ flushed: [], sentenceComplete: false });
    expect(buffer.getState()).toBe('accumulating');
    expect(buffer.getPending()).toEqual({
      speaker: 'Doctor',
      text: 'Hello',
      startedAt: '2026-01-05T10:00:01.000Z',
    });
  });

  it('should flush when the merged text ends a sentence', () => {
    buffer.appendFinal('Doctor', 'Hello', meta(1));
    const result = buffer.appendFinal('Doctor', ' world.', meta(2));

    expect(result).toEqual({
      flushed: [{ speaker: 'Doctor', text: 'Hello world.', timestamp: '2026-01-05T10:00:01.000Z' }],
      sentenceComplete: true,
    });
    expect(buffer.getState()).toBe('idle');
    expect(buffer.render()).toBe('[Doctor]: Hello world.');
  });

  it('should flush the previous speaker on speaker change', () => {
    buffer.appendFinal('Doctor', 'How are you', meta(1));
    const result = buffer.appendFinal('Patient', 'Fine', meta(2));

    expect(result.flushed).toEqual([
      { speaker: 'Doctor', text: 'How are you', timestamp: '2026-01-05T10:00:01.000Z' },
    ]);
    expect(result.sentenceComplete).toBe(false);
    expect(buffer.finalizedText()).toBe('[Doctor]: How are you');
    expect(buffer.render()).toBe('[Doctor]: How are you\n[Patient]: Fine');
  });

  it('should report both lines when a speaker change also ends a sentence', () => {
    buffer.appendFinal('Doctor', 'Hi', meta(1));
    const result = buffer.appendFinal('Patient', 'Hello.', meta(2));

    expect(result.flushed.map((line) => line.speaker)).toEqual(['Doctor', 'Patient']);
    expect(result.sentenceComplete).toBe(true);
  });

  it('should trim leading whitespace of a new sentence', () => {
    buffer.appendFinal('Doctor', '  Hello', meta(1));
    expect(buffer.getPending()?.text).toBe('Hello');
  });

  it('should not open a sentence from whitespace alone', () => {
    const result = buffer.appendFinal('Doctor', '   ', meta(1));

    expect(result).toEqual({ flushed: [], sentenceComplete: false });
    expect(buffer.getState()).toBe('idle');
    expect(buffer.getEntries()).toHaveLength(1);
  });

  it('should trim trailing whitespace when flushing', () => {
    buffer.appendFinal('Doctor', 'Hello ', meta(1));

    expect(buffer.flush()).toEqual({
      speaker: 'Doctor',
      text: 'Hello',
      timestamp: '2026-01-05T10:00:01.000Z',
    });
    expect(buffer.getState()).toBe('idle');
  });

  it('should return null when flushing an idle buffer', () => {
    expect(buffer.flush()).toBeNull();
  });

  it('should record every appended token as an entry', () => {
    buffer.appendFinal('Patient', 'నేను', meta(1, 'te'));
    buffer.appendFinal('Patient', ' బాగున్నాను.', meta(2, 'te'));

    expect(buffer.getEntries()).toEqual([
      { timestamp: '2026-01-05T10:00:01.000Z', speaker: 'Patient', text: 'నేను', language: 'te', status: 'original' },
      { timestamp: '2026-01-05T10:00:02.000Z', speaker: 'Patient', text: ' బాగున్నాను.', language: 'te', status: 'original' },
    ]);
    expect(buffer.render()).toBe('[Patient]: నేను బాగున్నాను.');
  });

  it('should keep rendered text in step with flushed lines', () => {
    buffer.appendFinal('Doctor', 'One.', meta(1));
    buffer.appendFinal('Patient', 'Two.', meta(2));
    buffer.appendFinal('Doctor', 'Three', meta(3));

    expect(buffer.finalizedText()).toBe('[Doctor]: One.\n[Patient]: Two.');
    expect(buffer.render()).toBe('[Doctor]: One.\n[Patient]: Two.\n[Doctor]: Three');

    buffer.flush();
    expect(buffer.render()).toBe('[Doctor]: One.\n[Patient]: Two.\n[Doctor]: Three');

    buffer.reset();
    buffer.appendFinal('Patient', 'Four.', meta(4));
    expect(buffer.render()).toBe('[Patient]: Four.');
  });

  it('should return copies from getters', () => {
    buffer.appendFinal('Doctor', 'Hello.', meta(1));

    buffer.getLines()[0].text = 'Changed';
    buffer.getEntries()[0].text = 'Changed';

    expect(buffer.getLines()[0].text).toBe('Hello.');
    expect(buffer.getEntries()[0].text).toBe('Hello.');
  });

  it('should clear everything on reset()', () => {
    buffer.appendFinal('Doctor', 'Hello.', meta(1));
    buffer.appendFinal('Doctor', 'More', meta(2));

    buffer.reset();

    expect(buffer.getState()).toBe('idle');
    expect(buffer.getLines()).toEqual([]);
    expect(buffer.getEntries()).toEqual([]);
  });
});

// ============================================================================
// SentenceBufferBank TESTS
// ============================================================================

describe('SentenceBufferBank', () => {
  it('should hold one buffer per view', () => {
    const bank = new SentenceBufferBank();
    expect(bank.get('original').view).toBe('original');
    expect(bank.get('primary').view).toBe('primary');
    expect(bank.get('secondary').view).toBe('secondary');
  });

  it('should flush pending sentences in view order', () => {
    const bank = new SentenceBufferBank();
    bank.get('secondary').appendFinal('Patient', 'Okay', meta(2));
    bank.get('original').appendFinal('Doctor', 'Thanks', meta(1));

    expect(bank.flushAll()).toEqual([
      { view: 'original', line: { speaker: 'Doctor', text: 'Thanks', timestamp: '2026-01-05T10:00:01.000Z' } },
      { view: 'secondary', line: { speaker: 'Patient', text: 'Okay', timestamp: '2026-01-05T10:00:02.000Z' } },
    ]);
    expect(bank.flushAll()).toEqual([]);
  });

  it('should reset every buffer', () => {
    const bank = new SentenceBufferBank();
    bank.get('primary').appendFinal('Doctor', 'Hello.', meta(1));

    bank.reset();

    expect(bank.get('primary').render()).toBe('');
  });
});
