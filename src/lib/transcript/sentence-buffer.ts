/**
 * SentenceBuffer - per-view accumulator of final tokens
 *
 * One instance backs each of the three views. It holds the sentence in
 * progress for the current speaker, the finalized display lines and the raw
 * entry log used for export.
 *
 * State transitions:
 * - idle -> accumulating (first final token)
 * - accumulating -> accumulating (same speaker, sentence still open)
 * - accumulating -> idle (merged text ends a sentence: flush)
 * - accumulating -> accumulating (speaker change: flush previous speaker's line first)
 */

import { endsSentence, mergeText } from './text-merge';
import type {
  FinalizedLine,
  TranscriptEntry,
  TranslationStatus,
  ViewName,
} from './transcript-types';
import { VIEW_NAMES } from './transcript-types';

// =============================================================================
// Types
// =============================================================================

export type SentenceBufferState = 'idle' | 'accumulating';

export interface AppendMetadata {
  timestamp: string;
  language: string;
  status: TranslationStatus;
}

export interface AppendResult {
  /** Lines finalized by this call, oldest first (at most two) */
  flushed: FinalizedLine[];
  /** True when the merged text ended a sentence and was flushed */
  sentenceComplete: boolean;
}

export interface PendingSentence {
  speaker: string;
  text: string;
  startedAt: string;
}

/** Render a finalized line as shown in the views */
export function formatLine(line: Pick<FinalizedLine, 'speaker' | 'text'>): string {
  return `[${line.speaker}]: ${line.text}`;
}

// =============================================================================
// Sentence Buffer
// =============================================================================

export class SentenceBuffer {
  private pending: PendingSentence | null = null;
  private lines: FinalizedLine[] = [];
  /** Rendered finalized lines, extended on each flush */
  private renderedLines = '';
  private entries: TranscriptEntry[] = [];

  constructor(readonly view: ViewName) {}

  getState(): SentenceBufferState {
    return this.pending ? 'accumulating' : 'idle';
  }

  /**
   * Add a final token spoken by `speaker`
   *
   * Every call is recorded in the entry log; display lines only change when a
   * sentence completes or the speaker changes.
   */
  appendFinal(speaker: string, text: string, meta: AppendMetadata): AppendResult {
    const flushed: FinalizedLine[] = [];

    this.entries.push({
      timestamp: meta.timestamp,
      speaker,
      text,
      language: meta.language,
      status: meta.status,
    });

    if (this.pending && this.pending.speaker !== speaker) {
      const previous = this.flush();
      if (previous) flushed.push(previous);
    }

    if (this.pending) {
      this.pending.text = mergeText(this.pending.text, text);
    } else {
      const opening = text.trimStart();
      if (!opening) {
        return { flushed, sentenceComplete: false };
      }
      this.pending = { speaker, text: opening, startedAt: meta.timestamp };
    }

    if (endsSentence(this.pending.text)) {
      const line = this.flush();
      if (line) flushed.push(line);
      return { flushed, sentenceComplete: true };
    }

    return { flushed, sentenceComplete: false };
  }

  /**
   * Finalize the sentence in progress, if any
   */
  flush(): FinalizedLine | null {
    if (!this.pending) return null;

    const text = this.pending.text.trimEnd();
    const line: FinalizedLine = {
      speaker: this.pending.speaker,
      text,
      timestamp: this.pending.startedAt,
    };
    this.pending = null;

    if (!text) return null;
    this.lines.push(line);
    const rendered = formatLine(line);
    this.renderedLines = this.renderedLines ? `${this.renderedLines}\n${rendered}` : rendered;
    return { ...line };
  }

  getPending(): PendingSentence | null {
    return this.pending ? { ...this.pending } : null;
  }

  getLines(): FinalizedLine[] {
    return this.lines.map((line) => ({ ...line }));
  }

  getEntries(): TranscriptEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Finalized lines only */
  finalizedText(): string {
    return this.renderedLines;
  }

  /** Finalized lines followed by the sentence in progress */
  render(): string {
    if (!this.pending) return this.renderedLines;
    const pending = formatLine(this.pending);
    return this.renderedLines ? `${this.renderedLines}\n${pending}` : pending;
  }

  reset(): void {
    this.pending = null;
    this.lines = [];
    this.renderedLines = '';
    this.entries = [];
  }
}

// =============================================================================
// Sentence Buffer Bank
// =============================================================================

/**
 * The three per-view accumulators of one session
 */
export class SentenceBufferBank {
  private readonly buffers: Record<ViewName, SentenceBuffer> = {
    original: new SentenceBuffer('original'),
    primary: new SentenceBuffer('primary'),
    secondary: new SentenceBuffer('secondary'),
  };

  get(view: ViewName): SentenceBuffer {
    return this.buffers[view];
  }

  /**
   * Finalize every view's sentence in progress (end of session)
   */
  flushAll(): Array<{ view: ViewName; line: FinalizedLine }> {
    const flushed: Array<{ view: ViewName; line: FinalizedLine }> = [];
    for (const view of VIEW_NAMES) {
      const line = this.buffers[view].flush();
      if (line) flushed.push({ view, line });
    }
    return flushed;
  }

  reset(): void {
    for (const view of VIEW_NAMES) {
      this.buffers[view].reset();
    }
  }
}
