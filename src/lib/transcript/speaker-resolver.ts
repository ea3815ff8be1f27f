/**
 * SpeakerResolver - assigns a stable speaker label to every token
 *
 * Three signals, tried in order:
 * 1. Diarization hint from the recognizer (registered first-come: Doctor, Patient, Speaker 3...)
 * 2. Language tag, in translation mode only (each party speaks its own language,
 *    so a translation belongs to the party whose language it is not)
 * 3. Turn alternation, when neither signal is available
 *
 * Diarization is least reliable in same-language sessions, where the language
 * tag cannot separate the parties either, so tier 3 is the last resort there.
 */

import { devLog } from '../utils';
import {
  ADDITIONAL_SPEAKER_LABEL_PREFIX,
  UNKNOWN_LANGUAGE,
  UNKNOWN_SPEAKER_HINTS,
} from './transcript-constants';
import type {
  PartyLabels,
  PartyLanguages,
  SpeakerRegisteredCallback,
  SpeakerRole,
  Token,
} from './transcript-types';

// =============================================================================
// Types
// =============================================================================

/** Which signal produced a resolution */
export type ResolutionSource = 'diarization' | 'language' | 'turn';

export interface SpeakerResolution {
  label: string;
  role: SpeakerRole;
  source: ResolutionSource;
}

export interface SpeakerAssignment {
  hint: string;
  label: string;
  role: SpeakerRole;
}

export interface SpeakerResolverOptions {
  labels: PartyLabels;
  languages: PartyLanguages;
  additionalLabelPrefix?: string;
  unknownHints?: readonly string[];
  onSpeakerRegistered?: SpeakerRegisteredCallback;
}

// =============================================================================
// Speaker Registry
// =============================================================================

/**
 * Insertion-ordered hint → label mapping
 *
 * The first hint seen becomes the primary party, the second the secondary party,
 * later hints get generated labels. Assignments are never changed or removed
 * within a session.
 */
export class SpeakerRegistry {
  private readonly assignments = new Map<string, SpeakerAssignment>();

  constructor(
    private readonly labels: PartyLabels,
    private readonly additionalLabelPrefix: string = ADDITIONAL_SPEAKER_LABEL_PREFIX
  ) {}

  lookup(hint: string): SpeakerAssignment | undefined {
    return this.assignments.get(hint);
  }

  /**
   * Return the assignment for a hint, registering it if it is new
   */
  register(hint: string): { assignment: SpeakerAssignment; created: boolean } {
    const existing = this.lookup(hint);
    if (existing) {
      return { assignment: existing, created: false };
    }

    const position = this.assignments.size + 1;
    let assignment: SpeakerAssignment;
    if (position === 1) {
      assignment = { hint, label: this.labels.primary, role: 'primary' };
    } else if (position === 2) {
      assignment = { hint, label: this.labels.secondary, role: 'secondary' };
    } else {
      assignment = { hint, label: `${this.additionalLabelPrefix} ${position}`, role: 'additional' };
    }

    this.assignments.set(hint, assignment);
    return { assignment, created: true };
  }

  get size(): number {
    return this.assignments.size;
  }

  /** Assignments in registration order */
  entries(): SpeakerAssignment[] {
    return [...this.assignments.values()].map((assignment) => ({ ...assignment }));
  }

  clear(): void {
    this.assignments.clear();
  }
}

// =============================================================================
// Turn Alternator
// =============================================================================

type PartyRole = 'primary' | 'secondary';

/**
 * Best-effort turn taking for streams without any speaker signal.
 * The first turn belongs to the primary party; each completed sentence hands
 * the turn to the other party.
 */
export class TurnAlternator {
  private activeRole: PartyRole | null = null;

  /** Current turn holder, starting the alternation on first use */
  current(): PartyRole {
    if (this.activeRole === null) {
      this.activeRole = 'primary';
    }
    return this.activeRole;
  }

  /** Hand the turn to the other party */
  advance(): void {
    if (this.activeRole === null) return;
    this.activeRole = this.activeRole === 'primary' ? 'secondary' : 'primary';
  }

  reset(): void {
    this.activeRole = null;
  }
}

// =============================================================================
// Speaker Resolver
// =============================================================================

export class SpeakerResolver {
  private readonly registry: SpeakerRegistry;
  private readonly turns = new TurnAlternator();
  private readonly unknownHints: ReadonlySet<string>;
  private readonly labels: PartyLabels;
  private readonly languages: PartyLanguages;
  private readonly onSpeakerRegistered?: SpeakerRegisteredCallback;

  constructor(options: SpeakerResolverOptions) {
    this.labels = { ...options.labels };
    this.languages = { ...options.languages };
    this.registry = new SpeakerRegistry(this.labels, options.additionalLabelPrefix);
    this.unknownHints = new Set(
      (options.unknownHints ?? UNKNOWN_SPEAKER_HINTS).map((hint) => hint.toLowerCase())
    );
    this.onSpeakerRegistered = options.onSpeakerRegistered;
  }

  /**
   * Resolve the speaker of a token. Never fails.
   */
  resolve(token: Pick<Token, 'speakerHint' | 'language'> & Partial<Pick<Token, 'status'>>): SpeakerResolution {
    const hint = token.speakerHint?.trim();
    if (hint && !this.unknownHints.has(hint.toLowerCase())) {
      const { assignment, created } = this.registry.register(hint);
      if (created) {
        devLog(`[TranscriptRouter] Registered speaker hint ${hint} as ${assignment.label}`);
        this.onSpeakerRegistered?.(hint, assignment.label);
      }
      return { label: assignment.label, role: assignment.role, source: 'diarization' };
    }

    if (this.isTranslationMode() && token.language !== UNKNOWN_LANGUAGE) {
      // A translation is rendered in the listener's language, not the speaker's
      const translated = token.status === 'translation';
      if (token.language === this.languages.primary) {
        return this.languageResolution(translated ? 'secondary' : 'primary');
      }
      if (token.language === this.languages.secondary) {
        return this.languageResolution(translated ? 'primary' : 'secondary');
      }
    }

    const role = this.turns.current();
    return { label: this.labels[role], role, source: 'turn' };
  }

  private languageResolution(role: PartyRole): SpeakerResolution {
    return { label: this.labels[role], role, source: 'language' };
  }

  /**
   * Called after a sentence-terminal flush; only turn-based resolutions
   * move the alternation forward
   */
  noteSentenceBoundary(resolution: SpeakerResolution): void {
    if (resolution.source !== 'turn') return;
    this.turns.advance();
    devLog(`[TranscriptRouter] Turn passed to ${this.labels[this.turns.current()]}`);
  }

  isTranslationMode(): boolean {
    return this.languages.primary !== this.languages.secondary;
  }

  getSpeakers(): SpeakerAssignment[] {
    return this.registry.entries();
  }

  reset(): void {
    this.registry.clear();
    this.turns.reset();
  }
}
