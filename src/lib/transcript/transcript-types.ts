/**
 * Types and interfaces for the transcript router
 */

/** Whether a token is the spoken text or a translation of it */
export type TranslationStatus = 'original' | 'translation';

/**
 * Session mode, derived from the configured party languages
 * - translation: two distinct languages, routing follows language tags
 * - same_language: one shared language, routing follows speakers
 */
export type SessionMode = 'translation' | 'same_language';

/** The three synchronized views */
export type ViewName = 'original' | 'primary' | 'secondary';

export const VIEW_NAMES: readonly ViewName[] = ['original', 'primary', 'secondary'];

/** Party a speaker label belongs to ("additional" for the third and later speakers) */
export type SpeakerRole = 'primary' | 'secondary' | 'additional';

/**
 * A recognized token after normalization
 * Immutable once produced by normalizeToken()
 */
export interface Token {
  /** Non-empty text, leading/trailing whitespace preserved for merging */
  text: string;
  /** Opaque diarization identifier, absent when the recognizer gave none */
  speakerHint?: string;
  /** Lower-cased language code or "unknown" */
  language: string;
  isFinal: boolean;
  status: TranslationStatus;
  /** ISO-8601 */
  timestamp: string;
}

/** A token with its resolved speaker label */
export interface RoutedToken extends Token {
  speaker: string;
  role: SpeakerRole;
}

/**
 * Raw entry kept for export, one per final token per view
 */
export interface TranscriptEntry {
  timestamp: string;
  speaker: string;
  text: string;
  language: string;
  status: TranslationStatus;
}

/** A sentence-complete display line */
export interface FinalizedLine {
  speaker: string;
  text: string;
  /** Timestamp of the first token of the line */
  timestamp: string;
}

/** Display text of the three views */
export interface BoxSnapshot {
  original: string;
  primary: string;
  secondary: string;
}

export interface PartyLanguages {
  primary: string;
  secondary: string;
}

export interface PartyLabels {
  primary: string;
  secondary: string;
}

/** Result of processToken() for a token that was not dropped */
export interface TokenProcessingResult {
  token: RoutedToken;
  /** Latest provisional text per speaker label */
  partials: Record<string, string>;
  /** View snapshot after a final token, null for partials */
  snapshot: BoxSnapshot | null;
}

export type SpeakerRegisteredCallback = (hint: string, label: string) => void;
export type LineFinalizedCallback = (view: ViewName, line: FinalizedLine) => void;
