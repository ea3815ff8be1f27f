/**
 * Transcript Router Constants
 * Centralized configuration values for the routing and buffering modules
 *
 * Everything tunable about merging, speaker labelling and display lives here so
 * the behaviour of the three views can be adjusted without touching the logic.
 */

// =============================================================================
// Session Defaults
// =============================================================================

/** Primary party (Doctor) language used until configure() is called */
export const DEFAULT_PRIMARY_LANGUAGE = 'en';

/** Secondary party (Patient) language used until configure() is called */
export const DEFAULT_SECONDARY_LANGUAGE = 'te';

/** Label of the first diarized speaker */
export const DEFAULT_PRIMARY_LABEL = 'Doctor';

/** Label of the second diarized speaker */
export const DEFAULT_SECONDARY_LABEL = 'Patient';

/** Prefix of generated labels for the third and later speakers ("Speaker 3") */
export const ADDITIONAL_SPEAKER_LABEL_PREFIX = 'Speaker';

/** Language value for tokens that carry no language tag */
export const UNKNOWN_LANGUAGE = 'unknown';

/**
 * Speaker hints that carry no diarization signal (compared lower-cased)
 * "uu" is the recognizer's own marker for an unidentified speaker
 */
export const UNKNOWN_SPEAKER_HINTS: readonly string[] = ['unknown', 'uu', 'none', 'null'];

// =============================================================================
// Display
// =============================================================================

/** Trailing window of characters kept in each view snapshot */
export const DISPLAY_WINDOW_CHARS = 2000;

/** Snapshot text of a view with no content yet */
export const EMPTY_VIEW_PLACEHOLDER = '[Waiting for speech...]';

// =============================================================================
// Text Merging
// =============================================================================

/** Punctuation that attaches to the preceding word without a space */
export const CLAUSE_PUNCTUATION: ReadonlySet<string> = new Set(['.', ',', '!', '?', ';', ':']);

/** Characters that close a sentence and trigger a line flush (includes the Indic danda) */
export const SENTENCE_TERMINATORS: ReadonlySet<string> = new Set(['.', '!', '?', '।']);

/**
 * Scripts written without inter-word spacing in the recognizer output.
 * Fragments in these scripts are joined directly.
 */
export const JOINING_SCRIPTS = [
  'Devanagari',
  'Bengali',
  'Gurmukhi',
  'Gujarati',
  'Oriya',
  'Tamil',
  'Telugu',
  'Kannada',
  'Malayalam',
] as const;

/** Longest fragment that can be treated as a sub-word continuation */
export const SHORT_CONTINUATION_MAX_LENGTH = 2;

/**
 * Suffix fragments the recognizer emits as separate tokens ("Great" + "er").
 * Kept free of common standalone words ("a", "is", "to", "in") so real words still get a space.
 */
export const SHORT_CONTINUATIONS: ReadonlySet<string> = new Set([
  'er',
  'ed',
  'ly',
  's',
  'ty',
  'ry',
  'ic',
  'ng',
  'nt',
  'th',
]);

/** Recognizer control markers (endpoint / finalize) that are not speech */
export const CONTROL_TOKEN_PATTERN = /<(?:end|fin)>/gi;
