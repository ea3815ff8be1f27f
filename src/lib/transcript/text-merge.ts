/**
 * Text merge utilities for the transcript router
 * Pure functions for joining recognizer fragments across script families
 *
 * The recognizer streams text in fragments whose boundaries do not line up with
 * words: Latin fragments need a space between words, Indic fragments must be
 * joined directly, and punctuation attaches to the word before it. These
 * functions have no side effects and depend only on their inputs.
 */

import {
  CLAUSE_PUNCTUATION,
  JOINING_SCRIPTS,
  SENTENCE_TERMINATORS,
  SHORT_CONTINUATIONS,
  SHORT_CONTINUATION_MAX_LENGTH,
} from './transcript-constants';

// =============================================================================
// Character Classification
// =============================================================================

const JOINING_SCRIPT_PATTERN = new RegExp(
  `[${JOINING_SCRIPTS.map((script) => `\\p{Script=${script}}`).join('')}]`,
  'u'
);
const WHITESPACE_PATTERN = /\s/u;
const ALPHANUMERIC_PATTERN = /[\p{L}\p{N}]/u;

/**
 * Whether a character belongs to a script joined without inter-word spacing
 */
export function usesJoiningScript(char: string): boolean {
  return JOINING_SCRIPT_PATTERN.test(char);
}

export function isClausePunctuation(char: string): boolean {
  return CLAUSE_PUNCTUATION.has(char);
}

function isWhitespace(char: string): boolean {
  return WHITESPACE_PATTERN.test(char);
}

function isAlphanumeric(char: string): boolean {
  return ALPHANUMERIC_PATTERN.test(char);
}

/** First code point of a string (surrogate pairs kept whole) */
function firstChar(text: string): string {
  const codePoint = text.codePointAt(0);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

/** Last code point of a string (surrogate pairs kept whole) */
function lastChar(text: string): string {
  if (text.length > 1) {
    const last = text.charCodeAt(text.length - 1);
    if (last >= 0xdc00 && last <= 0xdfff) {
      return text.slice(-2);
    }
  }
  return text.slice(-1);
}

/**
 * Whether a fragment is a sub-word continuation such as a suffix ("er", "ly")
 * that the recognizer split off the previous word
 */
export function isShortContinuation(fragment: string): boolean {
  return (
    Array.from(fragment).length <= SHORT_CONTINUATION_MAX_LENGTH &&
    SHORT_CONTINUATIONS.has(fragment.toLowerCase())
  );
}

// =============================================================================
// Merging
// =============================================================================

/**
 * Join two recognizer fragments without corrupting word boundaries
 *
 * Rules, first match wins:
 * 1. incoming starts with whitespace: it brings its own separation
 * 2. either boundary character is in a joining script (Telugu, Devanagari, ...): no space
 * 3. existing ends with whitespace: no extra space
 * 4. incoming starts with clause punctuation: no space before punctuation
 * 5. existing ends with clause punctuation: one space
 * 6. both boundaries alphanumeric: one space, unless incoming is a short suffix continuation
 * 7. otherwise direct concatenation
 *
 * @example
 * ```typescript
 * mergeText('Hello', 'world');   // 'Hello world'
 * mergeText('Hello', ',');       // 'Hello,'
 * mergeText('Great', 'er');      // 'Greater'
 * mergeText('నమస్', 'కారం');      // 'నమస్కారం'
 * ```
 */
export function mergeText(existing: string, incoming: string): string {
  if (!incoming) return existing;
  if (!existing) return incoming;

  const tail = lastChar(existing);
  const head = firstChar(incoming);

  if (isWhitespace(head)) {
    return existing + incoming;
  }

  if (usesJoiningScript(tail) || usesJoiningScript(head)) {
    return existing + incoming;
  }

  if (isWhitespace(tail)) {
    return existing + incoming;
  }

  if (isClausePunctuation(head)) {
    return existing + incoming;
  }

  if (isClausePunctuation(tail)) {
    return `${existing} ${incoming}`;
  }

  if (isAlphanumeric(tail) && isAlphanumeric(head)) {
    return isShortContinuation(incoming) ? existing + incoming : `${existing} ${incoming}`;
  }

  return existing + incoming;
}

/**
 * Whether text closes a sentence (trailing whitespace ignored)
 */
export function endsSentence(text: string): boolean {
  const trimmed = text.trimEnd();
  return trimmed.length > 0 && SENTENCE_TERMINATORS.has(lastChar(trimmed));
}
