/**
 * Upstream payload normalization
 *
 * Recognizer tokens arrive as loosely-typed JSON with several field spellings
 * (text/utterance, speaker/speaker_id, language/detected_language, ...).
 * normalizeToken() turns one payload into an immutable Token or null when the
 * payload carries no usable text.
 */

import { z } from 'zod';
import { CONTROL_TOKEN_PATTERN, UNKNOWN_LANGUAGE } from './transcript-constants';
import type { Token, TranslationStatus } from './transcript-types';

// =============================================================================
// Schemas
// =============================================================================

const speakerIdSchema = z.union([z.string(), z.number()]).nullish();

export const rawTokenSchema = z.object({
  text: z.unknown().optional(),
  utterance: z.unknown().optional(),
  speaker: speakerIdSchema,
  speaker_id: speakerIdSchema,
  speakerHint: speakerIdSchema,
  language: z.unknown().optional(),
  detected_language: z.unknown().optional(),
  is_final: z.boolean().nullish(),
  isFinal: z.boolean().nullish(),
  translation_status: z.string().nullish(),
  translated: z.boolean().nullish(),
  is_translation: z.boolean().nullish(),
  timestamp: z.unknown().optional(),
});

export type RawToken = z.infer<typeof rawTokenSchema>;

export const resultMessageSchema = z.object({
  message_type: z.string().nullish(),
  error_code: z.union([z.string(), z.number()]).nullish(),
  error_message: z.string().nullish(),
  tokens: z.array(z.unknown()).nullish(),
  response: z
    .object({
      tokens: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});

export type ResultMessage = z.infer<typeof resultMessageSchema>;

// =============================================================================
// Field Cleanup
// =============================================================================

// Zero-width and C0/C1 control characters, except whitespace the merge rules rely on
const INVISIBLE_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B\u2060\uFEFF]/g;

/**
 * Strip recognizer control markers and invisible characters.
 * Returns null when nothing speakable is left.
 */
export function cleanTokenText(value: unknown): string | null {
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(CONTROL_TOKEN_PATTERN, '').replace(INVISIBLE_CHARACTERS, '');
  return cleaned.trim() ? cleaned : null;
}

function normalizeSpeakerHint(...candidates: Array<string | number | null | undefined>): string | undefined {
  for (const candidate of candidates) {
    if (candidate === null || candidate === undefined) continue;
    const hint = String(candidate).trim();
    if (hint) return hint;
  }
  return undefined;
}

/**
 * First usable language code, lower-cased; 'unknown' when none is usable
 */
export function normalizeLanguage(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    if (typeof candidate !== 'string') continue;
    const language = candidate.trim().toLowerCase();
    if (language) return language;
  }
  return UNKNOWN_LANGUAGE;
}

function normalizeStatus(raw: RawToken): TranslationStatus {
  if (raw.translation_status?.trim().toLowerCase() === 'translation') return 'translation';
  if (raw.translated === true || raw.is_translation === true) return 'translation';
  return 'original';
}

export function normalizeTimestamp(value: unknown, now: () => Date): string {
  if (typeof value === 'string' && value.trim()) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }
  return now().toISOString();
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize one upstream token payload
 *
 * @param payload - Raw token as received from the recognizer
 * @param now - Clock for tokens without a usable timestamp
 * @returns The normalized token, or null for malformed or empty payloads
 *
 * @example
 * ```typescript
 * normalizeToken({ text: ' Hello', speaker: 1, language: 'EN', is_final: true });
 * // { text: ' Hello', speakerHint: '1', language: 'en', isFinal: true, status: 'original', timestamp: <now> }
 * ```
 */
export function normalizeToken(payload: unknown, now: () => Date = () => new Date()): Token | null {
  const parsed = rawTokenSchema.safeParse(payload);
  if (!parsed.success) return null;

  const raw = parsed.data;
  const text = cleanTokenText(raw.text || raw.utterance);
  if (text === null) return null;

  const token: Token = {
    text,
    language: normalizeLanguage(raw.language, raw.detected_language),
    isFinal: raw.is_final ?? raw.isFinal ?? false,
    status: normalizeStatus(raw),
    timestamp: normalizeTimestamp(raw.timestamp, now),
  };

  const speakerHint = normalizeSpeakerHint(raw.speakerHint, raw.speaker, raw.speaker_id);
  if (speakerHint !== undefined) {
    token.speakerHint = speakerHint;
  }

  return Object.freeze(token);
}

/**
 * Tokens carried by an upstream result message, wherever the message puts them
 */
export function extractResultTokens(message: ResultMessage): unknown[] {
  return message.tokens ?? message.response?.tokens ?? [];
}
