/**
 * Router configuration: defaults and environment loading
 */

import { z } from 'zod';
import {
  ADDITIONAL_SPEAKER_LABEL_PREFIX,
  DEFAULT_PRIMARY_LABEL,
  DEFAULT_PRIMARY_LANGUAGE,
  DEFAULT_SECONDARY_LABEL,
  DEFAULT_SECONDARY_LANGUAGE,
  DISPLAY_WINDOW_CHARS,
  EMPTY_VIEW_PLACEHOLDER,
  UNKNOWN_SPEAKER_HINTS,
} from './transcript-constants';
import { ConfigurationError } from './transcript-errors';
import type { PartyLabels } from './transcript-types';

export interface TranscriptRouterConfig {
  primaryLanguage: string;
  secondaryLanguage: string;
  /** Labels of the first two diarized speakers */
  partyLabels: PartyLabels;
  /** Prefix of generated labels for further speakers */
  additionalSpeakerPrefix: string;
  /** Speaker hints treated as "no diarization signal" */
  unknownSpeakerHints: readonly string[];
  /** Trailing characters kept per view in snapshots */
  displayWindowChars: number;
  /** Snapshot text of an empty view */
  placeholder: string;
  /** Reject equal party languages instead of switching to same-language mode */
  requireTranslation: boolean;
}

export const DEFAULT_ROUTER_CONFIG: Readonly<TranscriptRouterConfig> = Object.freeze({
  primaryLanguage: DEFAULT_PRIMARY_LANGUAGE,
  secondaryLanguage: DEFAULT_SECONDARY_LANGUAGE,
  partyLabels: Object.freeze({ primary: DEFAULT_PRIMARY_LABEL, secondary: DEFAULT_SECONDARY_LABEL }),
  additionalSpeakerPrefix: ADDITIONAL_SPEAKER_LABEL_PREFIX,
  unknownSpeakerHints: UNKNOWN_SPEAKER_HINTS,
  displayWindowChars: DISPLAY_WINDOW_CHARS,
  placeholder: EMPTY_VIEW_PLACEHOLDER,
  requireTranslation: false,
});

// Schema for the TRANSCRIPT_* environment variables
const envSchema = z.object({
  TRANSCRIPT_PRIMARY_LANGUAGE: z.string().trim().min(1).optional(),
  TRANSCRIPT_SECONDARY_LANGUAGE: z.string().trim().min(1).optional(),
  TRANSCRIPT_PRIMARY_LABEL: z.string().trim().min(1).max(50).optional(),
  TRANSCRIPT_SECONDARY_LABEL: z.string().trim().min(1).max(50).optional(),
  TRANSCRIPT_DISPLAY_WINDOW: z.coerce.number().int().positive().optional(),
  TRANSCRIPT_REQUIRE_TRANSLATION: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
});

/**
 * Fill in defaults for a partial configuration
 */
export function resolveRouterConfig(overrides: Partial<TranscriptRouterConfig> = {}): TranscriptRouterConfig {
  return {
    ...DEFAULT_ROUTER_CONFIG,
    ...overrides,
    partyLabels: { ...DEFAULT_ROUTER_CONFIG.partyLabels, ...overrides.partyLabels },
  };
}

/**
 * Build a configuration from TRANSCRIPT_* environment variables
 *
 * @throws ConfigurationError when a variable is present but invalid
 */
export function loadRouterConfig(env: NodeJS.ProcessEnv = process.env): TranscriptRouterConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid transcript router environment: ${details}`);
  }

  const values = parsed.data;
  const overrides: Partial<TranscriptRouterConfig> = {
    partyLabels: {
      primary: values.TRANSCRIPT_PRIMARY_LABEL ?? DEFAULT_PRIMARY_LABEL,
      secondary: values.TRANSCRIPT_SECONDARY_LABEL ?? DEFAULT_SECONDARY_LABEL,
    },
  };
  if (values.TRANSCRIPT_PRIMARY_LANGUAGE) {
    overrides.primaryLanguage = values.TRANSCRIPT_PRIMARY_LANGUAGE.toLowerCase();
  }
  if (values.TRANSCRIPT_SECONDARY_LANGUAGE) {
    overrides.secondaryLanguage = values.TRANSCRIPT_SECONDARY_LANGUAGE.toLowerCase();
  }
  if (values.TRANSCRIPT_DISPLAY_WINDOW !== undefined) {
    overrides.displayWindowChars = values.TRANSCRIPT_DISPLAY_WINDOW;
  }
  if (values.TRANSCRIPT_REQUIRE_TRANSLATION !== undefined) {
    overrides.requireTranslation = values.TRANSCRIPT_REQUIRE_TRANSLATION;
  }

  return resolveRouterConfig(overrides);
}
