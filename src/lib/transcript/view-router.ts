/**
 * View routing rules
 * Decides which of the three views receive a final token
 *
 * - Original: every spoken (non-translated) token, tagged by speaker
 * - Same-language mode: the party views separate speakers; a token reaches a
 *   party view only when both its speaker role and its language match that party
 * - Translation mode: the party views follow language; translations also reach
 *   the party whose language they are rendered in
 */

import type {
  PartyLanguages,
  SessionMode,
  SpeakerRole,
  TranslationStatus,
  ViewName,
} from './transcript-types';

export interface RoutingContext {
  mode: SessionMode;
  languages: PartyLanguages;
}

export interface RoutableToken {
  role: SpeakerRole;
  language: string;
  status: TranslationStatus;
}

export function resolveSessionMode(languages: PartyLanguages): SessionMode {
  return languages.primary === languages.secondary ? 'same_language' : 'translation';
}

/**
 * Select the views a final token is distributed to, in display order
 *
 * @example
 * ```typescript
 * const context = { mode: 'translation', languages: { primary: 'en', secondary: 'te' } };
 * selectViews(context, { role: 'primary', language: 'en', status: 'original' });
 * // ['original', 'primary']
 * selectViews(context, { role: 'primary', language: 'te', status: 'translation' });
 * // ['secondary']
 * ```
 */
export function selectViews(context: RoutingContext, token: RoutableToken): ViewName[] {
  const views: ViewName[] = [];
  const { primary, secondary } = context.languages;
  const isTranslation = token.status === 'translation';

  if (!isTranslation) {
    views.push('original');
  }

  if (context.mode === 'same_language') {
    if (token.language === primary && token.role === 'primary') {
      views.push('primary');
    }
    if (token.language === secondary && token.role === 'secondary') {
      views.push('secondary');
    }
    return views;
  }

  const tagged = token.language === primary || token.language === secondary;

  if (token.language === primary || (isTranslation && !tagged && token.role !== 'primary')) {
    views.push('primary');
  }
  if (token.language === secondary || (isTranslation && !tagged && token.role !== 'secondary')) {
    views.push('secondary');
  }

  return views;
}
