/**
 * Unit tests for src/lib/transcript/view-router.ts
 */

import { resolveSessionMode, selectViews } from '../view-router';
import type { RoutingContext } from '../view-router';

const TRANSLATION: RoutingContext = {
  mode: 'translation',
  languages: { primary: 'en', secondary: 'te' },
};

const SAME_LANGUAGE: RoutingContext = {
  mode: 'same_language',
  languages: { primary: 'en', secondary: 'en' },
};

describe('resolveSessionMode', () => {
  test('should select translation mode for different languages', () => {
    expect(resolveSessionMode({ primary: 'en', secondary: 'te' })).toBe('translation');
  });

  test('should select same-language mode for equal languages', () => {
    expect(resolveSessionMode({ primary: 'en', secondary: 'en' })).toBe('same_language');
  });
});

describe('selectViews', () => {
  describe('translation mode', () => {
    test('should route spoken tokens by language', () => {
      expect(selectViews(TRANSLATION, { role: 'primary', language: 'en', status: 'original' })).toEqual([
        'original',
        'primary',
      ]);
      expect(selectViews(TRANSLATION, { role: 'secondary', language: 'te', status: 'original' })).toEqual([
        'original',
        'secondary',
      ]);
    });

    test('should follow the language even when it is not the speaker party language', () => {
      expect(selectViews(TRANSLATION, { role: 'primary', language: 'te', status: 'original' })).toEqual([
        'original',
        'secondary',
      ]);
    });

    test('should keep untagged spoken tokens in the original view only', () => {
      expect(selectViews(TRANSLATION, { role: 'primary', language: 'unknown', status: 'original' })).toEqual([
        'original',
      ]);
    });

    test('should route tagged translations by language and never to the original view', () => {
      expect(selectViews(TRANSLATION, { role: 'primary', language: 'te', status: 'translation' })).toEqual([
        'secondary',
      ]);
      expect(selectViews(TRANSLATION, { role: 'secondary', language: 'en', status: 'translation' })).toEqual([
        'primary',
      ]);
    });

    test('should send untagged translations to the other party', () => {
      expect(selectViews(TRANSLATION, { role: 'primary', language: 'unknown', status: 'translation' })).toEqual([
        'secondary',
      ]);
      expect(selectViews(TRANSLATION, { role: 'secondary', language: 'fr', status: 'translation' })).toEqual([
        'primary',
      ]);
    });

    test('should send untagged translations of additional speakers to both parties', () => {
      expect(selectViews(TRANSLATION, { role: 'additional', language: 'unknown', status: 'translation' })).toEqual([
        'primary',
        'secondary',
      ]);
    });
  });

  describe('same-language mode', () => {
    test('should separate the parties by role', () => {
      expect(selectViews(SAME_LANGUAGE, { role: 'primary', language: 'en', status: 'original' })).toEqual([
        'original',
        'primary',
      ]);
      expect(selectViews(SAME_LANGUAGE, { role: 'secondary', language: 'en', status: 'original' })).toEqual([
        'original',
        'secondary',
      ]);
    });

    test('should keep additional speakers in the original view', () => {
      expect(selectViews(SAME_LANGUAGE, { role: 'additional', language: 'en', status: 'original' })).toEqual([
        'original',
      ]);
    });

    test('should require the session language for party views', () => {
      expect(selectViews(SAME_LANGUAGE, { role: 'primary', language: 'fr', status: 'original' })).toEqual([
        'original',
      ]);
    });
  });
});
