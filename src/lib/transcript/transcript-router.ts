/**
 * TranscriptRouter - routes a live recognition stream into three transcript views
 *
 * For every token:
 * 1. normalizeToken() cleans the upstream payload (malformed/empty tokens are dropped)
 * 2. SpeakerResolver assigns a speaker label
 * 3. Partials only update the per-speaker live preview
 * 4. Finals are distributed by selectViews() into the SentenceBufferBank
 *
 * All mutable state of a conversation lives in one RouterSession object owned
 * by the router instance. Run one router per concurrent conversation and feed
 * it tokens in arrival order; nothing here is asynchronous.
 */

import * as Sentry from '@sentry/node';
import { devError, devLog, devWarn, toError } from '../utils';
import { SentenceBufferBank } from './sentence-buffer';
import { SpeakerResolver, type SpeakerAssignment, type SpeakerResolution } from './speaker-resolver';
import { mergeText } from './text-merge';
import { extractResultTokens, normalizeToken, resultMessageSchema } from './token-schema';
import { resolveRouterConfig, type TranscriptRouterConfig } from './transcript-config';
import { ConfigurationError } from './transcript-errors';
import type {
  BoxSnapshot,
  FinalizedLine,
  LineFinalizedCallback,
  PartyLanguages,
  RoutedToken,
  SessionMode,
  SpeakerRegisteredCallback,
  TokenProcessingResult,
  TranscriptEntry,
  ViewName,
} from './transcript-types';
import { resolveSessionMode, selectViews } from './view-router';

// =============================================================================
// Types
// =============================================================================

export interface TranscriptRouterCallbacks {
  /** A new diarization hint was mapped to a label */
  onSpeakerRegistered?: SpeakerRegisteredCallback;
  /** A view finalized a display line */
  onLineFinalized?: LineFinalizedCallback;
}

export interface TranscriptRouterOptions {
  config?: Partial<TranscriptRouterConfig>;
  callbacks?: TranscriptRouterCallbacks;
  /** Clock used for tokens without a timestamp */
  now?: () => Date;
}

export interface ConfigureOptions {
  /** Reject equal languages instead of selecting same-language mode */
  requireTranslation?: boolean;
}

/**
 * Owned state of one conversation session
 */
interface RouterSession {
  languages: PartyLanguages;
  mode: SessionMode;
  resolver: SpeakerResolver;
  bank: SentenceBufferBank;
  /** Latest provisional text per speaker label */
  partials: Map<string, string>;
  /** Every final token of the session, in arrival order */
  entries: TranscriptEntry[];
  activeSpeaker: string | null;
}

type PartialMode = 'replace' | 'append';

const LOG_PREFIX = '[TranscriptRouter]';

// =============================================================================
// Transcript Router
// =============================================================================

export class TranscriptRouter {
  private readonly config: TranscriptRouterConfig;
  private readonly callbacks: TranscriptRouterCallbacks;
  private readonly now: () => Date;
  private session: RouterSession;

  /**
   * @throws ConfigurationError when the configured languages are unusable
   */
  constructor(options: TranscriptRouterOptions = {}) {
    this.config = resolveRouterConfig(options.config);
    this.callbacks = options.callbacks ?? {};
    this.now = options.now ?? (() => new Date());
    this.session = this.createSession(
      this.validateLanguages(this.config.primaryLanguage, this.config.secondaryLanguage, this.config.requireTranslation)
    );
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Set the party languages and start a new session
   *
   * Equal languages select same-language mode unless translation is required.
   *
   * @throws ConfigurationError when a language is blank, or when languages are
   * equal and translation is required
   */
  configure(primaryLanguage: string, secondaryLanguage: string, options: ConfigureOptions = {}): void {
    const requireTranslation = options.requireTranslation ?? this.config.requireTranslation;
    const languages = this.validateLanguages(primaryLanguage, secondaryLanguage, requireTranslation);
    this.session = this.createSession(languages);
    devLog(`${LOG_PREFIX} Configured ${languages.primary}/${languages.secondary} (${this.session.mode})`);
  }

  /**
   * Clear all session state; configured languages are kept
   */
  reset(): void {
    this.session = this.createSession(this.session.languages);
    devLog(`${LOG_PREFIX} Session reset`);
  }

  /**
   * Finalize every sentence still in progress (end of conversation)
   */
  finish(): BoxSnapshot {
    for (const { view, line } of this.session.bank.flushAll()) {
      this.notifyLineFinalized(view, line);
    }
    this.session.partials.clear();
    return this.snapshot();
  }

  // ===========================================================================
  // Token Processing
  // ===========================================================================

  /**
   * Process one upstream token
   *
   * @returns null when the token is malformed or has no text after cleanup
   */
  processToken(payload: unknown): TokenProcessingResult | null {
    return this.handleToken(payload, 'replace');
  }

  /**
   * Process one upstream result message (a batch of tokens)
   *
   * The partial tokens of a message form the current live preview, so they
   * replace the previous preview instead of extending it.
   */
  processResult(message: unknown): TokenProcessingResult[] {
    const parsed = resultMessageSchema.safeParse(message);
    if (!parsed.success) {
      devWarn(`${LOG_PREFIX} Ignoring malformed result message`);
      return [];
    }

    const result = parsed.data;
    if (result.error_code !== null && result.error_code !== undefined) {
      const errorMessage = result.error_message ?? 'unknown';
      devError(`${LOG_PREFIX} Upstream error: code=${result.error_code}, msg=${errorMessage}`);
      Sentry.captureMessage(`Upstream transcription error ${result.error_code}`, {
        level: 'error',
        tags: {
          module: 'transcript-router',
          operation: 'process_result',
        },
        extra: {
          errorCode: result.error_code,
          errorMessage,
        },
      });
      return [];
    }

    const tokens = extractResultTokens(result);
    if (tokens.length === 0) {
      return [];
    }

    devLog(`${LOG_PREFIX} Processing ${tokens.length} tokens (message_type: ${result.message_type ?? 'none'})`);
    this.session.partials.clear();

    const processed: TokenProcessingResult[] = [];
    for (const token of tokens) {
      const handled = this.handleToken(token, 'append');
      if (handled) processed.push(handled);
    }
    return processed;
  }

  private handleToken(payload: unknown, partialMode: PartialMode): TokenProcessingResult | null {
    const token = normalizeToken(payload, this.now);
    if (!token) {
      return null;
    }

    const session = this.session;
    const resolution = session.resolver.resolve(token);
    session.activeSpeaker = resolution.label;

    const routed: RoutedToken = { ...token, speaker: resolution.label, role: resolution.role };

    if (!token.isFinal) {
      this.recordPartial(resolution.label, token.text, partialMode);
      return { token: routed, partials: this.getPartials(), snapshot: null };
    }

    session.partials.delete(resolution.label);
    this.distributeFinal(routed, resolution);

    return { token: routed, partials: this.getPartials(), snapshot: this.snapshot() };
  }

  private recordPartial(speaker: string, text: string, mode: PartialMode): void {
    const partials = this.session.partials;
    const previous = mode === 'append' ? partials.get(speaker) : undefined;
    partials.set(speaker, previous ? mergeText(previous, text) : text.trimStart());
  }

  private distributeFinal(token: RoutedToken, resolution: SpeakerResolution): void {
    const session = this.session;
    const entry: TranscriptEntry = {
      timestamp: token.timestamp,
      speaker: token.speaker,
      text: token.text,
      language: token.language,
      status: token.status,
    };
    session.entries.push(entry);

    const views = selectViews(
      { mode: session.mode, languages: session.languages },
      { role: token.role, language: token.language, status: token.status }
    );

    for (const view of views) {
      const result = session.bank.get(view).appendFinal(token.speaker, token.text, {
        timestamp: token.timestamp,
        language: token.language,
        status: token.status,
      });

      for (const line of result.flushed) {
        this.notifyLineFinalized(view, line);
      }

      if (view === 'original' && result.sentenceComplete) {
        session.resolver.noteSentenceBoundary(resolution);
      }
    }
  }

  // ===========================================================================
  // Read Access
  // ===========================================================================

  /**
   * Display text of the three views, truncated to the display window
   */
  snapshot(): BoxSnapshot {
    const bank = this.session.bank;
    return {
      original: this.truncate(bank.get('original').render()),
      primary: this.truncate(bank.get('primary').render()),
      secondary: this.truncate(bank.get('secondary').render()),
    };
  }

  /**
   * Untruncated view text, for persistence
   */
  getFullText(): BoxSnapshot {
    const bank = this.session.bank;
    return {
      original: bank.get('original').render(),
      primary: bank.get('primary').render(),
      secondary: bank.get('secondary').render(),
    };
  }

  /**
   * Every final token of the session in arrival order
   */
  exportEntries(): TranscriptEntry[] {
    return this.session.entries.map((entry) => ({ ...entry }));
  }

  exportEntriesByView(): Record<ViewName, TranscriptEntry[]> {
    const bank = this.session.bank;
    return {
      original: bank.get('original').getEntries(),
      primary: bank.get('primary').getEntries(),
      secondary: bank.get('secondary').getEntries(),
    };
  }

  getPartials(): Record<string, string> {
    return Object.fromEntries(this.session.partials);
  }

  getSpeakers(): SpeakerAssignment[] {
    return this.session.resolver.getSpeakers();
  }

  getActiveSpeaker(): string | null {
    return this.session.activeSpeaker;
  }

  getMode(): SessionMode {
    return this.session.mode;
  }

  getLanguages(): PartyLanguages {
    return { ...this.session.languages };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private validateLanguages(
    primaryLanguage: string,
    secondaryLanguage: string,
    requireTranslation: boolean
  ): PartyLanguages {
    const primary = primaryLanguage.trim().toLowerCase();
    const secondary = secondaryLanguage.trim().toLowerCase();

    if (!primary || !secondary) {
      throw new ConfigurationError('Both party languages must be non-empty language codes', {
        primary: primaryLanguage,
        secondary: secondaryLanguage,
      });
    }

    if (requireTranslation && primary === secondary) {
      throw new ConfigurationError(
        `Doctor and Patient languages must be different for translation. Got: ${primary} and ${secondary}`,
        { primary, secondary }
      );
    }

    return { primary, secondary };
  }

  private createSession(languages: PartyLanguages): RouterSession {
    return {
      languages: { ...languages },
      mode: resolveSessionMode(languages),
      resolver: new SpeakerResolver({
        labels: this.config.partyLabels,
        languages,
        additionalLabelPrefix: this.config.additionalSpeakerPrefix,
        unknownHints: this.config.unknownSpeakerHints,
        onSpeakerRegistered: (hint, label) => this.notifySpeakerRegistered(hint, label),
      }),
      bank: new SentenceBufferBank(),
      partials: new Map(),
      entries: [],
      activeSpeaker: null,
    };
  }

  private truncate(text: string): string {
    if (!text) {
      return this.config.placeholder;
    }
    const window = this.config.displayWindowChars;
    if (text.length <= window) {
      return text;
    }
    const tail = text.slice(-window);
    const first = tail.charCodeAt(0);
    // Do not start the window on the second half of a surrogate pair
    return first >= 0xdc00 && first <= 0xdfff ? tail.slice(1) : tail;
  }

  private notifySpeakerRegistered(hint: string, label: string): void {
    const callback = this.callbacks.onSpeakerRegistered;
    if (!callback) return;
    try {
      callback(hint, label);
    } catch (error) {
      this.reportCallbackFailure('on_speaker_registered', error);
    }
  }

  private notifyLineFinalized(view: ViewName, line: FinalizedLine): void {
    const callback = this.callbacks.onLineFinalized;
    if (!callback) return;
    try {
      callback(view, line);
    } catch (error) {
      this.reportCallbackFailure('on_line_finalized', error);
    }
  }

  private reportCallbackFailure(operation: string, error: unknown): void {
    Sentry.captureException(toError(error), {
      tags: {
        module: 'transcript-router',
        operation,
      },
      level: 'error',
    });
    devError(`${LOG_PREFIX} Callback ${operation} failed:`, error);
  }
}
