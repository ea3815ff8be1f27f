export { TranscriptRouter } from './lib/transcript/transcript-router';
export type {
  ConfigureOptions,
  TranscriptRouterCallbacks,
  TranscriptRouterOptions,
} from './lib/transcript/transcript-router';
export { ConfigurationError } from './lib/transcript/transcript-errors';
export {
  DEFAULT_ROUTER_CONFIG,
  loadRouterConfig,
  resolveRouterConfig,
} from './lib/transcript/transcript-config';
export type { TranscriptRouterConfig } from './lib/transcript/transcript-config';
export { mergeText, endsSentence, isShortContinuation, usesJoiningScript } from './lib/transcript/text-merge';
export { SpeakerRegistry, SpeakerResolver, TurnAlternator } from './lib/transcript/speaker-resolver';
export type {
  ResolutionSource,
  SpeakerAssignment,
  SpeakerResolution,
} from './lib/transcript/speaker-resolver';
export { SentenceBuffer, SentenceBufferBank, formatLine } from './lib/transcript/sentence-buffer';
export type { AppendResult, PendingSentence, SentenceBufferState } from './lib/transcript/sentence-buffer';
export { selectViews, resolveSessionMode } from './lib/transcript/view-router';
export { normalizeToken } from './lib/transcript/token-schema';
export { VIEW_NAMES } from './lib/transcript/transcript-types';
export type {
  BoxSnapshot,
  FinalizedLine,
  PartyLabels,
  PartyLanguages,
  RoutedToken,
  SessionMode,
  SpeakerRole,
  Token,
  TokenProcessingResult,
  TranscriptEntry,
  TranslationStatus,
  ViewName,
} from './lib/transcript/transcript-types';
export { initMonitoring } from './lib/monitoring';
