/**
 * Raised when a session is configured with languages the requested mode cannot use.
 * The only error the router surfaces; per-token problems are absorbed.
 */
export class ConfigurationError extends Error {
  public readonly primaryLanguage: string | undefined;
  public readonly secondaryLanguage: string | undefined;

  constructor(message: string, languages?: { primary?: string; secondary?: string }) {
    super(message);
    this.name = 'ConfigurationError';
    this.primaryLanguage = languages?.primary;
    this.secondaryLanguage = languages?.secondary;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
