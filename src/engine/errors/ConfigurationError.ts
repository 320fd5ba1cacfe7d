/**
 * Raised at construction time when the runtime is handed a configuration it
 * cannot run with (zero reels, inverted bet bounds, no usable bet levels...).
 * Everything that can go wrong after construction is handled in place.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(scope: string, issues: readonly string[]) {
    super(`[${scope}] invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = [...issues];
  }
}
