/**
 * Fatal configuration problem (missing API key, unreadable or invalid data
 * file). Startup aborts on it.
 */
export class ConfigurationError extends Error {
  constructor(message: string, readonly problems: string[] = []) {
    super(problems.length ? `${message}:\n  - ${problems.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}
