/**
 * Raised when a component cannot start because its configuration is
 * missing or invalid. Fatal for that component only.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
