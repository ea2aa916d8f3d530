/**
 * taskloom.config.json does not match the configuration schema.
 */
export class ConfigValidationError extends Error {
  public readonly details: string[];

  constructor(details: string[]) {
    super(`Invalid configuration: ${details.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.details = details;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
