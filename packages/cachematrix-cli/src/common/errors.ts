import { CacheMatrixError, StatusCode } from 'cachematrix';

/**
 * Error thrown for an unreadable config file or a setting that does not parse.
 */
export class ConfigError extends CacheMatrixError {
  constructor(message: string, cause?: Error) {
    super(message, StatusCode.FORMAT, cause);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
