import { DomainError } from '../shared/errors.js';

/**
 * A declaration source could not be read or parsed. Only ever recovered
 * inside AttributeCollector.
 */
export class ConfigReadError extends DomainError {
  readonly code = 'CONFIG_READ_ERROR';
  readonly isOperational = true;

  constructor(
    message: string,
    public readonly sourcePath?: string,
  ) {
    super(message);
  }
}
