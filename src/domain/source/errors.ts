import { DomainError } from '../shared/errors.js';

export class ResolveError extends DomainError {
  readonly code = 'RESOLVE_ERROR';
  readonly isOperational = true;

  constructor(
    message: string,
    public readonly url?: string,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      url: this.url,
    };
  }
}
