import { DomainError } from '../shared/errors.js';

export class FetchError extends DomainError {
  readonly code = 'FETCH_ERROR';
  readonly isOperational = true;

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      url: this.url,
      status: this.status,
    };
  }
}

export class DecodeError extends DomainError {
  readonly code = 'DECODE_ERROR';
  readonly isOperational = true;

  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      details: this.details,
    };
  }
}
