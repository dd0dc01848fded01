import { DomainError } from '../shared/errors.js';

export class StoreError extends DomainError {
  readonly code = 'STORE_ERROR';
  readonly isOperational = false;

  constructor(
    message: string,
    public readonly storePath?: string,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      storePath: this.storePath,
    };
  }
}

export class SubprocessError extends DomainError {
  readonly code = 'SUBPROCESS_ERROR';
  readonly isOperational = false;

  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number | null,
    public readonly stderr?: string,
  ) {
    super(message);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      command: this.command,
      exitCode: this.exitCode,
      stderr: this.stderr,
    };
  }
}
