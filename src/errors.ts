export type DistributionErrorCode = 'EMPTY_INPUT' | 'INVALID_VALUE' | 'UNREADABLE_PATH';

export class DistributionError extends Error {
  constructor(
    readonly code: DistributionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends DistributionError {
  constructor(message = 'Cannot compute a distribution from zero sizes') {
    super('EMPTY_INPUT', message);
  }
}

export class InvalidValueError extends DistributionError {
  constructor(readonly value: number, context: string) {
    super('INVALID_VALUE', `${context}: expected a finite non-negative number, got ${value}`);
  }
}

export class UnreadablePathError extends DistributionError {
  constructor(
    readonly path: string,
    readonly reason: unknown,
  ) {
    super('UNREADABLE_PATH', `Cannot read ${path}: ${reason instanceof Error ? reason.message : String(reason)}`);
  }
}
