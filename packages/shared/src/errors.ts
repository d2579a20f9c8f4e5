export class InvalidCardNumberError extends Error {
  constructor(readonly input: string) {
    super('Card number must be exactly 12 digits');
    this.name = 'InvalidCardNumberError';
  }
}

export type FetchErrorKind = 'timeout' | 'unreachable' | 'unparseable';

export class FetchError extends Error {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class NotifyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifyError';
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}
