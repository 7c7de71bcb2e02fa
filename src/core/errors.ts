export type StickyErrorCode =
  | 'NotFound'
  | 'InvalidState'
  | 'ActiveWindowUnavailable'
  | 'RemoteActionFailure'
  | 'RegistryError'
  | 'ProtocolError';

export class StickyError extends Error {
  constructor(
    public readonly code: StickyErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StickyError';
  }
}

export class NotFoundError extends StickyError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
  }
}

export class InvalidStateError extends StickyError {
  constructor(message: string) {
    super('InvalidState', message);
    this.name = 'InvalidStateError';
  }
}

export class ActiveWindowUnavailableError extends StickyError {
  constructor(message: string, cause?: unknown) {
    super('ActiveWindowUnavailable', message, { cause });
    this.name = 'ActiveWindowUnavailableError';
  }
}

export class RemoteActionError extends StickyError {
  constructor(message: string, cause?: unknown) {
    super('RemoteActionFailure', message, { cause });
    this.name = 'RemoteActionError';
  }
}

export class RegistryError extends StickyError {
  constructor(message: string, cause?: unknown) {
    super('RegistryError', message, { cause });
    this.name = 'RegistryError';
  }
}

export class ProtocolError extends StickyError {
  constructor(message: string) {
    super('ProtocolError', message);
    this.name = 'ProtocolError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
