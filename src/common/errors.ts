export type CoordinationErrorCode = 'E_INVALID_ARGUMENT' | 'E_NOT_FOUND' | 'E_CONFIG_IO';

/** Base error raised by the registry and the configuration store. */
export class CoordinationError extends Error {
  constructor(
    readonly code: CoordinationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CoordinationError';
  }
}

/** An identifying field is empty or malformed, or a timeout is not positive. */
export class InvalidArgumentError extends CoordinationError {
  constructor(message: string) {
    super('E_INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/** The operation addressed a name that is not present. */
export class NotFoundError extends CoordinationError {
  constructor(kind: string, name: string) {
    super('E_NOT_FOUND', `${kind} '${name}' not found`);
    this.name = 'NotFoundError';
  }
}

/** Reading, parsing or writing a configuration file failed. */
export class ConfigIOError extends CoordinationError {
  constructor(message: string, cause?: unknown) {
    super('E_CONFIG_IO', message, { cause });
    this.name = 'ConfigIOError';
  }
}

// fs errors raised inside a Jest sandbox come from another realm, so these
// helpers read fields instead of relying on `instanceof Error`.

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
