export type FailureKind = 'authorization' | 'not_found' | 'transport';

/**
 * Raised when a required setting is missing or invalid.
 * Always thrown before any request is made.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface FailureDetails {
  sheetId: string;
  statusCode?: number;
  errorCode?: number;
  cause?: unknown;
}

/**
 * Base class for the three ways fetching a sheet can fail.
 * Callers branch on `kind` (or `instanceof`), never on the message.
 */
export abstract class SheetFetchError extends Error {
  abstract readonly kind: FailureKind;
  readonly sheetId: string;
  readonly statusCode?: number;
  readonly errorCode?: number;

  constructor(message: string, details: FailureDetails) {
    super(message, { cause: details.cause });
    this.sheetId = details.sheetId;
    this.statusCode = details.statusCode;
    this.errorCode = details.errorCode;
  }
}

/** Invalid, expired or missing token, or no access to the sheet. */
export class AuthorizationFailure extends SheetFetchError {
  readonly kind = 'authorization';

  constructor(message: string, details: FailureDetails) {
    super(message, details);
    this.name = 'AuthorizationFailure';
  }
}

/** The sheet does not exist or is not visible to the token. */
export class NotFoundFailure extends SheetFetchError {
  readonly kind = 'not_found';

  constructor(message: string, details: FailureDetails) {
    super(message, details);
    this.name = 'NotFoundFailure';
  }
}

/** Network or service unavailability, or a response we could not read. */
export class TransportFailure extends SheetFetchError {
  readonly kind = 'transport';

  constructor(message: string, details: FailureDetails) {
    super(message, details);
    this.name = 'TransportFailure';
  }
}
