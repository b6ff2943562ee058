// Error taxonomy shared by every portal component

export class PortalError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing, malformed or expired session credential
 */
export class AuthError extends PortalError {}

/**
 * A fetched page did not have the expected structure
 */
export class FormatError extends PortalError {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.field = field;
  }
}

/**
 * A caller-supplied value violates a domain constraint
 */
export class ValidationError extends PortalError {}

export type NotFoundKind = 'parallel' | 'student' | 'assignment';

export class NotFoundError extends PortalError {
  readonly kind: NotFoundKind;
  readonly key: string;

  constructor(kind: NotFoundKind, key: string) {
    super(`No ${kind} named "${key}"`);
    this.kind = kind;
    this.key = key;
  }
}

export class IOError extends PortalError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/**
 * Transport outcome the core does not recognise (unexpected status or redirect)
 */
export class HttpError extends PortalError {
  readonly status: number;
  readonly url: string;
  readonly location: string | null;

  constructor(message: string, status: number, url: string, location: string | null = null) {
    super(location ? `${message} (HTTP ${status}, redirected to ${location})` : `${message} (HTTP ${status})`);
    this.status = status;
    this.url = url;
    this.location = location;
  }
}
