/**
 * Librus Error Types
 *
 * Transport and login failures are logged and surface as `null`;
 * these classes cover the failures that propagate to the caller.
 */

export class LibrusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends LibrusError {}

export class AuthenticationFailedError extends LibrusError {
  constructor(message = 'Authorization failed - no session cookies received') {
    super(message);
  }
}

export class TransportFailedError extends LibrusError {
  constructor(
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(status ? `Request to ${url} failed with HTTP ${status}` : `Request to ${url} failed`);
  }
}

export class AccessDeniedError extends LibrusError {
  constructor(message = 'Access denied. Please check your credentials and permissions.') {
    super(message);
  }
}

export class StructureNotFoundError extends LibrusError {
  constructor(
    public readonly selector: string,
    message?: string,
  ) {
    super(message ?? `Expected element not found: ${selector}`);
  }
}

export class MalformedFieldError extends LibrusError {
  constructor(
    public readonly field: string,
    public readonly raw: string,
  ) {
    super(`Malformed ${field}: ${JSON.stringify(raw)}`);
  }
}
