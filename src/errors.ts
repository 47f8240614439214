/**
 * Errors raised while loading templates or relaying an invocation.
 * Each carries the HTTP status the server answers with.
 */
export class RelayError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = new.target.name;
  }
}

/** Fatal at startup: the config file is missing, unreadable or malformed. */
export class ConfigLoadError extends RelayError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class MalformedRequestError extends RelayError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class TemplateNotFoundError extends RelayError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class RequestBuildError extends RelayError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class UpstreamTransportError extends RelayError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class UpstreamBodyReadError extends RelayError {
  constructor(message: string) {
    super(message, 502);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
