import type { ErrorKind } from "@agent-escrow/types/rest";

export type { ErrorKind };

export interface EscrowErrorOptions {
  status?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class EscrowError extends Error {
  public readonly kind: ErrorKind;
  public readonly status?: number;
  public readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, options: EscrowErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.status = options.status;
    this.details = options.details;
  }

  /** Server and transport failures may succeed when repeated; everything else will not. */
  get retryable(): boolean {
    return this.kind === "server" || this.kind === "transport";
  }
}

export class ValidationError extends EscrowError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: EscrowErrorOptions = {}) {
    super("validation", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.issues = issues;
  }
}

export class AuthError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("auth", message, options);
  }
}

export class ClientError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("client", message, options);
  }
}

export class ServerError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("server", message, options);
  }
}

export class ProtocolError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("protocol", message, options);
  }
}

export class StateError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("state", message, options);
  }
}

export class TransportError extends EscrowError {
  constructor(message: string, options: EscrowErrorOptions = {}) {
    super("transport", message, options);
  }
}

export function isEscrowError(value: unknown): value is EscrowError {
  return value instanceof EscrowError;
}

export function errorFromResponse(
  status: number,
  message: string,
  details?: Record<string, unknown>
): EscrowError {
  const options = { status, details };
  if (status === 401) {
    return new AuthError(`Unauthorized: ${message}`, options);
  }
  if (status >= 500) {
    return new ServerError(`Service error ${status}: ${message}`, options);
  }
  if (status >= 400) {
    return new ClientError(`Request rejected (${status}): ${message}`, options);
  }
  return new ProtocolError(`Unexpected HTTP ${status}: ${message}`, options);
}

export function describeError(error: unknown): string {
  if (isEscrowError(error)) {
    return `[${error.kind}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
