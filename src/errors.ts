export type SyncErrorKind = 'connection' | 'protocol' | 'stream' | 'schema';

/**
 * Base class for failures raised by the sync engine.
 * `status` carries the HTTP status or gRPC code of the failing call, when there is one.
 */
export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly status?: number;

  constructor(kind: SyncErrorKind, message: string, opts: { cause?: unknown; status?: number } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.kind = kind;
    this.status = opts.status;
    this.name = 'SyncError';
  }
}

/** Channel/session setup failed: unreadable credential file, TLS handshake, unreachable peer. */
export class ConnectionError extends SyncError {
  constructor(message: string, opts: { cause?: unknown; status?: number } = {}) {
    super('connection', message, opts);
    this.name = 'ConnectionError';
  }
}

/** A single call came back with a non-success HTTP status or gRPC code. */
export class ProtocolError extends SyncError {
  constructor(message: string, opts: { cause?: unknown; status?: number } = {}) {
    super('protocol', message, opts);
    this.name = 'ProtocolError';
  }
}

export class StreamError extends SyncError {
  constructor(message: string, opts: { cause?: unknown; status?: number } = {}) {
    super('stream', message, opts);
    this.name = 'StreamError';
  }
}

export class SchemaError extends SyncError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('schema', `${path}: ${message}`);
    this.path = path;
    this.name = 'SchemaError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}
