import * as grpc from '@grpc/grpc-js';
import { ConnectionError, ProtocolError, StreamError, SyncError, errorMessage } from '../errors.js';

export function isServiceError(e: unknown): e is grpc.ServiceError {
  return e instanceof Error && 'code' in e && typeof e.code === 'number' && 'details' in e && 'metadata' in e;
}

/** Translate a failed unary call (or the opening of a stream) into a sync error. */
export function mapCallError(e: unknown, what: string): SyncError {
  if (e instanceof SyncError) return e;
  if (isServiceError(e)) {
    const name = grpc.status[e.code] ?? String(e.code);
    if (e.code === grpc.status.UNAVAILABLE) {
      return new ConnectionError(`${what}: ${name} ${e.details}`, { cause: e, status: e.code });
    }
    return new ProtocolError(`${what} failed with ${name}: ${e.details}`, { cause: e, status: e.code });
  }
  // anything else was thrown before a response existed (dns, tcp, tls, socket)
  return new ConnectionError(`${what}: ${errorMessage(e)}`, { cause: e });
}

/** Errors before the first message are call failures; after it, the stream broke. */
export function mapStreamError(e: unknown, what: string, received: number): SyncError {
  if (e instanceof SyncError) return e;
  if (received === 0) return mapCallError(e, what);
  const status = isServiceError(e) ? e.code : undefined;
  return new StreamError(`${what} stream broke after ${received} message(s): ${errorMessage(e)}`, { cause: e, status });
}
