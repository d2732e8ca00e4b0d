import fs from 'node:fs';
import { ConnectionError, errorMessage } from './errors.js';
import { registerSecret } from './observability/log.js';

export const MACAROON_HEADER = 'Grpc-Metadata-macaroon';
export const MACAROON_METADATA_KEY = 'macaroon';

/**
 * Bearer credential for the local node, bound to a transport when it is built.
 * The transport attaches it to every node call itself.
 */
export class MacaroonCredential {
  readonly hex: string;

  private constructor(hex: string) {
    this.hex = hex;
    registerSecret(hex);
  }

  static fromHex(hex: string): MacaroonCredential {
    const clean = hex.trim().toLowerCase();
    if (!clean || clean.length % 2 !== 0 || !/^[0-9a-f]+$/.test(clean)) {
      throw new ConnectionError('macaroon is not valid hex');
    }
    return new MacaroonCredential(clean);
  }

  static fromBytes(bytes: Uint8Array): MacaroonCredential {
    if (bytes.length === 0) throw new ConnectionError('macaroon is empty');
    return new MacaroonCredential(Buffer.from(bytes).toString('hex'));
  }

  static fromFile(path: string | undefined): MacaroonCredential {
    return MacaroonCredential.fromBytes(readCredentialFile(path, 'macaroon'));
  }

  header(): Record<string, string> {
    return { [MACAROON_HEADER]: this.hex };
  }
}

export function readCredentialFile(path: string | undefined, what: string): Buffer {
  if (!path) throw new ConnectionError(`${what} path not configured`);
  try {
    return fs.readFileSync(path);
  } catch (e) {
    throw new ConnectionError(`cannot read ${what} at ${path}: ${errorMessage(e)}`, { cause: e });
  }
}

/** Trusted root for a peer's self-signed TLS certificate. */
export function readTlsCert(path: string | undefined, what = 'tls cert'): Buffer {
  return readCredentialFile(path, what);
}
