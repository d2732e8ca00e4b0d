import type { SyncConfig } from '../config.js';
import { createRestTransport } from './rest.js';
import { createRpcTransport } from './rpc.js';
import type { SyncTransport } from './types.js';

export type { SyncTransport, TransportFactory } from './types.js';
export { RestTransport } from './rest.js';
export { RpcTransport } from './rpc.js';

export function createTransport(cfg: SyncConfig): SyncTransport {
  return cfg.transport === 'rpc' ? createRpcTransport(cfg) : createRestTransport(cfg);
}
