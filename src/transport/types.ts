import type { CoordinatorPairHistory, RegisterAck, RouterPairHistory } from '../schemas.js';

/**
 * The four calls a sync cycle needs, implemented once per wire protocol.
 * Node-side records go in and out as {@link RouterPairHistory}; coordinator-side as
 * {@link CoordinatorPairHistory}. Implementations convert at the boundary.
 */
export interface SyncTransport {
  readonly kind: 'rest' | 'rpc';
  /** Full local mission control table, fetched in one call. */
  queryLocalHistory(): Promise<RouterPairHistory[]>;
  registerWithCoordinator(pairs: readonly RouterPairHistory[]): Promise<RegisterAck>;
  /** Aggregated table as it streams in; one array per response message. */
  queryAggregatedFromCoordinator(): AsyncIterable<CoordinatorPairHistory[]>;
  /** `force` is forwarded as-is; the node decides what it means for fresher entries. */
  importToLocal(pairs: readonly CoordinatorPairHistory[], force?: boolean): Promise<boolean>;
  close(): Promise<void>;
}

export type TransportFactory = () => SyncTransport | Promise<SyncTransport>;
