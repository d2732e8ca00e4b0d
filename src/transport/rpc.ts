import * as grpc from '@grpc/grpc-js';
import type { MethodDefinition, ServiceDefinition } from '@grpc/proto-loader';
import type { SyncConfig } from '../config.js';
import { isRecord, readCoordinatorPair, readPairList, readRouterPair } from '../contracts/pair_history.js';
import { toCoordinatorPair, toNodePair } from '../convert.js';
import { MACAROON_METADATA_KEY, MacaroonCredential, readTlsCert } from '../credentials.js';
import { log } from '../observability/log.js';
import type { CoordinatorPairHistory, RegisterAck, RouterPairHistory } from '../schemas.js';
import { mapCallError, mapStreamError } from './errors.js';
import { loadServices, method } from './protos.js';
import type { SyncTransport } from './types.js';

export type ImportRequest = { pairs: RouterPairHistory[]; force: boolean };
export type RegisterRequest = { pairs: CoordinatorPairHistory[] };

/** routerrpc.Router, as far as sync needs it. Responses are raw decoded messages. */
export interface RouterRpcClient {
  queryMissionControl(metadata: grpc.Metadata): Promise<unknown>;
  xImportMissionControl(req: ImportRequest, metadata: grpc.Metadata): Promise<unknown>;
  close(): void;
}

/** ecrpc.ExternalCoordinator */
export interface CoordinatorRpcClient {
  registerMissionControl(req: RegisterRequest): Promise<unknown>;
  queryAggregatedMissionControl(): AsyncIterable<unknown>;
  close(): void;
}

function unary(client: grpc.Client, def: MethodDefinition<object, object>, arg: object, metadata: grpc.Metadata): Promise<unknown> {
  return new Promise((resolve, reject) => {
    client.makeUnaryRequest(def.path, def.requestSerialize, def.responseDeserialize, arg, metadata, (err, value) => {
      if (err) reject(err);
      else resolve(value);
    });
  });
}

export class GrpcRouterClient implements RouterRpcClient {
  private client: grpc.Client;
  constructor(host: string, creds: grpc.ChannelCredentials, private svc: ServiceDefinition) {
    this.client = new grpc.Client(host, creds);
  }
  queryMissionControl(metadata: grpc.Metadata) {
    return unary(this.client, method(this.svc, 'QueryMissionControl'), {}, metadata);
  }
  xImportMissionControl(req: ImportRequest, metadata: grpc.Metadata) {
    return unary(this.client, method(this.svc, 'XImportMissionControl'), req, metadata);
  }
  close() { this.client.close(); }
}

export class GrpcCoordinatorClient implements CoordinatorRpcClient {
  private client: grpc.Client;
  constructor(host: string, creds: grpc.ChannelCredentials, private svc: ServiceDefinition) {
    this.client = new grpc.Client(host, creds);
  }
  registerMissionControl(req: RegisterRequest) {
    return unary(this.client, method(this.svc, 'RegisterMissionControl'), req, new grpc.Metadata());
  }
  queryAggregatedMissionControl(): AsyncIterable<unknown> {
    const def = method(this.svc, 'QueryAggregatedMissionControl');
    return this.client.makeServerStreamRequest(def.path, def.requestSerialize, def.responseDeserialize, {}, new grpc.Metadata());
  }
  close() { this.client.close(); }
}

export type RpcTransportOptions = {
  router: RouterRpcClient;
  coordinator: CoordinatorRpcClient;
  macaroon: MacaroonCredential;
};

export class RpcTransport implements SyncTransport {
  readonly kind = 'rpc' as const;
  private closed = false;

  constructor(private opts: RpcTransportOptions) {}

  private nodeMetadata(): grpc.Metadata {
    const md = new grpc.Metadata();
    md.set(MACAROON_METADATA_KEY, this.opts.macaroon.hex);
    return md;
  }

  async queryLocalHistory(): Promise<RouterPairHistory[]> {
    let res: unknown;
    try {
      res = await this.opts.router.queryMissionControl(this.nodeMetadata());
    } catch (e) {
      throw mapCallError(e, 'QueryMissionControl');
    }
    return readPairList(res, readRouterPair);
  }

  async registerWithCoordinator(pairs: readonly RouterPairHistory[]): Promise<RegisterAck> {
    const req: RegisterRequest = { pairs: pairs.map(toCoordinatorPair) };
    let res: unknown;
    try {
      res = await this.opts.coordinator.registerMissionControl(req);
    } catch (e) {
      throw mapCallError(e, 'RegisterMissionControl');
    }
    const msg = isRecord(res) && typeof res.success_message === 'string' ? res.success_message : '';
    return { successMessage: msg };
  }

  async *queryAggregatedFromCoordinator(): AsyncGenerator<CoordinatorPairHistory[]> {
    let received = 0;
    try {
      for await (const msg of this.opts.coordinator.queryAggregatedMissionControl()) {
        received++;
        yield readPairList(msg, readCoordinatorPair);
      }
    } catch (e) {
      throw mapStreamError(e, 'QueryAggregatedMissionControl', received);
    }
  }

  async importToLocal(pairs: readonly CoordinatorPairHistory[], force = false): Promise<boolean> {
    const req: ImportRequest = { pairs: pairs.map(toNodePair), force };
    try {
      await this.opts.router.xImportMissionControl(req, this.nodeMetadata());
    } catch (e) {
      throw mapCallError(e, 'XImportMissionControl');
    }
    return true;
  }

  async close() {
    if (this.closed) return;
    this.closed = true;
    this.opts.router.close();
    this.opts.coordinator.close();
    log.debug('transport.closed', { transport: this.kind });
  }
}

export function createRpcTransport(cfg: SyncConfig): RpcTransport {
  const macaroon = MacaroonCredential.fromFile(cfg.lnd.macaroonPath);
  const lndCert = readTlsCert(cfg.lnd.tlsCertPath, 'lnd tls cert');
  const ecCert = readTlsCert(cfg.ec.tlsCertPath, 'ec tls cert');
  const services = loadServices();
  return new RpcTransport({
    router: new GrpcRouterClient(cfg.lnd.grpcHost, grpc.credentials.createSsl(lndCert), services.router),
    coordinator: new GrpcCoordinatorClient(cfg.ec.grpcHost, grpc.credentials.createSsl(ecCert), services.coordinator),
    macaroon,
  });
}
