import { describe, it, expect } from 'vitest';
import * as grpc from '@grpc/grpc-js';
import { MacaroonCredential } from '../src/credentials.js';
import { ConnectionError, ProtocolError, SchemaError, StreamError } from '../src/errors.js';
import { collectChunks } from '../src/stream/aggregate.js';
import { loadServices, method } from '../src/transport/protos.js';
import {
  RpcTransport,
  type CoordinatorRpcClient,
  type ImportRequest,
  type RegisterRequest,
  type RouterRpcClient,
} from '../src/transport/rpc.js';
import { NODE_A, NODE_B, NODE_C, coordinatorPair, routerPair } from './helpers/pairs.js';

const MACAROON = '0201036c6e6402f8';

function serviceError(code: grpc.status, details: string): grpc.ServiceError {
  return Object.assign(new Error(`${code} ${grpc.status[code]}: ${details}`), { code, details, metadata: new grpc.Metadata() });
}

class FakeRouter implements RouterRpcClient {
  queries: grpc.Metadata[] = [];
  imports: Array<{ req: ImportRequest; metadata: grpc.Metadata }> = [];
  closed = 0;
  constructor(private table: unknown = { pairs: [] }, private fail?: Error) {}
  async queryMissionControl(metadata: grpc.Metadata) {
    this.queries.push(metadata);
    if (this.fail) throw this.fail;
    return this.table;
  }
  async xImportMissionControl(req: ImportRequest, metadata: grpc.Metadata) {
    this.imports.push({ req, metadata });
    if (this.fail) throw this.fail;
    return {};
  }
  close() { this.closed++; }
}

class FakeCoordinator implements CoordinatorRpcClient {
  registered: RegisterRequest[] = [];
  closed = 0;
  constructor(private chunks: unknown[] = [], private streamFail?: Error) {}
  async registerMissionControl(req: RegisterRequest) {
    this.registered.push(req);
    return { success_message: `Successfully registered ${req.pairs.length} pairs` };
  }
  async *queryAggregatedMissionControl() {
    for (const c of this.chunks) yield c;
    if (this.streamFail) throw this.streamFail;
  }
  close() { this.closed++; }
}

function build(router: FakeRouter, coordinator: FakeCoordinator) {
  return new RpcTransport({ router, coordinator, macaroon: MacaroonCredential.fromHex(MACAROON) });
}

describe('RpcTransport', () => {
  it('sends the macaroon as call metadata on node calls', async () => {
    const router = new FakeRouter({ pairs: [routerPair(NODE_A, NODE_B)] });
    const t = build(router, new FakeCoordinator());
    expect(await t.queryLocalHistory()).toEqual([routerPair(NODE_A, NODE_B)]);
    await t.importToLocal([]);
    expect(router.queries[0].get('macaroon')).toEqual([MACAROON]);
    expect(router.imports[0].metadata.get('macaroon')).toEqual([MACAROON]);
  });

  it('converts pairs for register and import, force defaulting to false', async () => {
    const router = new FakeRouter();
    const coordinator = new FakeCoordinator();
    const t = build(router, coordinator);
    const ack = await t.registerWithCoordinator([routerPair(NODE_A, NODE_B, 2)]);
    expect(ack).toEqual({ successMessage: 'Successfully registered 1 pairs' });
    expect(coordinator.registered).toEqual([{ pairs: [coordinatorPair(NODE_A, NODE_B, 2)] }]);

    expect(await t.importToLocal([coordinatorPair(NODE_B, NODE_C, 3)])).toBe(true);
    expect(await t.importToLocal([], true)).toBe(true);
    expect(router.imports.map(i => i.req)).toEqual([
      { pairs: [routerPair(NODE_B, NODE_C, 3)], force: false },
      { pairs: [], force: true },
    ]);
  });

  it('yields one chunk per streamed message', async () => {
    const t = build(new FakeRouter(), new FakeCoordinator([
      { pairs: [coordinatorPair(NODE_A, NODE_B, 1)] },
      { pairs: [coordinatorPair(NODE_B, NODE_C, 2), coordinatorPair(NODE_C, NODE_A, 3)] },
    ]));
    expect(await collectChunks(t.queryAggregatedFromCoordinator())).toEqual([
      coordinatorPair(NODE_A, NODE_B, 1),
      coordinatorPair(NODE_B, NODE_C, 2),
      coordinatorPair(NODE_C, NODE_A, 3),
    ]);
  });

  it('maps a mid-stream failure to StreamError', async () => {
    const t = build(new FakeRouter(), new FakeCoordinator(
      [{ pairs: [coordinatorPair(NODE_A, NODE_B)] }],
      serviceError(grpc.status.INTERNAL, 'boom'),
    ));
    const err = await collectChunks(t.queryAggregatedFromCoordinator()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StreamError);
    expect(err).toMatchObject({ status: grpc.status.INTERNAL });
  });

  it('maps a failure before the first message to a call error', async () => {
    const t = build(new FakeRouter(), new FakeCoordinator([], serviceError(grpc.status.UNAVAILABLE, 'no connection')));
    await expect(collectChunks(t.queryAggregatedFromCoordinator())).rejects.toBeInstanceOf(ConnectionError);
  });

  it('maps unary status codes', async () => {
    const denied = build(new FakeRouter({}, serviceError(grpc.status.PERMISSION_DENIED, 'verification failed')), new FakeCoordinator());
    const err = await denied.queryLocalHistory().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toMatchObject({ status: grpc.status.PERMISSION_DENIED });

    const down = build(new FakeRouter({}, serviceError(grpc.status.UNAVAILABLE, 'connection refused')), new FakeCoordinator());
    await expect(down.importToLocal([])).rejects.toBeInstanceOf(ConnectionError);
  });

  it('rejects malformed node records', async () => {
    const t = build(new FakeRouter({ pairs: [{ node_from: '', node_to: NODE_B, history: {} }] }), new FakeCoordinator());
    await expect(t.queryLocalHistory()).rejects.toBeInstanceOf(SchemaError);
  });

  it('closes both channels once', async () => {
    const router = new FakeRouter();
    const coordinator = new FakeCoordinator();
    const t = build(router, coordinator);
    await t.close();
    await t.close();
    expect([router.closed, coordinator.closed]).toEqual([1, 1]);
  });
});

describe('proto definitions', () => {
  it('declares the four calls with the expected shapes', () => {
    const { router, coordinator } = loadServices();
    expect(method(router, 'QueryMissionControl').path).toBe('/routerrpc.Router/QueryMissionControl');
    expect(method(router, 'XImportMissionControl').responseStream).toBe(false);
    expect(method(coordinator, 'RegisterMissionControl').path).toBe('/ecrpc.ExternalCoordinator/RegisterMissionControl');
    expect(method(coordinator, 'QueryAggregatedMissionControl').responseStream).toBe(true);
  });

  it('carries int64 strings and base64 node ids through the wire codec', () => {
    const def = method(loadServices().router, 'XImportMissionControl');
    const req = { pairs: [routerPair(NODE_A, NODE_B, 2)], force: true };
    const decoded = method(loadServices().router, 'XImportMissionControl').requestDeserialize(def.requestSerialize(req));
    expect(decoded).toEqual(req);
  });
});
