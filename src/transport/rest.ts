import { Agent, request, type Dispatcher } from 'undici';
import type { SyncConfig } from '../config.js';
import { field, isRecord, readCoordinatorPair, readPairList, readRouterPair } from '../contracts/pair_history.js';
import { toCoordinatorPair, toNodePair } from '../convert.js';
import { MacaroonCredential, readTlsCert } from '../credentials.js';
import { ProtocolError, SchemaError, StreamError, errorMessage } from '../errors.js';
import { log } from '../observability/log.js';
import type { CoordinatorPairHistory, RegisterAck, RouterPairHistory } from '../schemas.js';
import { readNdjson } from '../stream/ndjson.js';
import { mapCallError, mapStreamError } from './errors.js';
import type { SyncTransport } from './types.js';

export const PATHS = {
  queryAggregated: '/v1/query_aggregated_mission_control',
  register: '/v1/register_mission_control',
  queryLocal: '/v2/router/mc',
  importLocal: '/v2/router/x/importhistory',
} as const;

export type RestTransportOptions = {
  /** e.g. https://localhost:8081 */
  ecOrigin: string;
  /** e.g. https://localhost:8080 */
  lndOrigin: string;
  macaroon: MacaroonCredential;
  /** Session trusting the coordinator's certificate. */
  ecDispatcher: Dispatcher;
  /** Session trusting the node's certificate. */
  lndDispatcher: Dispatcher;
};

type Side = 'ec' | 'lnd';

// One aggregated chunk: {"result":{"pairs":[...]}}, or {"error":{...}} when the gateway's stream fails.
export function readAggregatedChunk(msg: unknown): CoordinatorPairHistory[] {
  if (!isRecord(msg)) throw new SchemaError('chunk', 'expected object');
  const err = msg.error;
  if (isRecord(err)) {
    const code = typeof err.code === 'number' ? err.code : undefined;
    const text = typeof err.message === 'string' ? err.message : 'unknown error';
    throw new StreamError(`coordinator stream error: ${text}`, { status: code });
  }
  if (!isRecord(msg.result)) throw new SchemaError('chunk.result', 'missing result');
  return readPairList(msg.result, readCoordinatorPair);
}

export class RestTransport implements SyncTransport {
  readonly kind = 'rest' as const;
  private closed = false;

  constructor(private opts: RestTransportOptions) {}

  private async send(side: Side, method: 'GET' | 'POST', path: string, body?: unknown): Promise<Dispatcher.ResponseData> {
    const origin = side === 'ec' ? this.opts.ecOrigin : this.opts.lndOrigin;
    const headers: Record<string, string> = side === 'lnd' ? this.opts.macaroon.header() : {};
    if (body !== undefined) headers['content-type'] = 'application/json';
    let res: Dispatcher.ResponseData;
    try {
      res = await request(origin + path, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        dispatcher: side === 'ec' ? this.opts.ecDispatcher : this.opts.lndDispatcher,
      });
    } catch (e) {
      throw mapCallError(e, `${method} ${path}`);
    }
    if (res.statusCode < 200 || res.statusCode >= 300) {
      let text: string;
      try {
        text = await res.body.text();
      } catch (e) {
        text = `(body unreadable: ${errorMessage(e)})`;
      }
      throw new ProtocolError(`${method} ${path} returned HTTP ${res.statusCode}${text ? ': ' + text.slice(0, 200) : ''}`, { status: res.statusCode });
    }
    return res;
  }

  private async json(res: Dispatcher.ResponseData, what: string): Promise<unknown> {
    try {
      return await res.body.json();
    } catch (e) {
      throw new ProtocolError(`${what}: response is not JSON`, { cause: e, status: res.statusCode });
    }
  }

  async queryLocalHistory(): Promise<RouterPairHistory[]> {
    const res = await this.send('lnd', 'GET', PATHS.queryLocal);
    return readPairList(await this.json(res, PATHS.queryLocal), readRouterPair);
  }

  async registerWithCoordinator(pairs: readonly RouterPairHistory[]): Promise<RegisterAck> {
    const res = await this.send('ec', 'POST', PATHS.register, { pairs: pairs.map(toCoordinatorPair) });
    const body = await this.json(res, PATHS.register);
    const msg = isRecord(body) ? field(body, 'success_message') : undefined;
    return { successMessage: typeof msg === 'string' ? msg : '' };
  }

  async *queryAggregatedFromCoordinator(): AsyncGenerator<CoordinatorPairHistory[]> {
    const res = await this.send('ec', 'GET', PATHS.queryAggregated);
    let received = 0;
    try {
      for await (const msg of readNdjson(res.body)) {
        received++;
        yield readAggregatedChunk(msg);
      }
    } catch (e) {
      throw mapStreamError(e, PATHS.queryAggregated, Math.max(1, received));
    }
  }

  async importToLocal(pairs: readonly CoordinatorPairHistory[], force = false): Promise<boolean> {
    const res = await this.send('lnd', 'POST', PATHS.importLocal, { pairs: pairs.map(toNodePair), force });
    // drain so the connection goes back to the pool
    await res.body.dump();
    return res.statusCode === 200;
  }

  async close() {
    if (this.closed) return;
    this.closed = true;
    const dispatchers = new Set([this.opts.ecDispatcher, this.opts.lndDispatcher]);
    await Promise.all([...dispatchers].map(d => d.close()));
    log.debug('transport.closed', { transport: this.kind });
  }
}

export function createRestTransport(cfg: SyncConfig): RestTransport {
  const macaroon = MacaroonCredential.fromFile(cfg.lnd.macaroonPath);
  const lndCa = readTlsCert(cfg.lnd.tlsCertPath, 'lnd tls cert');
  const ecCa = readTlsCert(cfg.ec.tlsCertPath, 'ec tls cert');
  return new RestTransport({
    ecOrigin: `https://${cfg.ec.restHost}`,
    lndOrigin: `https://${cfg.lnd.restHost}`,
    macaroon,
    ecDispatcher: new Agent({ connect: { ca: ecCa } }),
    lndDispatcher: new Agent({ connect: { ca: lndCa } }),
  });
}
