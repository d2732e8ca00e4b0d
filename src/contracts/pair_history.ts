// Dependency-free decoders for pair history records coming off either gateway.
// Zero-valued fields are omitted on the wire, so an absent int64 reads as "0".
// The coordinator's gateway emits lowerCamelCase JSON names; lnd's keeps proto names. Both are read.

import { SchemaError } from '../errors.js';
import { PAIR_DATA_FIELDS, type CoordinatorPairHistory, type Int64String, type RouterPairHistory } from '../schemas.js';

type PairShape = {
  node_from: string;
  node_to: string;
  history: Record<typeof PAIR_DATA_FIELDS[number], Int64String>;
};

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function readInt64(v: unknown, path: string): Int64String {
  if (v === undefined || v === null) return '0';
  if (typeof v === 'number') {
    if (!Number.isSafeInteger(v) || v < 0) throw new SchemaError(path, `expected non-negative integer, got ${v}`);
    return String(v);
  }
  if (typeof v === 'string') {
    if (!/^\d+$/.test(v)) throw new SchemaError(path, `expected non-negative integer, got "${v}"`);
    return BigInt(v).toString();
  }
  throw new SchemaError(path, `expected integer, got ${typeof v}`);
}

export function field(obj: Record<string, unknown>, name: string): unknown {
  if (obj[name] !== undefined) return obj[name];
  return obj[name.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase())];
}

function readNodeId(v: unknown, path: string): string {
  if (typeof v !== 'string' || !v) throw new SchemaError(path, 'missing node id');
  return v;
}

function readShape(obj: unknown, path: string): PairShape {
  if (!isRecord(obj)) throw new SchemaError(path, 'expected object');
  const node_from = readNodeId(field(obj, 'node_from'), `${path}.node_from`);
  const node_to = readNodeId(field(obj, 'node_to'), `${path}.node_to`);
  if (node_from === node_to) throw new SchemaError(`${path}.node_to`, 'node_to must differ from node_from');
  const h = field(obj, 'history');
  if (!isRecord(h)) throw new SchemaError(`${path}.history`, 'missing history');
  return {
    node_from,
    node_to,
    history: {
      fail_time: readInt64(field(h, 'fail_time'), `${path}.history.fail_time`),
      fail_amt_sat: readInt64(field(h, 'fail_amt_sat'), `${path}.history.fail_amt_sat`),
      fail_amt_msat: readInt64(field(h, 'fail_amt_msat'), `${path}.history.fail_amt_msat`),
      success_time: readInt64(field(h, 'success_time'), `${path}.history.success_time`),
      success_amt_sat: readInt64(field(h, 'success_amt_sat'), `${path}.history.success_amt_sat`),
      success_amt_msat: readInt64(field(h, 'success_amt_msat'), `${path}.history.success_amt_msat`),
    },
  };
}

export function readRouterPair(obj: unknown, path = 'pair'): RouterPairHistory {
  return readShape(obj, path);
}

export function readCoordinatorPair(obj: unknown, path = 'pair'): CoordinatorPairHistory {
  return readShape(obj, path);
}

/**
 * Decode the `pairs` list of a response message. An absent list is an empty table.
 */
export function readPairList<T>(msg: unknown, read: (obj: unknown, path: string) => T): T[] {
  if (!isRecord(msg)) throw new SchemaError('response', 'expected object');
  const pairs = msg.pairs;
  if (pairs === undefined || pairs === null) return [];
  if (!Array.isArray(pairs)) throw new SchemaError('pairs', 'expected array');
  return pairs.map((p, i) => read(p, `pairs[${i}]`));
}
