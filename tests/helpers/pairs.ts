import type { CoordinatorPairHistory, RouterPairHistory } from '../../src/schemas.js';

// 33-byte compressed pubkey shapes, base64 as the gateways send bytes
export const nodeId = (fill: number) => Buffer.alloc(33, fill).toString('base64');

export const NODE_A = nodeId(2);
export const NODE_B = nodeId(3);
export const NODE_C = nodeId(4);

export function routerPair(from: string, to: string, seed = 1): RouterPairHistory {
  return {
    node_from: from,
    node_to: to,
    history: {
      fail_time: String(1700000000 + seed),
      fail_amt_sat: String(1000 * seed),
      fail_amt_msat: String(1000000 * seed),
      success_time: String(1700000100 + seed),
      success_amt_sat: String(500 * seed),
      success_amt_msat: String(500000 * seed),
    },
  };
}

export function coordinatorPair(from: string, to: string, seed = 1): CoordinatorPairHistory {
  const p = routerPair(from, to, seed);
  return { node_from: p.node_from, node_to: p.node_to, history: { ...p.history } };
}
