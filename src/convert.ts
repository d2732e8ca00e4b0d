import { readCoordinatorPair, readRouterPair } from './contracts/pair_history.js';
import type { CoordinatorPairHistory, RouterPairHistory } from './schemas.js';

export type ConvertDirection = 'node-to-coordinator' | 'coordinator-to-node';

// Field-for-field copy. The two schemas only look alike; keep every field explicit here
// so a divergence on either side shows up as a compile error.

export function toCoordinatorPair(pair: RouterPairHistory): CoordinatorPairHistory {
  const p = readRouterPair(pair);
  return {
    node_from: p.node_from,
    node_to: p.node_to,
    history: {
      fail_time: p.history.fail_time,
      fail_amt_sat: p.history.fail_amt_sat,
      fail_amt_msat: p.history.fail_amt_msat,
      success_time: p.history.success_time,
      success_amt_sat: p.history.success_amt_sat,
      success_amt_msat: p.history.success_amt_msat,
    },
  };
}

export function toNodePair(pair: CoordinatorPairHistory): RouterPairHistory {
  const p = readCoordinatorPair(pair);
  return {
    node_from: p.node_from,
    node_to: p.node_to,
    history: {
      fail_time: p.history.fail_time,
      fail_amt_sat: p.history.fail_amt_sat,
      fail_amt_msat: p.history.fail_amt_msat,
      success_time: p.history.success_time,
      success_amt_sat: p.history.success_amt_sat,
      success_amt_msat: p.history.success_amt_msat,
    },
  };
}

export function convertPair(pair: RouterPairHistory, direction: 'node-to-coordinator'): CoordinatorPairHistory;
export function convertPair(pair: CoordinatorPairHistory, direction: 'coordinator-to-node'): RouterPairHistory;
export function convertPair(pair: RouterPairHistory | CoordinatorPairHistory, direction: ConvertDirection): RouterPairHistory | CoordinatorPairHistory {
  return direction === 'node-to-coordinator' ? toCoordinatorPair(pair) : toNodePair(pair);
}
