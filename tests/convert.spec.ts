import { describe, it, expect } from 'vitest';
import { convertPair, toCoordinatorPair, toNodePair } from '../src/convert.js';
import { SchemaError } from '../src/errors.js';
import { NODE_A, NODE_B, coordinatorPair, routerPair } from './helpers/pairs.js';

describe('pair conversion', () => {
  it('copies every field node -> coordinator', () => {
    const p = routerPair(NODE_A, NODE_B, 3);
    expect(toCoordinatorPair(p)).toEqual({
      node_from: NODE_A,
      node_to: NODE_B,
      history: {
        fail_time: '1700000003',
        fail_amt_sat: '3000',
        fail_amt_msat: '3000000',
        success_time: '1700000103',
        success_amt_sat: '1500',
        success_amt_msat: '1500000',
      },
    });
  });

  it('round trips both ways', () => {
    const r = routerPair(NODE_A, NODE_B, 7);
    expect(toNodePair(toCoordinatorPair(r))).toEqual(r);
    const c = coordinatorPair(NODE_B, NODE_A, 9);
    expect(convertPair(convertPair(c, 'coordinator-to-node'), 'node-to-coordinator')).toEqual(c);
  });

  it('keeps sat and msat independent', () => {
    const r = routerPair(NODE_A, NODE_B);
    r.history.fail_amt_sat = '1';
    r.history.fail_amt_msat = '999';
    const c = toCoordinatorPair(r);
    expect(c.history.fail_amt_sat).toBe('1');
    expect(c.history.fail_amt_msat).toBe('999');
  });

  it('keeps int64 values beyond 2^53 exactly', () => {
    const r = routerPair(NODE_A, NODE_B);
    r.history.success_amt_msat = '9223372036854775807';
    expect(toCoordinatorPair(r).history.success_amt_msat).toBe('9223372036854775807');
  });

  it('does not mutate or alias the input', () => {
    const r = routerPair(NODE_A, NODE_B);
    const c = toCoordinatorPair(r);
    c.history.fail_time = '0';
    expect(r.history.fail_time).toBe('1700000001');
    expect(c.history).not.toBe(r.history);
  });

  it('rejects a pair pointing at itself', () => {
    expect(() => toCoordinatorPair(routerPair(NODE_A, NODE_A))).toThrow(SchemaError);
  });
});
