// Wire records for mission control pair history.
// Node ids are protobuf `bytes` (base64 on both gateways); int64 fields are decimal strings.

export type Int64String = string;

/** routerrpc.PairData, as served by the local node. */
export type RouterPairData = {
  fail_time: Int64String; // unix seconds, "0" = never failed
  fail_amt_sat: Int64String;
  fail_amt_msat: Int64String;
  success_time: Int64String; // unix seconds, "0" = never succeeded
  success_amt_sat: Int64String;
  success_amt_msat: Int64String;
};

/** routerrpc.PairHistory */
export type RouterPairHistory = {
  node_from: string;
  node_to: string;
  history: RouterPairData;
};

/** ecrpc.PairData, as served by the External Coordinator. */
export type CoordinatorPairData = {
  fail_time: Int64String;
  fail_amt_sat: Int64String;
  fail_amt_msat: Int64String;
  success_time: Int64String;
  success_amt_sat: Int64String;
  success_amt_msat: Int64String;
};

/** ecrpc.PairHistory */
export type CoordinatorPairHistory = {
  node_from: string;
  node_to: string;
  history: CoordinatorPairData;
};

export const PAIR_DATA_FIELDS = [
  'fail_time',
  'fail_amt_sat',
  'fail_amt_msat',
  'success_time',
  'success_amt_sat',
  'success_amt_msat',
] as const;

export type RegisterAck = { successMessage: string };

export type PushResult = { pairs: RouterPairHistory[]; count: number };
export type PullResult = { success: boolean; pairs: CoordinatorPairHistory[] };
