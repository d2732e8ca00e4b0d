type CallStat = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  totalLatencyMs: number;
  count: number;
  lastError?: string;
};

export type CallSnapshot = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  avgLatencyMs: number;
  lastError?: string;
  errorPct: number;
};

const stats: Record<string, CallStat> = Object.create(null);

function ensure(op: string): CallStat {
  if (!stats[op]) {
    stats[op] = { success: 0, fail: 0, lastLatencyMs: 0, totalLatencyMs: 0, count: 0 };
  }
  return stats[op];
}

export function recordCallSuccess(op: string, latencyMs: number) {
  const s = ensure(op);
  s.success += 1;
  s.count += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
}

export function recordCallFailure(op: string, latencyMs: number, error?: unknown) {
  const s = ensure(op);
  s.fail += 1;
  s.count += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
  s.lastError = error instanceof Error ? error.message : String(error ?? 'error');
}

/** Time one transport call, recording it under `op` whether it resolves or throws. */
export async function timed<T>(op: string, fn: () => Promise<T>): Promise<T> {
  const t0 = Date.now();
  try {
    const out = await fn();
    recordCallSuccess(op, Date.now() - t0);
    return out;
  } catch (e) {
    recordCallFailure(op, Date.now() - t0, e);
    throw e;
  }
}

export function getCallMetrics(): Record<string, CallSnapshot> {
  const out: Record<string, CallSnapshot> = {};
  for (const [k, v] of Object.entries(stats)) {
    const total = v.success + v.fail;
    out[k] = {
      success: v.success,
      fail: v.fail,
      lastLatencyMs: v.lastLatencyMs,
      avgLatencyMs: v.count > 0 ? Math.round(v.totalLatencyMs / v.count) : 0,
      lastError: v.lastError,
      errorPct: total ? +(100 * v.fail / total).toFixed(2) : 0,
    };
  }
  return out;
}

export function resetCallMetrics() {
  for (const k of Object.keys(stats)) delete stats[k];
}
