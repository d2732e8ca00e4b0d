import type { SyncConfig } from './config.js';
import { getCallMetrics } from './metrics.js';
import { log } from './observability/log.js';
import type { PullResult, PushResult } from './schemas.js';
import { withTransport } from './sync.js';
import { createTransport } from './transport/index.js';
import type { TransportFactory } from './transport/types.js';

export type RunResult = { pushed?: PushResult; pulled?: PullResult };

export async function runSync(
  cfg: SyncConfig,
  factory: TransportFactory = () => createTransport(cfg),
  print: (line: string) => void = line => console.log(line),
): Promise<RunResult> {
  const out: RunResult = {};
  await withTransport(factory, async sync => {
    if (cfg.direction !== 'pull') {
      out.pushed = await sync.push();
      print(`${out.pushed.count} of your LND Mission Control pairs registered into EC`);
    }
    if (cfg.direction !== 'push') {
      out.pulled = await sync.pull({ force: cfg.importForce });
      if (out.pulled.success) print(`${out.pulled.pairs.length} EC Mission Control pairs imported into your LND`);
    }
  });
  for (const [op, m] of Object.entries(getCallMetrics())) {
    log.debug('sync.metrics', { op, success: m.success, fail: m.fail, avgLatencyMs: m.avgLatencyMs });
  }
  return out;
}
