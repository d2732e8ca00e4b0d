import { SyncError, errorMessage } from './errors.js';
import { timed } from './metrics.js';
import { log } from './observability/log.js';
import type { PullResult, PushResult } from './schemas.js';
import { collectChunks } from './stream/aggregate.js';
import type { SyncTransport, TransportFactory } from './transport/types.js';

function failed(op: string, e: unknown) {
  log.error(`sync.${op}.failed`, { kind: e instanceof SyncError ? e.kind : 'unknown', error: errorMessage(e) });
}

/**
 * Push and pull of mission control data over one transport.
 * Each step awaits the one before it; the first failure aborts the operation and is rethrown as-is.
 */
export class MissionControlSync {
  constructor(private transport: SyncTransport) {}

  /** Local table -> coordinator. The count is what was queried, whatever the coordinator answers. */
  async push(): Promise<PushResult> {
    log.info('sync.push.start', { transport: this.transport.kind });
    try {
      const pairs = await timed('queryLocalHistory', () => this.transport.queryLocalHistory());
      const ack = await timed('registerWithCoordinator', () => this.transport.registerWithCoordinator(pairs));
      log.info('sync.push.done', { pairs: pairs.length, ack: ack.successMessage || undefined });
      return { pairs, count: pairs.length };
    } catch (e) {
      failed('push', e);
      throw e;
    }
  }

  /** Coordinator aggregate -> local node. `force` goes to the node untouched. */
  async pull(opts: { force?: boolean } = {}): Promise<PullResult> {
    const force = opts.force ?? false;
    log.info('sync.pull.start', { transport: this.transport.kind, force });
    try {
      const pairs = await timed('queryAggregatedFromCoordinator', () =>
        collectChunks(this.transport.queryAggregatedFromCoordinator(), (size, index) => log.debug('sync.pull.chunk', { index, size })),
      );
      const success = await timed('importToLocal', () => this.transport.importToLocal(pairs, force));
      log.info('sync.pull.done', { pairs: pairs.length, success });
      return { success, pairs };
    } catch (e) {
      failed('pull', e);
      throw e;
    }
  }
}

/** Open a transport for one sync cycle and close it on every way out. */
export async function withTransport<T>(factory: TransportFactory, fn: (sync: MissionControlSync) => Promise<T>): Promise<T> {
  const transport = await factory();
  let result: T;
  try {
    result = await fn(new MissionControlSync(transport));
  } catch (e) {
    // the sync failure is the one to surface; a close failure on top of it is only logged
    try {
      await transport.close();
    } catch (closeErr) {
      log.warn('transport.close.failed', { transport: transport.kind, error: errorMessage(closeErr) });
    }
    throw e;
  }
  await transport.close();
  return result;
}
