import { StreamError, SyncError, errorMessage } from '../errors.js';

export type Chunks<T> = Iterable<readonly T[]> | AsyncIterable<readonly T[]>;

/**
 * Flatten streamed response chunks into one array, keeping chunk order and order within a chunk.
 * A failure at any point drops what was collected so far; there is no partial result.
 */
export async function collectChunks<T>(chunks: Chunks<T>, onChunk?: (size: number, index: number) => void): Promise<T[]> {
  const out: T[] = [];
  let index = 0;
  try {
    for await (const chunk of chunks) {
      out.push(...chunk);
      onChunk?.(chunk.length, index++);
    }
  } catch (e) {
    if (e instanceof SyncError) throw e;
    throw new StreamError(`stream failed after ${index} chunk(s): ${errorMessage(e)}`, { cause: e });
  }
  return out;
}
