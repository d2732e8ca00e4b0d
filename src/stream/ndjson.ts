import { StreamError } from '../errors.js';

/** Split a byte stream into newline-delimited JSON values. Lines may arrive split across reads. */
export async function* readNdjson(body: AsyncIterable<Uint8Array | string>): AsyncGenerator<unknown> {
  const decoder = new TextDecoder();
  let buf = '';
  let lineNo = 0;
  const parse = (line: string) => {
    lineNo++;
    try {
      return JSON.parse(line) as unknown;
    } catch (e) {
      throw new StreamError(`invalid JSON on line ${lineNo}`, { cause: e });
    }
  };
  for await (const part of body) {
    buf += typeof part === 'string' ? part : decoder.decode(part, { stream: true });
    let nl = buf.indexOf('\n');
    while (nl >= 0) {
      const line = buf.slice(0, nl).trim();
      buf = buf.slice(nl + 1);
      if (line) yield parse(line);
      nl = buf.indexOf('\n');
    }
  }
  buf += decoder.decode();
  const tail = buf.trim();
  if (tail) yield parse(tail);
}
