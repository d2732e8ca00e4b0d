// Replace every occurrence of each secret; needles shorter than 4 chars would shred ordinary text.
export function redact(line: string, secrets: readonly string[]): string {
  let out = line;
  for (const needle of secrets) {
    if (needle && needle.length >= 4) out = out.split(needle).join('[REDACTED]');
  }
  return out;
}
