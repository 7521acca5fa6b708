const FETCHABLE_PROTOCOLS = new Set(['http:', 'https:']);

/** Absolute http(s) URL with a host, or null. */
export function parseHttpUrl(value: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return null;
  }
  if (!FETCHABLE_PROTOCOLS.has(parsed.protocol) || parsed.hostname.length === 0) {
    return null;
  }
  return parsed;
}
