/** Percent-encodes everything outside the RFC 3986 unreserved set, space as %20. */
export function escapeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Encodes params sorted by key. Spaces are always %20, never '+': some
 * custom URL handlers do not decode '+'.
 */
export function encodeQuery(params: Map<string, string> | Record<string, string>): string {
  const entries = params instanceof Map ? [...params.entries()] : Object.entries(params);
  return entries
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${escapeQueryComponent(key)}=${escapeQueryComponent(value)}`)
    .join('&');
}
