/**
 * host:port parsing for TCP probes.
 */

export interface SocketAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port` (IPv6 hosts in brackets). Returns undefined for anything
 * else, including ports outside 1-65535.
 */
export function parseSocketAddress(address: string): SocketAddress | undefined {
  const match = /^(?:\[([^\]]+)\]|([^:\s[\]]+)):(\d{1,5})$/.exec(address.trim());
  if (!match) return undefined;

  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!host || port < 1 || port > 65535) return undefined;
  return { host, port };
}

/**
 * The TCP endpoint behind a ws://, wss://, http:// or https:// URL.
 * Unparseable URLs are returned unchanged so the probe reports them.
 */
export function endpointAddressOf(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  const secure = parsed.protocol === 'wss:' || parsed.protocol === 'https:';
  const port = parsed.port || (secure ? '443' : '80');
  return `${parsed.hostname}:${port}`;
}
