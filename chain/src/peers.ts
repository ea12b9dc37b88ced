import { ValidationError } from './errors.js';
import type { PeerRegistration } from './types.js';

/**
 * Reduces a peer address to its origin. Bare `host:port` is read as http.
 * @throws ValidationError for empty, unparsable or non-http(s) addresses
 */
export function normalizePeerUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError('Peer URL is empty');
  }
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ValidationError(`Invalid peer URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ValidationError(`Unsupported peer protocol ${url.protocol} in ${raw}`);
  }
  if (!url.hostname) {
    throw new ValidationError(`Invalid peer URL: ${raw}`);
  }
  return url.origin;
}

export class PeerRegistry {
  private peers = new Set<string>();

  get size(): number {
    return this.peers.size;
  }

  register(raw: string): PeerRegistration {
    const url = normalizePeerUrl(raw);
    const added = !this.peers.has(url);
    this.peers.add(url);
    return { url, added };
  }

  list(): string[] {
    return [...this.peers];
  }
}
