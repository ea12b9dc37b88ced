import { PeerUnreachableError, errorMessage } from './errors.js';
import { parseChain } from './validation.js';
import type { Chain } from './types.js';

let requestId = 0;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** JSON-RPC client for other nodes. Chain fetching is what consensus consumes. */
export class PeerClient {
  constructor(private timeoutMs = 5000) {}

  async rpc(peerUrl: string, method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${peerUrl}/`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ jsonrpc: '2.0', id: ++requestId, method, params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new PeerUnreachableError(peerUrl, errorMessage(err));
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new PeerUnreachableError(peerUrl, `invalid JSON response (HTTP ${res.status}): ${errorMessage(err)}`);
    }

    if (!isRecord(body)) {
      throw new PeerUnreachableError(peerUrl, `unexpected response (HTTP ${res.status})`);
    }
    if (body.error !== undefined) {
      throw new PeerUnreachableError(peerUrl, `${method} failed: ${String(body.error)}`);
    }
    if (!res.ok) {
      throw new PeerUnreachableError(peerUrl, `HTTP ${res.status}`);
    }
    return body.result;
  }

  /**
   * @throws PeerUnreachableError if the peer cannot be reached
   * @throws InvalidChainError if the peer's chain is malformed
   */
  fetchChain = async (peerUrl: string): Promise<Chain> => {
    const result = await this.rpc(peerUrl, 'ledger_getChain');
    return parseChain(isRecord(result) ? result.chain : undefined);
  };

  async probe(peerUrl: string): Promise<boolean> {
    try {
      await this.rpc(peerUrl, 'ledger_getChain');
      return true;
    } catch (err) {
      if (err instanceof PeerUnreachableError) return false;
      throw err;
    }
  }
}
