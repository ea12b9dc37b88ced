import { InvalidChainError, errorMessage } from './errors.js';
import { Ledger } from './ledger.js';
import { createLogger } from './log.js';
import { Mutex } from './mutex.js';
import { PeerRegistry } from './peers.js';
import type { Chain, FetchChain, ResolveResult } from './types.js';

const log = createLogger('Consensus');

/** Longest-valid-chain conflict resolution against the registered peers. */
export class ConsensusResolver {
  private syncLock = new Mutex();
  private timer?: NodeJS.Timeout;

  constructor(
    private ledger: Ledger,
    private peers: PeerRegistry,
    private fetchChain: FetchChain
  ) {}

  get isSyncing(): boolean {
    return this.syncLock.locked;
  }

  resolve(): Promise<ResolveResult> {
    return this.syncLock.runExclusive(() => this.resolveOnce());
  }

  private async resolveOnce(): Promise<ResolveResult> {
    const previousLength = this.ledger.length;
    const peers = this.peers.list();
    log.info(`⏩ Checking ${peers.length} peer(s) against local chain #${previousLength - 1}`);

    const results = await Promise.allSettled(peers.map(url => this.fetchChain(url)));

    let best: { url: string; chain: Chain } | undefined;
    let bestLength = this.ledger.length;
    let peersFailed = 0;
    let chainsRejected = 0;

    for (const [i, result] of results.entries()) {
      const url = peers[i];
      if (result.status === 'rejected') {
        if (result.reason instanceof InvalidChainError) {
          chainsRejected++;
          log.warn(`Malformed chain from ${url}: ${result.reason.message}`);
        } else {
          peersFailed++;
          log.warn(`Peer ${url} unreachable: ${errorMessage(result.reason)}`);
        }
        continue;
      }

      const chain = result.value;
      // Ties keep the local chain.
      if (chain.length <= bestLength) continue;
      if (!this.ledger.isChainValid(chain)) {
        chainsRejected++;
        log.warn(`Rejected invalid chain of length ${chain.length} from ${url}`);
        continue;
      }
      best = { url, chain };
      bestLength = chain.length;
    }

    let replaced = false;
    if (best) {
      try {
        replaced = this.ledger.replaceChain(best.chain);
      } catch (err) {
        if (!(err instanceof InvalidChainError)) throw err;
        chainsRejected++;
        log.warn(`Chain from ${best.url} failed validation at swap: ${err.message}`);
      }
      if (replaced) log.info(`✅ Adopted chain from ${best.url}, now at #${this.ledger.length - 1}`);
    }

    if (peers.length > 0 && peersFailed === peers.length) {
      log.warn(`All ${peers.length} peer(s) unreachable`);
    }

    return {
      replaced,
      newLength: this.ledger.length,
      previousLength,
      peersChecked: peers.length,
      peersFailed,
      chainsRejected,
    };
  }

  /** Starts periodic sync sweeps; a tick is skipped while a pass is running. */
  start(intervalMs: number) {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.isSyncing) return;
      this.resolve().catch(err => log.error('Sync sweep failed', err));
    }, intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
