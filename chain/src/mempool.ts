import { hashTx } from './block.js';
import type { Address, Chain, Transaction } from './types.js';

export class Mempool {
  private buf: Transaction[] = [];

  get size(): number {
    return this.buf.length;
  }

  /** Queues the transaction and returns its 0-based position. */
  add(tx: Transaction): number {
    this.buf.push(tx);
    return this.buf.length - 1;
  }

  peek(n: number): Transaction[] {
    return this.buf.slice(0, n);
  }

  list(): Transaction[] {
    return this.buf.slice();
  }

  /** Removes exactly these transaction instances, wherever they sit in the queue. */
  remove(txs: Transaction[]) {
    const selected = new Set(txs);
    this.buf = this.buf.filter(tx => !selected.has(tx));
  }

  /**
   * Drops pending transactions already confirmed in `chain`. Each confirmed
   * occurrence removes at most one pending copy.
   */
  removeConfirmed(chain: Chain): number {
    const confirmed = new Map<string, number>();
    for (const block of chain) {
      for (const tx of block.transactions) {
        const id = hashTx(tx);
        confirmed.set(id, (confirmed.get(id) ?? 0) + 1);
      }
    }
    const before = this.buf.length;
    this.buf = this.buf.filter(tx => {
      const id = hashTx(tx);
      const count = confirmed.get(id) ?? 0;
      if (count === 0) return true;
      confirmed.set(id, count - 1);
      return false;
    });
    return before - this.buf.length;
  }

  pendingDebits(address: Address): number {
    let total = 0;
    for (const tx of this.buf) {
      if (tx.sender === address) total += tx.amount;
    }
    return total;
  }
}
