import { sealBlock } from './block.js';
import { EmptyPoolError, ValidationError } from './errors.js';
import { GENESIS_BLOCK } from './genesis.js';
import { createLogger } from './log.js';
import { Mempool } from './mempool.js';
import { Mutex } from './mutex.js';
import { PeerRegistry } from './peers.js';
import { proveWork } from './pow.js';
import { REWARD_SENDER, createTransaction, isReward, rewardTransaction, roundAmount } from './transaction.js';
import { isChainValid, validateChain } from './validation.js';
import type {
  Address,
  Block,
  Chain,
  HealthReport,
  LedgerConfig,
  PeerRegistration,
  Transaction,
  TransactionReceipt,
} from './types.js';

const log = createLogger('Ledger');

export interface MineOptions {
  signal?: AbortSignal;
}

/**
 * Owns the chain, the pending pool and the peer set of one node.
 *
 * Every synchronous method runs to completion on the event loop, so submission,
 * balance queries, replacement and the append step of mining never interleave.
 * Only the nonce search is asynchronous; it re-checks the tip before appending.
 */
export class Ledger {
  private chain: Chain = [GENESIS_BLOCK];
  private mempool = new Mempool();
  private miningLock = new Mutex();

  constructor(
    readonly config: LedgerConfig,
    readonly peers: PeerRegistry = new PeerRegistry()
  ) {
    if (!Number.isInteger(config.difficulty) || config.difficulty < 0 || config.difficulty > 64) {
      throw new ValidationError(`Invalid difficulty ${config.difficulty}`);
    }
    if (!Number.isFinite(config.miningReward) || config.miningReward <= 0) {
      throw new ValidationError(`Invalid mining reward ${config.miningReward}`);
    }
    if (!Number.isInteger(config.maxTransactionsPerBlock) || config.maxTransactionsPerBlock < 1) {
      throw new ValidationError(`Invalid max transactions per block ${config.maxTransactionsPerBlock}`);
    }
  }

  get length(): number {
    return this.chain.length;
  }

  get isMining(): boolean {
    return this.miningLock.locked;
  }

  getChain(): Chain {
    return this.chain.slice();
  }

  getLatestBlock(): Block {
    return this.chain[this.chain.length - 1];
  }

  getPending(): Transaction[] {
    return this.mempool.list();
  }

  createTransaction(sender: unknown, recipient: unknown, amount: unknown): TransactionReceipt {
    const transaction = createTransaction({ sender, recipient, amount });

    if (!isReward(transaction)) {
      const available = this.availableBalance(transaction.sender);
      if (available < transaction.amount) {
        throw new ValidationError(`Insufficient balance. Available: ${available}`);
      }
    }

    const position = this.mempool.add(transaction);
    const blockIndex = this.chain.length + Math.floor(position / this.config.maxTransactionsPerBlock);
    return { transaction, position, blockIndex };
  }

  balanceOf(address: Address): number {
    let balance = 0;
    for (const block of this.chain) {
      for (const tx of block.transactions) {
        if (tx.recipient === address) balance += tx.amount;
        if (tx.sender === address && !isReward(tx)) balance -= tx.amount;
      }
    }
    return roundAmount(balance);
  }

  /** Confirmed balance less what the address already spends in the pool. */
  availableBalance(address: Address): number {
    return roundAmount(this.balanceOf(address) - this.mempool.pendingDebits(address));
  }

  async minePendingBlock(minerAddress: Address, options: MineOptions = {}): Promise<Block> {
    if (typeof minerAddress !== 'string' || minerAddress.trim() === '') {
      throw new ValidationError('Invalid miner address: expected non-empty string');
    }
    if (minerAddress === REWARD_SENDER) {
      throw new ValidationError(`Miner address cannot be the reward sender ${REWARD_SENDER}`);
    }
    const { difficulty, miningReward, maxTransactionsPerBlock, maxNonce } = this.config;

    return this.miningLock.runExclusive(async () => {
      for (;;) {
        if (this.mempool.size === 0) throw new EmptyPoolError();

        const selected = this.mempool.peek(maxTransactionsPerBlock);
        const tip = this.getLatestBlock();
        const index = this.chain.length;
        const started = Date.now();
        log.info(`⛏️  Mining block #${index} with ${selected.length} transaction(s)...`);

        const block = await proveWork(
          {
            index,
            timestamp: Date.now(),
            transactions: [...selected, rewardTransaction(minerAddress, miningReward)],
            previousHash: tip.hash,
          },
          difficulty,
          { signal: options.signal, maxNonce }
        );

        if (this.getLatestBlock() !== tip) {
          log.warn(`Tip moved while mining #${block.index}, discarding stale block and retrying`);
          continue;
        }

        this.chain = [...this.chain, block];
        this.mempool.remove(selected);
        log.info(
          `🔨 Mined #${block.index} in ${((Date.now() - started) / 1000).toFixed(2)}s with nonce ${block.nonce} (${block.hash.slice(0, 10)}…)`
        );
        return block;
      }
    });
  }

  isChainValid(candidate: Chain = this.chain): boolean {
    return isChainValid(candidate, this.config.difficulty);
  }

  /**
   * Adopts `candidate` if it is valid and strictly longer than the local chain,
   * then drops pending transactions it already confirms.
   * @throws InvalidChainError if the candidate fails validation
   */
  replaceChain(candidate: Chain): boolean {
    if (candidate.length <= this.chain.length) return false;
    validateChain(candidate, this.config.difficulty);

    const previousLength = this.chain.length;
    this.chain = candidate.map(block => sealBlock(block, block.hash));
    const dropped = this.mempool.removeConfirmed(this.chain);
    log.info(
      `🔄 Chain replaced: #${previousLength - 1} → #${this.chain.length - 1}, ${dropped} pending transaction(s) already confirmed`
    );
    return true;
  }

  registerPeer(url: string): PeerRegistration {
    return this.peers.register(url);
  }

  health(): HealthReport {
    return {
      chainValid: this.isChainValid(),
      chainLength: this.chain.length,
      peerCount: this.peers.size,
      pendingCount: this.mempool.size,
      lastBlockHash: this.getLatestBlock().hash,
      difficulty: this.config.difficulty,
    };
  }
}
