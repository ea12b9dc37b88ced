import { describe, it, expect, beforeAll } from 'vitest';
import { assertTransaction, isChainValid, parseChain, validateChain } from './validation.js';
import { InvalidChainError } from './errors.js';
import { GENESIS_BLOCK } from './genesis.js';
import { hashBlock, meetsDifficulty, sealBlock } from './block.js';
import { proveWork } from './pow.js';
import { createLedger, mineBlocks } from './test-helpers.js';
import type { Block, Chain } from './types.js';

const DIFFICULTY = 2;

describe('Chain Validation', () => {
  let chain: Chain;

  beforeAll(async () => {
    const ledger = createLedger({ difficulty: DIFFICULTY });
    await mineBlocks(ledger, 3);
    chain = ledger.getChain();
  });

  const withBlock = (i: number, block: Block): Chain => chain.map((b, j) => (j === i ? block : b));

  it('should accept a mined chain', () => {
    expect(() => validateChain(chain, DIFFICULTY)).not.toThrow();
    expect(isChainValid(chain, DIFFICULTY)).toBe(true);
  });

  it('should accept the genesis-only chain', () => {
    expect(isChainValid([GENESIS_BLOCK], DIFFICULTY)).toBe(true);
  });

  it('should reject an empty chain', () => {
    expect(() => validateChain([], DIFFICULTY)).toThrow('Chain is empty');
  });

  it('should reject a foreign genesis block', () => {
    const foreign = sealBlock({ ...GENESIS_BLOCK, timestamp: GENESIS_BLOCK.timestamp + 1 });
    expect(() => validateChain([foreign], DIFFICULTY)).toThrow(/Genesis mismatch/);
  });

  it('should reject a broken previous hash link even when re-mined', async () => {
    const original = chain[2];
    const relinked = await proveWork(
      { index: 2, timestamp: original.timestamp, transactions: original.transactions, previousHash: 'f'.repeat(64) },
      DIFFICULTY
    );
    expect(() => validateChain(withBlock(2, relinked), DIFFICULTY)).toThrow(/Previous hash mismatch at block #2/);
  });

  it('should reject a stored hash that does not match the contents', () => {
    const original = chain[1];
    const tampered: Block = {
      ...original,
      transactions: original.transactions.map(tx => ({ ...tx, amount: tx.amount + 100 })),
    };
    expect(() => validateChain(withBlock(1, tampered), DIFFICULTY)).toThrow(/Hash mismatch at block #1/);
  });

  it('should reject blocks without enough proof of work', () => {
    const original = chain[3];
    let nonce = 0;
    while (meetsDifficulty(hashBlock({ ...original, nonce }), DIFFICULTY)) nonce++;
    const weak = sealBlock({ ...original, nonce });
    expect(() => validateChain(withBlock(3, weak), DIFFICULTY)).toThrow(/Insufficient proof of work at block #3/);
  });

  it('should reject out-of-order indices', () => {
    const original = chain[1];
    const renumbered = sealBlock({ ...original, index: 5 });
    expect(() => validateChain(withBlock(1, renumbered), DIFFICULTY)).toThrow(/Index mismatch at block #1/);
  });

  it('should return false for a chain with a missing block', () => {
    expect(isChainValid(chain.slice(0, 1).concat(chain.slice(2)), DIFFICULTY)).toBe(false);
  });
});

describe('parseChain', () => {
  let json: unknown;

  beforeAll(async () => {
    const ledger = createLedger({ difficulty: DIFFICULTY });
    await mineBlocks(ledger, 1);
    json = JSON.parse(JSON.stringify(ledger.getChain()));
  });

  it('should round-trip a serialized chain', () => {
    const parsed = parseChain(json);
    expect(parsed).toHaveLength(2);
    expect(isChainValid(parsed, DIFFICULTY)).toBe(true);
  });

  it('should drop unknown fields', () => {
    const [genesis] = parseChain([{ ...GENESIS_BLOCK, extra: 'x' }]);
    expect(Object.keys(genesis).sort()).toEqual(['hash', 'index', 'nonce', 'previousHash', 'timestamp', 'transactions']);
  });

  it('should reject non-arrays and empty arrays', () => {
    expect(() => parseChain({ chain: [] })).toThrow('Chain is not an array');
    expect(() => parseChain(undefined)).toThrow(InvalidChainError);
    expect(() => parseChain([])).toThrow('Chain is empty');
  });

  it('should reject blocks with missing or mistyped fields', () => {
    expect(() => parseChain([null])).toThrow('block #0: not an object');
    expect(() => parseChain([{ ...GENESIS_BLOCK, index: '0' }])).toThrow(/block #0: invalid index/);
    expect(() => parseChain([{ ...GENESIS_BLOCK, nonce: 1.5 }])).toThrow(/block #0: invalid nonce/);
    expect(() => parseChain([{ ...GENESIS_BLOCK, timestamp: 0 }])).toThrow(/block #0: invalid timestamp/);
    expect(() => parseChain([{ ...GENESIS_BLOCK, previousHash: '' }])).toThrow(/block #0: invalid previousHash/);
    expect(() => parseChain([{ ...GENESIS_BLOCK, hash: 42 }])).toThrow(/block #0: invalid hash/);
    expect(() => parseChain([{ ...GENESIS_BLOCK, transactions: null }])).toThrow(/transactions array/);
  });

  it('should reject malformed transactions', () => {
    const block = { ...GENESIS_BLOCK, transactions: [{ sender: 'a', recipient: 'b', amount: 'lots', timestamp: 1 }] };
    expect(() => parseChain([block])).toThrow('block #0 tx 0: invalid amount lots');
  });
});

describe('assertTransaction', () => {
  it('should accept a well-formed transaction', () => {
    expect(() => assertTransaction({ sender: 'a', recipient: 'b', amount: 1, timestamp: 1 }, 'tx')).not.toThrow();
  });

  it('should reject a missing recipient', () => {
    expect(() => assertTransaction({ sender: 'a', amount: 1, timestamp: 1 }, 'tx')).toThrow('tx: invalid recipient');
  });
});
