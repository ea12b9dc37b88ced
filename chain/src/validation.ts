import { hashBlock, meetsDifficulty } from './block.js';
import { InvalidChainError } from './errors.js';
import { GENESIS_BLOCK } from './genesis.js';
import type { Block, Chain, Transaction } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks the shape of a transaction received from a peer.
 * @throws InvalidChainError if a field is missing or has the wrong type
 */
export function assertTransaction(tx: unknown, where: string): asserts tx is Transaction {
  if (!isRecord(tx)) {
    throw new InvalidChainError(`${where}: transaction is not an object`);
  }
  if (typeof tx.sender !== 'string' || !tx.sender) {
    throw new InvalidChainError(`${where}: invalid sender`);
  }
  if (typeof tx.recipient !== 'string' || !tx.recipient) {
    throw new InvalidChainError(`${where}: invalid recipient`);
  }
  if (typeof tx.amount !== 'number' || !Number.isFinite(tx.amount)) {
    throw new InvalidChainError(`${where}: invalid amount ${String(tx.amount)}`);
  }
  if (typeof tx.timestamp !== 'number' || !Number.isFinite(tx.timestamp)) {
    throw new InvalidChainError(`${where}: invalid timestamp`);
  }
}

/**
 * Checks the shape of a block received from a peer. Hash linkage and proof of
 * work are checked separately by {@link validateChain}.
 */
export function assertBlock(block: unknown, position: number): asserts block is Block {
  const where = `block #${position}`;
  if (!isRecord(block)) {
    throw new InvalidChainError(`${where}: not an object`);
  }

  if (typeof block.index !== 'number' || block.index < 0 || !Number.isInteger(block.index)) {
    throw new InvalidChainError(`${where}: invalid index, expected non-negative integer, got ${String(block.index)}`);
  }

  if (typeof block.timestamp !== 'number' || block.timestamp <= 0) {
    throw new InvalidChainError(`${where}: invalid timestamp, expected positive number, got ${String(block.timestamp)}`);
  }

  if (typeof block.previousHash !== 'string' || !block.previousHash) {
    throw new InvalidChainError(`${where}: invalid previousHash, expected non-empty string`);
  }

  if (typeof block.nonce !== 'number' || block.nonce < 0 || !Number.isInteger(block.nonce)) {
    throw new InvalidChainError(`${where}: invalid nonce, expected non-negative integer, got ${String(block.nonce)}`);
  }

  if (typeof block.hash !== 'string' || !block.hash) {
    throw new InvalidChainError(`${where}: invalid hash, expected non-empty string`);
  }

  if (!Array.isArray(block.transactions)) {
    throw new InvalidChainError(`${where}: missing or invalid transactions array`);
  }
  block.transactions.forEach((tx, i) => assertTransaction(tx, `${where} tx ${i}`));
}

/** Narrows untrusted JSON to a chain, copying only the known fields. */
export function parseChain(data: unknown): Chain {
  if (!Array.isArray(data)) {
    throw new InvalidChainError('Chain is not an array');
  }
  if (data.length === 0) {
    throw new InvalidChainError('Chain is empty');
  }
  return data.map((block: unknown, i): Block => {
    assertBlock(block, i);
    return {
      index: block.index,
      timestamp: block.timestamp,
      transactions: block.transactions.map(({ sender, recipient, amount, timestamp }) => ({
        sender,
        recipient,
        amount,
        timestamp,
      })),
      previousHash: block.previousHash,
      nonce: block.nonce,
      hash: block.hash,
    };
  });
}

/**
 * Verifies genesis, indices, hash links, stored hashes and proof of work.
 * @throws InvalidChainError naming the first block that fails
 */
export function validateChain(chain: Chain, difficulty: number) {
  const [genesis] = chain;
  if (!genesis) {
    throw new InvalidChainError('Chain is empty');
  }
  if (genesis.hash !== GENESIS_BLOCK.hash || hashBlock(genesis) !== genesis.hash) {
    throw new InvalidChainError(`Genesis mismatch: expected ${GENESIS_BLOCK.hash}, got ${genesis.hash}`);
  }

  for (let i = 1; i < chain.length; i++) {
    const block = chain[i];
    const prev = chain[i - 1];

    if (block.index !== i) {
      throw new InvalidChainError(`Index mismatch at block #${i}: got ${block.index}`);
    }

    if (block.previousHash !== prev.hash) {
      throw new InvalidChainError(
        `Previous hash mismatch at block #${i}: expected ${prev.hash}, got ${block.previousHash}`
      );
    }

    const computed = hashBlock(block);
    if (block.hash !== computed) {
      throw new InvalidChainError(`Hash mismatch at block #${i}: expected ${computed}, got ${block.hash}`);
    }

    if (!meetsDifficulty(block.hash, difficulty)) {
      throw new InvalidChainError(`Insufficient proof of work at block #${i}: ${block.hash}`);
    }
  }
}

export function isChainValid(chain: Chain, difficulty: number): boolean {
  try {
    validateChain(chain, difficulty);
    return true;
  } catch (err) {
    if (err instanceof InvalidChainError) return false;
    throw err;
  }
}
