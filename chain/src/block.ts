import crypto from 'crypto';
import type { Block, BlockFields, Hash, Transaction } from './types.js';

export const ZERO_HASH: Hash = '0'.repeat(64);

// Arrays, not objects: field order is part of the hash.
function txArray(tx: Transaction): [string, string, number, number] {
  return [tx.sender, tx.recipient, tx.amount, tx.timestamp];
}

function sha256(data: string): Hash {
  return crypto.createHash('sha256').update(data).digest('hex');
}

export function hashTx(tx: Transaction): Hash {
  return sha256(JSON.stringify(txArray(tx)));
}

/**
 * Returns a function hashing the block for a given nonce. The canonical form is
 * `[index, timestamp, txs, previousHash, nonce]`; everything up to the nonce is
 * serialized once so the proof-of-work loop only appends the number.
 */
export function nonceHasher(fields: Omit<BlockFields, 'nonce'>): (nonce: number) => Hash {
  const head = JSON.stringify([
    fields.index,
    fields.timestamp,
    fields.transactions.map(txArray),
    fields.previousHash,
  ]).slice(0, -1);
  return (nonce) => sha256(`${head},${JSON.stringify(nonce)}]`);
}

export function hashBlock(b: BlockFields): Hash {
  return nonceHasher(b)(b.nonce);
}

export function meetsDifficulty(hash: Hash, difficulty: number): boolean {
  return hash.startsWith('0'.repeat(difficulty));
}

/** Freezes the block and its transaction list with the hash computed over `fields`. */
export function sealBlock(fields: BlockFields, hash: Hash = hashBlock(fields)): Block {
  const transactions = fields.transactions.map(tx => (Object.isFrozen(tx) ? tx : Object.freeze({ ...tx })));
  Object.freeze(transactions);
  return Object.freeze({
    index: fields.index,
    timestamp: fields.timestamp,
    transactions,
    previousHash: fields.previousHash,
    nonce: fields.nonce,
    hash,
  });
}
