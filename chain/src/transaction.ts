import { ValidationError } from './errors.js';
import type { Address, Transaction } from './types.js';

/** Sender of reward transactions; never debited. */
export const REWARD_SENDER: Address = 'SYSTEM';

/** Balances are kept to 8 decimal places. */
const AMOUNT_SCALE = 1e8;

/** Rounds float noise out of a summed balance; `+ 0` turns -0 into 0. */
export function roundAmount(value: number): number {
  return Math.round(value * AMOUNT_SCALE) / AMOUNT_SCALE + 0;
}

export interface TransactionInput {
  sender: unknown;
  recipient: unknown;
  amount: unknown;
  timestamp?: number;
}

function requireAddress(value: unknown, field: string): Address {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Invalid ${field}: expected non-empty string`);
  }
  return value;
}

export function isReward(tx: Transaction): boolean {
  return tx.sender === REWARD_SENDER;
}

export function createTransaction(input: TransactionInput): Transaction {
  const sender = requireAddress(input.sender, 'sender');
  const recipient = requireAddress(input.recipient, 'recipient');
  const { amount } = input;

  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    throw new ValidationError(`Invalid amount: expected finite number, got ${String(amount)}`);
  }
  if (amount <= 0) {
    throw new ValidationError('Amount must be positive');
  }
  if (sender === recipient) {
    throw new ValidationError('Sender and recipient cannot be the same');
  }

  return Object.freeze({ sender, recipient, amount, timestamp: input.timestamp ?? Date.now() });
}

export function rewardTransaction(miner: Address, amount: number): Transaction {
  return createTransaction({ sender: REWARD_SENDER, recipient: miner, amount });
}
