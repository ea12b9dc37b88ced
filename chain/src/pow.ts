import { meetsDifficulty, nonceHasher, sealBlock } from './block.js';
import { MiningAbortedError, MiningTimeoutError } from './errors.js';
import type { Block, BlockFields } from './types.js';

export interface ProofOfWorkOptions {
  signal?: AbortSignal;
  /** Nonces hashed between yields to the event loop. */
  batchSize?: number;
  /** Give up above this nonce; 0 or absent searches until found. */
  maxNonce?: number;
}

const yieldToEventLoop = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Searches nonces upward from 0 until the block hash has `difficulty` leading
 * zero hex digits. Hashing runs in batches so the event loop keeps serving
 * requests while a block is being mined.
 */
export async function proveWork(
  fields: Omit<BlockFields, 'nonce'>,
  difficulty: number,
  options: ProofOfWorkOptions = {}
): Promise<Block> {
  const { signal, batchSize = 2000, maxNonce = 0 } = options;
  const hashFor = nonceHasher(fields);
  let nonce = 0;

  for (;;) {
    if (signal?.aborted) throw new MiningAbortedError();

    const batchEnd = nonce + batchSize;
    for (; nonce < batchEnd; nonce++) {
      if (maxNonce > 0 && nonce > maxNonce) throw new MiningTimeoutError(maxNonce);
      const hash = hashFor(nonce);
      if (meetsDifficulty(hash, difficulty)) {
        return sealBlock({ ...fields, nonce }, hash);
      }
    }

    await yieldToEventLoop();
  }
}
