import { ZERO_HASH, sealBlock } from './block.js';
import type { Block } from './types.js';

export const GENESIS_BLOCK: Block = sealBlock({
  index: 0,
  timestamp: 1735689600000, // 2025-01-01 00:00:00 UTC
  transactions: [],
  previousHash: ZERO_HASH,
  nonce: 0,
});
