import crypto from 'crypto';
import { ConfigError } from './errors.js';
import type { LedgerConfig } from './types.js';

export interface NodeConfig {
  nodeId: string;
  rpcHost: string;
  rpcPort: number;
  ledger: LedgerConfig;
  /** 0 disables background sync sweeps. */
  syncIntervalMs: number;
  peerTimeoutMs: number;
  bootstrapPeers: string[];
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): NodeConfig {
  const difficulty = readInt(env, 'DIFFICULTY', 4, 0);
  if (difficulty > 64) {
    throw new ConfigError(`DIFFICULTY must be at most 64, got ${difficulty}`);
  }
  const rpcPort = readInt(env, 'RPC_PORT', 5000, 0);
  if (rpcPort > 65535) {
    throw new ConfigError(`RPC_PORT out of range: ${rpcPort}`);
  }

  const bootstrapPeers = (env.BOOTSTRAP_PEERS ?? '')
    .split(',')
    .map(p => p.trim())
    .filter(p => p.length > 0);

  return {
    nodeId: env.NODE_ID?.trim() || crypto.randomUUID().replace(/-/g, ''),
    rpcHost: env.RPC_HOST?.trim() || '0.0.0.0',
    rpcPort,
    ledger: {
      difficulty,
      miningReward: readNumber(env, 'MINING_REWARD', 10),
      maxTransactionsPerBlock: readInt(env, 'MAX_TXS_PER_BLOCK', 100, 1),
      maxNonce: readInt(env, 'MAX_NONCE', 0, 0),
    },
    syncIntervalMs: readInt(env, 'SYNC_INTERVAL_MS', 0, 0),
    peerTimeoutMs: readInt(env, 'PEER_TIMEOUT_MS', 5000, 1),
    bootstrapPeers,
  };
}
