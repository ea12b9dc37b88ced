import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
    it('should fall back to defaults', () => {
        const config = loadConfig({});
        expect(config).toMatchObject({
            rpcHost: '0.0.0.0',
            rpcPort: 5000,
            ledger: { difficulty: 4, miningReward: 10, maxTransactionsPerBlock: 100, maxNonce: 0 },
            syncIntervalMs: 0,
            peerTimeoutMs: 5000,
            bootstrapPeers: [],
        });
        expect(config.nodeId).toMatch(/^[0-9a-f]{32}$/);
    });

    it('should read every setting from the environment', () => {
        const config = loadConfig({
            NODE_ID: 'node7',
            RPC_HOST: '127.0.0.1',
            RPC_PORT: '5007',
            DIFFICULTY: '3',
            MINING_REWARD: '2.5',
            MAX_TXS_PER_BLOCK: '20',
            MAX_NONCE: '1000000',
            SYNC_INTERVAL_MS: '15000',
            PEER_TIMEOUT_MS: '800',
            BOOTSTRAP_PEERS: 'http://127.0.0.1:5001, localhost:5002,,',
        });
        expect(config).toEqual({
            nodeId: 'node7',
            rpcHost: '127.0.0.1',
            rpcPort: 5007,
            ledger: { difficulty: 3, miningReward: 2.5, maxTransactionsPerBlock: 20, maxNonce: 1000000 },
            syncIntervalMs: 15000,
            peerTimeoutMs: 800,
            bootstrapPeers: ['http://127.0.0.1:5001', 'localhost:5002'],
        });
    });

    it('should reject malformed numbers', () => {
        expect(() => loadConfig({ DIFFICULTY: 'four' })).toThrow(ConfigError);
        expect(() => loadConfig({ DIFFICULTY: '65' })).toThrow('DIFFICULTY must be at most 64, got 65');
        expect(() => loadConfig({ RPC_PORT: '70000' })).toThrow(ConfigError);
        expect(() => loadConfig({ MINING_REWARD: '-1' })).toThrow('MINING_REWARD must be a positive number, got "-1"');
        expect(() => loadConfig({ MAX_TXS_PER_BLOCK: '0' })).toThrow('MAX_TXS_PER_BLOCK must be an integer >= 1, got "0"');
    });
});
