import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { ZERO_HASH, hashBlock, hashTx, meetsDifficulty, nonceHasher, sealBlock } from './block.js';
import type { BlockFields } from './types.js';

const sha256 = (s: string) => crypto.createHash('sha256').update(s).digest('hex');

describe('Block hashing', () => {
    const fields: BlockFields = {
        index: 1,
        timestamp: 1000,
        transactions: [{ sender: 'alice', recipient: 'bob', amount: 5, timestamp: 10 }],
        previousHash: ZERO_HASH,
        nonce: 7,
    };

    it('should hash the canonical array form', () => {
        const canonical = JSON.stringify([1, 1000, [['alice', 'bob', 5, 10]], ZERO_HASH, 7]);
        expect(hashBlock(fields)).toBe(sha256(canonical));
    });

    it('should not depend on object key order', () => {
        const reordered: BlockFields = {
            nonce: 7,
            previousHash: ZERO_HASH,
            transactions: [{ timestamp: 10, amount: 5, recipient: 'bob', sender: 'alice' }],
            timestamp: 1000,
            index: 1,
        };
        expect(hashBlock(reordered)).toBe(hashBlock(fields));
    });

    it('should change when the nonce changes', () => {
        expect(hashBlock({ ...fields, nonce: 8 })).not.toBe(hashBlock(fields));
    });

    it('should agree with the per-nonce hasher', () => {
        const hashFor = nonceHasher(fields);
        expect(hashFor(7)).toBe(hashBlock(fields));
        expect(hashFor(123456)).toBe(hashBlock({ ...fields, nonce: 123456 }));
    });

    it('should hash transactions by their fields', () => {
        const tx = fields.transactions[0];
        expect(hashTx(tx)).toBe(sha256(JSON.stringify(['alice', 'bob', 5, 10])));
        expect(hashTx({ ...tx, timestamp: 11 })).not.toBe(hashTx(tx));
    });
});

describe('meetsDifficulty', () => {
    it('should count leading zero hex characters', () => {
        expect(meetsDifficulty('00ab', 2)).toBe(true);
        expect(meetsDifficulty('0ab0', 2)).toBe(false);
        expect(meetsDifficulty('abcd', 0)).toBe(true);
    });
});

describe('sealBlock', () => {
    it('should attach the computed hash and freeze the block', () => {
        const fields: BlockFields = {
            index: 2,
            timestamp: 5,
            transactions: [{ sender: 'a', recipient: 'b', amount: 1, timestamp: 1 }],
            previousHash: 'f'.repeat(64),
            nonce: 0,
        };
        const block = sealBlock(fields);
        expect(block.hash).toBe(hashBlock(fields));
        expect(Object.isFrozen(block)).toBe(true);
        expect(Object.isFrozen(block.transactions)).toBe(true);
        expect(Object.isFrozen(block.transactions[0])).toBe(true);
        expect(Object.isFrozen(fields.transactions[0])).toBe(false);
    });
});
