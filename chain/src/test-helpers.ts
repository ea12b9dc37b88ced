import http from 'http';
import express from 'express';
import { ConsensusResolver } from './consensus.js';
import { Ledger } from './ledger.js';
import { PeerClient } from './p2p.js';
import { createRpcApp } from './rpc.js';
import type { LedgerConfig } from './types.js';

export const TEST_CONFIG: LedgerConfig = {
    difficulty: 2,
    miningReward: 10,
    maxTransactionsPerBlock: 5,
};

export function createLedger(overrides: Partial<LedgerConfig> = {}): Ledger {
    return new Ledger({ ...TEST_CONFIG, ...overrides });
}

/** Mines `count` blocks, each holding one reward-funded transfer to `recipient`. */
export async function mineBlocks(ledger: Ledger, count: number, miner = 'miner', recipient = 'faucet') {
    for (let i = 0; i < count; i++) {
        ledger.createTransaction('SYSTEM', recipient, 1);
        await ledger.minePendingBlock(miner);
    }
}

export interface Served {
    server: http.Server;
    url: string;
    close(): Promise<void>;
}

/** Listens on an ephemeral localhost port. */
export function serve(app: express.Express): Promise<Served> {
    return new Promise((resolve, reject) => {
        const server = app.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('server has no TCP address'));
                return;
            }
            resolve({
                server,
                url: `http://127.0.0.1:${address.port}`,
                close: () => new Promise<void>((done, fail) => {
                    server.closeAllConnections();
                    server.close(err => (err ? fail(err) : done()));
                }),
            });
        });
        server.on('error', reject);
    });
}

export interface TestNode extends Served {
    ledger: Ledger;
}

/** Serves `ledger` over JSON-RPC the way the node entrypoint does. */
export async function startNode(ledger: Ledger, nodeId = 'test-node', peerTimeoutMs = 2000): Promise<TestNode> {
    const peerClient = new PeerClient(peerTimeoutMs);
    const resolver = new ConsensusResolver(ledger, ledger.peers, peerClient.fetchChain);
    const served = await serve(createRpcApp({ ledger, resolver, peerClient, nodeId }));
    return { ...served, ledger };
}

export interface RpcReply<R> {
    status: number;
    body: { jsonrpc: string; id: unknown; result?: R; error?: string };
}

export async function callRpc<R = Record<string, unknown>>(
    url: string,
    method: string,
    params: Record<string, unknown> = {}
): Promise<RpcReply<R>> {
    const res = await fetch(`${url}/`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ jsonrpc: '2.0', id: 1, method, params }),
    });
    return { status: res.status, body: JSON.parse(await res.text()) };
}
