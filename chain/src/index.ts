import 'dotenv/config';
import os from 'os';
import { loadConfig, type NodeConfig } from './config.js';
import { ConsensusResolver } from './consensus.js';
import { errorMessage } from './errors.js';
import { Ledger } from './ledger.js';
import { getLocalTs } from './log.js';
import { PeerClient } from './p2p.js';
import { startRpc } from './rpc.js';

function loadConfigOrExit(): NodeConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`${getLocalTs()} ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}

(() => {
  const config = loadConfigOrExit();
  const { nodeId, rpcHost, rpcPort, ledger: ledgerConfig } = config;

  console.log(`${getLocalTs()} Ledger Node`);
  console.log(`${getLocalTs()} ✌️  version 0.1.0`);
  console.log(`${getLocalTs()} 🏷  Node id: ${nodeId}`);
  console.log(`${getLocalTs()} ⛏️  Difficulty: ${ledgerConfig.difficulty}, reward: ${ledgerConfig.miningReward}, max txs/block: ${ledgerConfig.maxTransactionsPerBlock}`);
  console.log(`${getLocalTs()} 💾 Storage: in-memory`);
  console.log(`${getLocalTs()} 💻 Operating system: ${os.type().toLowerCase()} ${os.arch()}`);

  const ledger = new Ledger(ledgerConfig);
  const peerClient = new PeerClient(config.peerTimeoutMs);
  const resolver = new ConsensusResolver(ledger, ledger.peers, peerClient.fetchChain);

  for (const peer of config.bootstrapPeers) {
    try {
      const { url } = ledger.registerPeer(peer);
      console.log(`${getLocalTs()} 🤝 Bootstrap peer ${url}`);
    } catch (err) {
      console.error(`${getLocalTs()} ⚠️  Skipping bootstrap peer ${peer}: ${errorMessage(err)}`);
    }
  }

  const server = startRpc({ ledger, resolver, peerClient, nodeId }, rpcPort, rpcHost);

  if (config.syncIntervalMs > 0) {
    console.log(`${getLocalTs()} ⏩ Syncing with peers every ${config.syncIntervalMs}ms`);
    resolver.start(config.syncIntervalMs);
  }

  const shutdown = () => {
    console.log(`\n${getLocalTs()} 👋 Ledger node shutting down...`);
    resolver.stop();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
})();
