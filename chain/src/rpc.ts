import http from "http";
import express, { type NextFunction, type Request, type Response } from "express";
import bodyParser from "body-parser";
import type { ConsensusResolver } from "./consensus.js";
import { EmptyPoolError, InvalidChainError, ValidationError, errorMessage } from "./errors.js";
import type { Ledger } from "./ledger.js";
import { createLogger } from "./log.js";
import type { PeerClient } from "./p2p.js";
import { normalizePeerUrl } from "./peers.js";
import type { PeerStatus } from "./types.js";

const log = createLogger("RPC");

export interface RpcContext {
  ledger: Ledger;
  resolver: ConsensusResolver;
  peerClient: PeerClient;
  /** Default reward address for `ledger_mine`. */
  nodeId: string;
}

type Params = Record<string, unknown>;

class MethodNotFoundError extends Error {
  constructor() {
    super("method not found");
    this.name = "MethodNotFoundError";
  }
}

function isParams(value: unknown): value is Params {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(params: Params, key: string): string {
  const value = params[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing required field: ${key}`);
  }
  return value;
}

function statusFor(err: unknown): number {
  if (
    err instanceof ValidationError ||
    err instanceof EmptyPoolError ||
    err instanceof InvalidChainError ||
    err instanceof MethodNotFoundError
  ) {
    return 400;
  }
  return 500;
}

async function dispatch(ctx: RpcContext, method: string, params: Params): Promise<unknown> {
  const { ledger, resolver, peerClient, nodeId } = ctx;

  switch (method) {
    case "ledger_submitTx": {
      for (const key of ["sender", "recipient", "amount"]) {
        if (params[key] === undefined) throw new ValidationError("Missing required fields");
      }
      // Form posts send the amount as text.
      const amount = typeof params.amount === "string" ? Number(params.amount) : params.amount;
      const receipt = ledger.createTransaction(params.sender, params.recipient, amount);
      return { message: `Transaction will be added to Block ${receipt.blockIndex}`, ...receipt };
    }
    case "ledger_getPending": {
      const transactions = ledger.getPending();
      return { transactions, count: transactions.length };
    }
    case "ledger_mine": {
      const minerAddress = params.minerAddress === undefined ? nodeId : requireString(params, "minerAddress");
      const started = Date.now();
      const block = await ledger.minePendingBlock(minerAddress);
      return { message: "New Block Forged", block, miningTimeMs: Date.now() - started };
    }
    case "ledger_getChain": {
      const chain = ledger.getChain();
      return { chain, length: chain.length };
    }
    case "ledger_getBalance": {
      const address = requireString(params, "address");
      return { address, balance: ledger.balanceOf(address) };
    }
    case "ledger_registerPeers": {
      const { peers } = params;
      if (!Array.isArray(peers) || !peers.every((p): p is string => typeof p === "string")) {
        throw new ValidationError("Please supply a valid list of nodes");
      }
      const verify = params.verify !== false;
      const registered: string[] = [];
      const failed: string[] = [];
      for (const peer of peers) {
        let url: string;
        try {
          url = normalizePeerUrl(peer);
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          failed.push(peer);
          continue;
        }
        if (verify && !(await peerClient.probe(url))) {
          failed.push(peer);
          continue;
        }
        registered.push(ledger.registerPeer(url).url);
      }
      return { registered, failed, peers: ledger.peers.list() };
    }
    case "ledger_getPeers": {
      const peers = ledger.peers.list();
      return { peers, count: peers.length };
    }
    case "ledger_sync": {
      const result = await resolver.resolve();
      const message = result.replaced
        ? `Chain was replaced! Length changed from ${result.previousLength} to ${result.newLength}`
        : "Our chain is authoritative";
      return { message, ...result };
    }
    case "ledger_health": {
      const peers = ledger.peers.list();
      const reachable = await Promise.all(peers.map(peer => peerClient.probe(peer)));
      const peerStatus: Record<string, PeerStatus> = {};
      peers.forEach((peer, i) => {
        peerStatus[peer] = reachable[i] ? "online" : "offline";
      });
      return { nodeId, status: "online", mining: ledger.isMining, ...ledger.health(), peerStatus };
    }
    case "ledger_stats": {
      const health = ledger.health();
      return {
        nodeId,
        chainLength: health.chainLength,
        pendingCount: health.pendingCount,
        peerCount: health.peerCount,
        balance: ledger.balanceOf(nodeId),
        difficulty: health.difficulty,
        miningReward: ledger.config.miningReward,
        chainValid: health.chainValid,
      };
    }
    default:
      throw new MethodNotFoundError();
  }
}

export function createRpcApp(ctx: RpcContext): express.Express {
  const app = express();
  app.use(bodyParser.json({ limit: "10mb" }));

  app.post("/", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isParams(body)) {
      res.status(400).json({ jsonrpc: "2.0", id: null, error: "invalid request" });
      return;
    }
    const { method, params } = body;
    const id = body.id ?? null;
    if (typeof method !== "string") {
      res.status(400).json({ jsonrpc: "2.0", id, error: "method not found" });
      return;
    }

    try {
      const result = await dispatch(ctx, method, isParams(params) ? params : {});
      res.json({ jsonrpc: "2.0", id, result });
    } catch (e: unknown) {
      const status = statusFor(e);
      if (status === 500) log.error(`${method} failed`, e);
      res.status(status).json({ jsonrpc: "2.0", id, error: errorMessage(e) });
    }
  });

  // Only body-parser failures reach here; the handler above answers everything else.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    res.status(400).json({ jsonrpc: "2.0", id: null, error: `parse error: ${errorMessage(err)}` });
  });

  return app;
}

export function startRpc(ctx: RpcContext, port = 5000, host = "0.0.0.0"): http.Server {
  const server = createRpcApp(ctx).listen(port, host, () => log.info(`📡 JSON-RPC listening on ${host}:${port}`));
  return server;
}
