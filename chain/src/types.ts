export type Hash = string;
export type Address = string;

export interface Transaction {
  sender: Address;
  recipient: Address;
  amount: number;
  timestamp: number;
}

export interface BlockFields {
  index: number;
  timestamp: number;
  transactions: Transaction[];
  previousHash: Hash;
  nonce: number;
}

export interface Block extends BlockFields {
  hash: Hash;
}

export type Chain = Block[];

export interface LedgerConfig {
  /** Leading zero hex characters a block hash needs. */
  difficulty: number;
  miningReward: number;
  maxTransactionsPerBlock: number;
  /** Ceiling for the nonce search; unbounded when absent or 0. */
  maxNonce?: number;
}

export interface TransactionReceipt {
  transaction: Transaction;
  position: number;
  blockIndex: number;
}

export interface PeerRegistration {
  url: string;
  added: boolean;
}

export interface ResolveResult {
  replaced: boolean;
  newLength: number;
  previousLength: number;
  peersChecked: number;
  peersFailed: number;
  chainsRejected: number;
}

export interface HealthReport {
  chainValid: boolean;
  chainLength: number;
  peerCount: number;
  pendingCount: number;
  lastBlockHash: Hash;
  difficulty: number;
}

export type PeerStatus = 'online' | 'offline';

export type FetchChain = (peerUrl: string) => Promise<Chain>;
