export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EmptyPoolError extends Error {
  constructor(message = 'No transactions to mine') {
    super(message);
    this.name = 'EmptyPoolError';
  }
}

export class InvalidChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidChainError';
  }
}

export class PeerUnreachableError extends Error {
  constructor(readonly peer: string, message: string) {
    super(`${peer}: ${message}`);
    this.name = 'PeerUnreachableError';
  }
}

export class MiningAbortedError extends Error {
  constructor(message = 'Mining aborted') {
    super(message);
    this.name = 'MiningAbortedError';
  }
}

export class MiningTimeoutError extends Error {
  constructor(readonly maxNonce: number) {
    super(`No valid nonce found below ${maxNonce}`);
    this.name = 'MiningTimeoutError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
