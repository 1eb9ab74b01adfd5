import { Tendermint37Client } from '@cosmjs/tendermint-rpc';
import { hexlify } from 'ethers';
import { AbciTransport, classifyTransportError } from './transport';
import { TendermintAddress, TransportError } from '../types';
import { sleep } from '../utils/helpers';
import { getLogger, Logger } from '../utils/logger';

/** The part of a CometBFT RPC client the transport uses. */
export interface CometBackend {
  abciQuery(params: {
    path: string;
    data: Uint8Array;
    height?: number;
    prove?: boolean;
  }): Promise<{
    readonly value: Uint8Array;
    readonly code?: number;
    readonly log?: string;
    readonly info?: string;
  }>;
  status(): Promise<{
    readonly syncInfo: { readonly latestBlockHeight: number; readonly catchingUp: boolean };
  }>;
  validatorsAll(height?: number): Promise<{
    readonly validators: readonly {
      readonly address: Uint8Array;
      readonly votingPower: bigint | number;
    }[];
  }>;
  disconnect(): void;
}

/** A member of the CometBFT active set at some height. */
export interface ConsensusValidator {
  address: TendermintAddress;
  votingPower: bigint;
}

export interface CometTransportOptions {
  timeoutMs: number;
  /** Extra attempts after a retryable failure. */
  retries: number;
  backoffMs: number;
}

const DEFAULT_OPTIONS: CometTransportOptions = {
  timeoutMs: 10_000,
  retries: 2,
  backoffMs: 300,
};

async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(`${label} timed out after ${ms}ms`, true)),
      ms
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** `AbciTransport` over a CometBFT RPC endpoint. */
export class CometTransport implements AbciTransport {
  private backend?: Promise<CometBackend>;
  private readonly options: CometTransportOptions;

  constructor(
    private readonly connect: () => Promise<CometBackend>,
    options: Partial<CometTransportOptions> = {},
    private readonly logger: Logger = getLogger('transport')
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  static forEndpoint(
    url: string,
    options: Partial<CometTransportOptions> = {},
    logger?: Logger
  ): CometTransport {
    return new CometTransport(() => Tendermint37Client.connect(url), options, logger);
  }

  async rawQuery(path: string, data: Uint8Array, height?: number): Promise<Uint8Array> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.queryOnce(path, data, height);
      } catch (error) {
        const failure = classifyTransportError(error);
        if (!failure.retryable || attempt >= this.options.retries) throw failure;
        const delay = this.options.backoffMs * 2 ** attempt;
        this.logger.debug(`${path} failed (${failure.message}), retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  }

  /** Latest block height; fails while the node is still syncing. */
  async latestHeight(): Promise<number> {
    const status = await this.call('status', (backend) => backend.status());
    if (status.syncInfo.catchingUp) {
      throw new TransportError('node is still catching up', true);
    }
    return status.syncInfo.latestBlockHeight;
  }

  /**
   * The active validator set at `height`, or at the latest height. Every
   * page of the set is read.
   */
  async consensusValidators(height?: number): Promise<ConsensusValidator[]> {
    const at = height ?? (await this.latestHeight());
    const response = await this.call(`validators at ${at}`, (backend) => backend.validatorsAll(at));
    return response.validators.map((validator) => ({
      address: hexlify(validator.address).slice(2).toUpperCase(),
      votingPower: BigInt(validator.votingPower),
    }));
  }

  async close(): Promise<void> {
    const backend = this.backend;
    this.backend = undefined;
    if (!backend) return;
    let client: CometBackend;
    try {
      client = await backend;
    } catch {
      return; // never connected
    }
    client.disconnect();
  }

  private async call<T>(label: string, request: (backend: CometBackend) => Promise<T>): Promise<T> {
    try {
      const backend = await this.getBackend();
      return await withTimeout(request(backend), this.options.timeoutMs, label);
    } catch (error) {
      throw classifyTransportError(error);
    }
  }

  private async queryOnce(path: string, data: Uint8Array, height?: number): Promise<Uint8Array> {
    const backend = await this.getBackend();
    const response = await withTimeout(
      backend.abciQuery({ path, data, height }),
      this.options.timeoutMs,
      path
    );
    if (response.code) {
      throw new TransportError(
        `${path} rejected by node (code ${response.code}): ${response.log || response.info || 'no details'}`,
        false,
        response.code
      );
    }
    return response.value;
  }

  private getBackend(): Promise<CometBackend> {
    if (!this.backend) {
      const pending = this.connect();
      this.backend = pending;
      // A failed connection is dropped so the next query dials again.
      void pending.catch(() => {
        if (this.backend === pending) this.backend = undefined;
      });
    }
    return this.backend;
  }
}
