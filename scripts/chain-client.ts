import { ethers, BigNumber } from 'ethers';

export type TransactionRequest = ethers.providers.TransactionRequest;
export type TransactionReceipt = ethers.providers.TransactionReceipt;

/**
 * Everything the swap pipeline needs from a node and a signer.
 *
 * Implementations may throw; the components that call them turn failures into
 * typed results.
 */
export interface ChainClient {
  /** Address of the signing account (token holder and swap sender). */
  readonly address: string;
  isConnected(): Promise<boolean>;
  /** Read-only eth_call; returns the raw return data. */
  call(request: { to: string; data: string }): Promise<string>;
  getGasPrice(): Promise<BigNumber>;
  getNativeBalance(address: string): Promise<BigNumber>;
  /** Next nonce for an address, including pending transactions. */
  getTransactionCount(address: string): Promise<number>;
  getChainId(): Promise<number>;
  signTransaction(request: TransactionRequest): Promise<string>;
  /** Broadcast a signed transaction; returns its hash. */
  sendRawTransaction(signedTransaction: string): Promise<string>;
  /** Resolves to null when no receipt arrives within timeoutMs. */
  waitForReceipt(transactionHash: string, timeoutMs: number): Promise<TransactionReceipt | null>;
}

/**
 * ChainClient over an ethers v5 JSON-RPC provider and wallet.
 */
export class EthersChainClient implements ChainClient {
  readonly address: string;
  private readonly provider: ethers.providers.JsonRpcProvider;
  private readonly wallet: ethers.Wallet;

  constructor(rpcUrl: string, privateKey: string, chainId?: number) {
    this.provider = new ethers.providers.JsonRpcProvider(rpcUrl, chainId);
    this.wallet = new ethers.Wallet(privateKey, this.provider);
    this.address = this.wallet.address;
  }

  async isConnected(): Promise<boolean> {
    try {
      await this.provider.getBlockNumber();
      return true;
    } catch {
      return false;
    }
  }

  call(request: { to: string; data: string }): Promise<string> {
    return this.provider.call(request);
  }

  getGasPrice(): Promise<BigNumber> {
    return this.provider.getGasPrice();
  }

  getNativeBalance(address: string): Promise<BigNumber> {
    return this.provider.getBalance(address);
  }

  getTransactionCount(address: string): Promise<number> {
    return this.provider.getTransactionCount(address, 'pending');
  }

  async getChainId(): Promise<number> {
    const network = await this.provider.getNetwork();
    return network.chainId;
  }

  signTransaction(request: TransactionRequest): Promise<string> {
    return this.wallet.signTransaction({ ...request, from: this.address });
  }

  async sendRawTransaction(signedTransaction: string): Promise<string> {
    const response = await this.provider.sendTransaction(signedTransaction);
    return response.hash;
  }

  async waitForReceipt(transactionHash: string, timeoutMs: number): Promise<TransactionReceipt | null> {
    try {
      return await this.provider.waitForTransaction(transactionHash, 1, timeoutMs);
    } catch (error) {
      if (isTimeoutError(error)) {
        return null;
      }
      throw error;
    }
  }
}

function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === ethers.errors.TIMEOUT
  );
}
