import { ethers, BigNumber } from 'ethers';
import { erc20Interface, quoterInterface, universalRouterInterface } from '../abis';
import { ChainClient, TransactionReceipt, TransactionRequest } from '../chain-client';
import { NetworkContracts } from '../config';
import { decodePath } from '../path-encoder';

export const HOLDER = '0x9000000000000000000000000000000000000009';

export const TEST_NETWORK: NetworkContracts = {
  chainId: 31337,
  name: 'Testnet',
  universalRouter: '0x7000000000000000000000000000000000000007',
  permit2: '0x5000000000000000000000000000000000000005',
  quoter: '0x6000000000000000000000000000000000000006',
  weth: '0x4000000000000000000000000000000000000004',
};

export interface FakeToken {
  symbol: string;
  decimals: number;
  balance: BigNumber;
  allowances?: Record<string, BigNumber>;
}

export type ReceiptMode = 'success' | 'revert' | 'timeout';

export interface SentTransaction {
  method: string;
  request: TransactionRequest;
  hash: string;
}

interface TokenState {
  symbol: string;
  decimals: number;
  balance: BigNumber;
  allowances: Map<string, BigNumber>;
}

/**
 * In-memory node for tests. Decodes calldata with the same ABIs the code
 * uses, answers ERC20 and QuoterV2 reads, applies approvals and swaps on
 * confirmation, and logs every interaction in order.
 */
export class FakeChainClient implements ChainClient {
  readonly address = HOLDER;
  readonly log: string[] = [];
  readonly sent: SentTransaction[] = [];

  connected = true;
  gasPrice = ethers.utils.parseUnits('20', 'gwei');
  chainId = TEST_NETWORK.chainId;
  quotes = new Map<number, BigNumber>();
  receiptModes: Record<string, ReceiptMode> = {};
  gasUsed = BigNumber.from(150000);
  // log entries ('call:allowance') or their prefix ('call', 'send') that throw
  failures = new Set<string>();
  // failure for balanceOf reads only after a swap has been confirmed
  failBalanceReadsAfterSwap = false;

  private readonly tokens = new Map<string, TokenState>();
  private readonly signed = new Map<string, TransactionRequest>();
  private readonly pending = new Map<string, SentTransaction>();
  private nonce = 0;
  private swapConfirmed = false;

  constructor(private readonly network: NetworkContracts = TEST_NETWORK) {}

  addToken(address: string, token: FakeToken): void {
    const allowances = new Map<string, BigNumber>();
    for (const [spender, amount] of Object.entries(token.allowances ?? {})) {
      allowances.set(spender.toLowerCase(), amount);
    }
    this.tokens.set(address.toLowerCase(), {
      symbol: token.symbol,
      decimals: token.decimals,
      balance: token.balance,
      allowances,
    });
  }

  balanceOf(token: string): BigNumber {
    return this.requireToken(token).balance;
  }

  allowanceOf(token: string, spender: string): BigNumber {
    return this.requireToken(token).allowances.get(spender.toLowerCase()) ?? BigNumber.from(0);
  }

  async isConnected(): Promise<boolean> {
    this.record('isConnected');
    return this.connected;
  }

  async call(request: { to: string; data: string }): Promise<string> {
    const to = request.to.toLowerCase();

    if (to === this.network.quoter.toLowerCase()) {
      const { name, args } = quoterInterface.parseTransaction({ data: request.data });
      this.record(`call:${name}`);
      const amountOut = this.quotes.get(Number(args.params.fee));
      if (!amountOut) {
        throw new Error('execution reverted');
      }
      return quoterInterface.encodeFunctionResult(name, [amountOut, 0, 0, 0]);
    }

    const { name, args } = erc20Interface.parseTransaction({ data: request.data });
    this.record(`call:${name}`);
    if (name === 'balanceOf' && this.swapConfirmed && this.failBalanceReadsAfterSwap) {
      throw new Error('header not found');
    }

    const token = this.tokens.get(to);
    if (!token) {
      throw new Error('execution reverted');
    }

    switch (name) {
      case 'symbol':
        return erc20Interface.encodeFunctionResult(name, [token.symbol]);
      case 'decimals':
        return erc20Interface.encodeFunctionResult(name, [token.decimals]);
      case 'balanceOf':
        return erc20Interface.encodeFunctionResult(name, [token.balance]);
      case 'allowance':
        return erc20Interface.encodeFunctionResult(name, [
          token.allowances.get(String(args.spender).toLowerCase()) ?? 0,
        ]);
      default:
        throw new Error(`unexpected read ${name}`);
    }
  }

  async getGasPrice(): Promise<BigNumber> {
    this.record('getGasPrice');
    return this.gasPrice;
  }

  async getNativeBalance(): Promise<BigNumber> {
    this.record('getNativeBalance');
    return ethers.utils.parseEther('1');
  }

  async getTransactionCount(): Promise<number> {
    this.record('getTransactionCount');
    return this.nonce;
  }

  async getChainId(): Promise<number> {
    this.record('getChainId');
    return this.chainId;
  }

  async signTransaction(request: TransactionRequest): Promise<string> {
    this.record('signTransaction');
    const key = `signed-${this.signed.size}`;
    this.signed.set(key, request);
    return key;
  }

  async sendRawTransaction(signedTransaction: string): Promise<string> {
    const request = this.signed.get(signedTransaction);
    if (!request) {
      throw new Error('unknown signed transaction');
    }

    const method = this.methodOf(request);
    this.record(`send:${method}`);

    const hash = ethers.utils.hexZeroPad(ethers.utils.hexlify(this.sent.length + 1), 32);
    const sent = { method, request, hash };
    this.sent.push(sent);
    this.pending.set(hash, sent);
    this.nonce += 1;
    return hash;
  }

  async waitForReceipt(transactionHash: string): Promise<TransactionReceipt | null> {
    const sent = this.pending.get(transactionHash);
    if (!sent) {
      throw new Error('unknown transaction');
    }
    this.record(`wait:${sent.method}`);

    const mode = this.receiptModes[sent.method] ?? 'success';
    if (mode === 'timeout') {
      return null;
    }
    if (mode === 'success') {
      this.apply(sent);
    }
    return this.receipt(sent, mode === 'success' ? 1 : 0);
  }

  private record(entry: string): void {
    if (this.failures.has(entry) || this.failures.has(entry.split(':')[0])) {
      this.log.push(`${entry}!`);
      throw new Error(`${entry} failed`);
    }
    this.log.push(entry);
  }

  private requireToken(address: string): TokenState {
    const token = this.tokens.get(address.toLowerCase());
    if (!token) {
      throw new Error(`no token at ${address}`);
    }
    return token;
  }

  private methodOf(request: TransactionRequest): string {
    const data = ethers.utils.hexlify(request.data ?? '0x');
    const to = String(request.to).toLowerCase();
    if (to === this.network.universalRouter.toLowerCase()) {
      return universalRouterInterface.parseTransaction({ data }).name;
    }
    return erc20Interface.parseTransaction({ data }).name;
  }

  private apply(sent: SentTransaction): void {
    const data = ethers.utils.hexlify(sent.request.data ?? '0x');

    if (sent.method === 'approve') {
      const { args } = erc20Interface.parseTransaction({ data });
      const token = this.requireToken(String(sent.request.to));
      token.allowances.set(String(args.spender).toLowerCase(), BigNumber.from(args.amount));
      return;
    }

    if (sent.method === 'execute') {
      const { args } = universalRouterInterface.parseTransaction({ data });
      const [, amountIn, , path] = ethers.utils.defaultAbiCoder.decode(
        ['address', 'uint256', 'uint256', 'bytes', 'bool'],
        args.inputs[0]
      );
      const decoded = decodePath(path);
      if (!decoded.ok) {
        throw new Error(decoded.error.message);
      }
      const tokenIn = this.requireToken(decoded.value.tokenA);
      const tokenOut = this.requireToken(decoded.value.tokenB);
      tokenIn.balance = tokenIn.balance.sub(amountIn);
      tokenOut.balance = tokenOut.balance.add(this.quotes.get(decoded.value.fee) ?? 0);
      this.swapConfirmed = true;
    }
  }

  private receipt(sent: SentTransaction, status: number): TransactionReceipt {
    return {
      to: String(sent.request.to),
      from: HOLDER,
      contractAddress: ethers.constants.AddressZero,
      transactionIndex: 0,
      gasUsed: this.gasUsed,
      logsBloom: '0x',
      blockHash: ethers.constants.HashZero,
      transactionHash: sent.hash,
      logs: [],
      blockNumber: 100 + this.sent.indexOf(sent),
      confirmations: 1,
      cumulativeGasUsed: this.gasUsed,
      effectiveGasPrice: this.gasPrice,
      byzantium: true,
      type: 0,
      status,
    };
  }
}
