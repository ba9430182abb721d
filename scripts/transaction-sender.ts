import { BigNumber } from 'ethers';
import { ChainClient, TransactionReceipt } from './chain-client';
import { Result, ok, fail, describeError } from './errors';

export interface OutgoingTransaction {
  to: string;
  data: string;
  gasLimit: number;
  gasPrice: BigNumber;
  value?: BigNumber;
}

export type Confirmation =
  | { status: 'confirmed'; receipt: TransactionReceipt }
  | { status: 'reverted'; receipt: TransactionReceipt }
  | { status: 'timeout' };

/**
 * Signs and broadcasts transactions for the client's account.
 *
 * The nonce is read from the node right before signing and never reserved, so
 * two senders sharing one key must not run at the same time.
 */
export class TransactionSender {
  constructor(private readonly client: ChainClient) {}

  async send(tx: OutgoingTransaction): Promise<Result<string>> {
    try {
      const [nonce, chainId] = await Promise.all([
        this.client.getTransactionCount(this.client.address),
        this.client.getChainId(),
      ]);

      const signed = await this.client.signTransaction({
        to: tx.to,
        data: tx.data,
        value: tx.value ?? BigNumber.from(0),
        gasLimit: tx.gasLimit,
        gasPrice: tx.gasPrice,
        nonce,
        chainId,
      });

      const hash = await this.client.sendRawTransaction(signed);
      return ok(hash);
    } catch (error) {
      return fail('SubmissionFailed', describeError(error), { to: tx.to });
    }
  }

  /**
   * Wait for the receipt. A missing receipt after timeoutMs is reported as a
   * timeout, not a failure: the transaction may still be mined later.
   */
  async awaitConfirmation(transactionHash: string, timeoutMs: number): Promise<Result<Confirmation>> {
    try {
      const receipt = await this.client.waitForReceipt(transactionHash, timeoutMs);
      if (!receipt) {
        return ok<Confirmation>({ status: 'timeout' });
      }
      return ok<Confirmation>(receipt.status === 1 ? { status: 'confirmed', receipt } : { status: 'reverted', receipt });
    } catch (error) {
      return fail('UnexpectedError', `Receipt polling failed: ${describeError(error)}`, { transactionHash });
    }
  }
}
