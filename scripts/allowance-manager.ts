import { ethers, BigNumber } from 'ethers';
import { ChainClient } from './chain-client';
import { erc20Interface } from './abis';
import { APPROVAL_GAS_LIMIT, CONFIRMATION_TIMEOUT_MS } from './config';
import { Result, ok, fail, describeError } from './errors';
import { TokenReader } from './token-reader';
import { TransactionSender } from './transaction-sender';
import { SwapLogger } from './types';

export type AllowanceStatus =
  | { status: 'sufficient'; allowance: BigNumber }
  | { status: 'approved'; transactionHash: string };

export interface AllowanceManagerOptions {
  confirmationTimeoutMs?: number;
  logger?: SwapLogger;
}

/**
 * Makes sure a spender may pull `requiredAmount` of a token from the client's
 * account. Approves MaxUint256 when it has to approve at all, so the next swap
 * of the same token skips the transaction.
 */
export class AllowanceManager {
  private readonly reader: TokenReader;
  private readonly sender: TransactionSender;
  private readonly timeoutMs: number;
  private readonly logger: SwapLogger;

  constructor(private readonly client: ChainClient, options: AllowanceManagerOptions = {}) {
    this.reader = new TokenReader(client);
    this.sender = new TransactionSender(client);
    this.timeoutMs = options.confirmationTimeoutMs ?? CONFIRMATION_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  async ensureAllowance(token: string, spender: string, requiredAmount: BigNumber): Promise<Result<AllowanceStatus>> {
    const context = { token, spender, requiredAmount: requiredAmount.toString() };

    const current = await this.reader.readAllowance(token, this.client.address, spender);
    if (!current.ok) {
      return fail('ApprovalFailed', `Could not read allowance: ${current.error.message}`, context);
    }

    if (current.value.gte(requiredAmount)) {
      this.logger.log(`  ✅ Already approved (allowance ${current.value.toString()})`);
      return ok<AllowanceStatus>({ status: 'sufficient', allowance: current.value });
    }

    this.logger.log(`  Approving ${spender} to spend ${token}...`);

    let gasPrice: BigNumber;
    try {
      gasPrice = await this.client.getGasPrice();
    } catch (error) {
      return fail('ApprovalFailed', `Could not read gas price: ${describeError(error)}`, context);
    }

    const sent = await this.sender.send({
      to: token,
      data: erc20Interface.encodeFunctionData('approve', [spender, ethers.constants.MaxUint256]),
      gasLimit: APPROVAL_GAS_LIMIT,
      gasPrice,
    });
    if (!sent.ok) {
      return fail('ApprovalFailed', `Approval not submitted: ${sent.error.message}`, context);
    }

    const transactionHash = sent.value;
    this.logger.log(`  Approval transaction: ${transactionHash}`);

    const confirmation = await this.sender.awaitConfirmation(transactionHash, this.timeoutMs);
    if (!confirmation.ok) {
      return fail('ApprovalFailed', confirmation.error.message, { ...context, transactionHash });
    }

    switch (confirmation.value.status) {
      case 'confirmed':
        this.logger.log('  ✅ Approval confirmed');
        return ok<AllowanceStatus>({ status: 'approved', transactionHash });
      case 'reverted':
        return fail('ApprovalFailed', 'Approval transaction reverted', { ...context, transactionHash });
      case 'timeout':
        return fail(
          'ApprovalFailed',
          `Approval not confirmed within ${this.timeoutMs / 1000}s; it may still be mined`,
          { ...context, transactionHash }
        );
    }
  }
}
