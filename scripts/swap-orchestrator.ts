/**
 * Single-hop swap pipeline.
 *
 * Init → InfoFetched → BalanceChecked → Approved → Quoted → PlanBuilt → Submitted → Confirmed
 *
 * Any step may end the run; the outcome records the last stage reached. One
 * attempt per call, no retries. Callers sharing a signing key must run swaps one
 * at a time: nonces are read fresh before each submission and never reserved.
 */

import { ethers, BigNumber } from 'ethers';
import { ChainClient } from './chain-client';
import { AllowanceManager } from './allowance-manager';
import { minimumAmountOut, parseSlippage, toSmallestUnit, formatAmount } from './amounts';
import { CommandBuilder, encodeExecuteCall } from './command-builder';
import {
  CONFIRMATION_TIMEOUT_MS,
  DEADLINE_WINDOW_SECONDS,
  GAS_PRICE_MARKUP,
  NetworkContracts,
  SWAP_GAS_LIMIT,
} from './config';
import { SwapError, SwapErrorKind, describeError } from './errors';
import { validateFee } from './path-encoder';
import { QuoteService } from './quote-service';
import { TokenReader } from './token-reader';
import { TransactionSender } from './transaction-sender';
import {
  BalanceSnapshot,
  SwapFailure,
  SwapIntent,
  SwapLogger,
  SwapOutcome,
  SwapPlan,
  SwapStage,
  SwapSuccess,
  TokenInfo,
} from './types';

export interface SwapOrchestratorOptions {
  client: ChainClient;
  network: NetworkContracts;
  commandBuilder: CommandBuilder;
  logger?: SwapLogger;
  /** Current unix time in seconds. */
  now?: () => number;
  confirmationTimeoutMs?: number;
  onStageChange?: (stage: SwapStage) => void;
}

class SwapAbort extends Error {
  constructor(readonly failure: SwapError, readonly transactionHash?: string) {
    super(failure.message);
  }
}

export class SwapOrchestrator {
  private readonly client: ChainClient;
  private readonly network: NetworkContracts;
  private readonly commandBuilder: CommandBuilder;
  private readonly reader: TokenReader;
  private readonly allowances: AllowanceManager;
  private readonly quotes: QuoteService;
  private readonly sender: TransactionSender;
  private readonly logger: SwapLogger;
  private readonly now: () => number;
  private readonly timeoutMs: number;
  private readonly onStageChange?: (stage: SwapStage) => void;

  constructor(options: SwapOrchestratorOptions) {
    this.client = options.client;
    this.network = options.network;
    this.commandBuilder = options.commandBuilder;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.timeoutMs = options.confirmationTimeoutMs ?? CONFIRMATION_TIMEOUT_MS;
    this.onStageChange = options.onStageChange;

    this.reader = new TokenReader(this.client);
    this.allowances = new AllowanceManager(this.client, { confirmationTimeoutMs: this.timeoutMs, logger: this.logger });
    this.quotes = new QuoteService(this.client, this.network.quoter);
    this.sender = new TransactionSender(this.client);
  }

  async execute(intent: SwapIntent): Promise<SwapOutcome> {
    const progress: { stage: SwapStage } = { stage: 'Init' };
    const reach = (next: SwapStage) => {
      progress.stage = next;
      this.onStageChange?.(next);
    };

    try {
      this.logger.log('\n🔄 Starting swap');
      this.logger.log(`  ${intent.amountIn} of ${intent.tokenIn} → ${intent.tokenOut}`);
      this.logger.log(`  Fee tier: ${intent.fee / 10000}% | Slippage: ${intent.slippagePercent}%`);
      this.onStageChange?.(progress.stage);

      return await this.run(intent, reach);
    } catch (error) {
      const { stage } = progress;
      const failure: SwapFailure =
        error instanceof SwapAbort
          ? { success: false, stage, error: error.failure, transactionHash: error.transactionHash }
          : {
              success: false,
              stage,
              error: { kind: 'UnexpectedError', message: describeError(error), context: { stage } },
            };

      this.logger.error(`\n❌ Swap failed at ${stage}: ${failure.error.kind}: ${failure.error.message}`);
      return failure;
    }
  }

  private async run(intent: SwapIntent, reach: (stage: SwapStage) => void): Promise<SwapSuccess> {
    const holder = this.client.address;

    // ============================================
    // Init: validate intent, check node
    // ============================================
    const fee = validateFee(intent.fee);
    if (!fee.ok) throw new SwapAbort(fee.error);

    const slippage = parseSlippage(intent.slippagePercent);
    if (!slippage.ok) throw new SwapAbort(slippage.error);

    let connected: boolean;
    try {
      connected = await this.client.isConnected();
    } catch (error) {
      abort('ConnectivityError', describeError(error), { network: this.network.name });
    }
    if (!connected) {
      abort('ConnectivityError', 'RPC endpoint is not reachable', { network: this.network.name });
    }

    // ============================================
    // Init → InfoFetched
    // ============================================
    for (const token of [intent.tokenIn, intent.tokenOut]) {
      if (!ethers.utils.isAddress(token)) {
        abort('TokenInfoUnavailable', `Not a token address: ${token}`, { token });
      }
    }

    const tokenIn = await this.fetchTokenInfo(intent.tokenIn);
    const tokenOut = await this.fetchTokenInfo(intent.tokenOut);
    reach('InfoFetched');

    this.logger.log('\n💰 Balances Before:');
    this.logger.log(`  ${tokenIn.symbol}: ${formatAmount(tokenIn.balance, tokenIn.decimals)}`);
    this.logger.log(`  ${tokenOut.symbol}: ${formatAmount(tokenOut.balance, tokenOut.decimals)}`);

    // ============================================
    // InfoFetched → BalanceChecked
    // ============================================
    const amountIn = toSmallestUnit(intent.amountIn, tokenIn.decimals);
    if (!amountIn.ok) throw new SwapAbort(amountIn.error);

    if (tokenIn.balance.lt(amountIn.value)) {
      abort('InsufficientBalance', `Insufficient ${tokenIn.symbol} balance`, {
        token: tokenIn.address,
        holder,
        balance: tokenIn.balance.toString(),
        required: amountIn.value.toString(),
      });
    }
    reach('BalanceChecked');

    // ============================================
    // BalanceChecked → Approved
    // ============================================
    this.logger.log('\n🔐 Checking token approval...');
    const approval = await this.allowances.ensureAllowance(tokenIn.address, this.network.permit2, amountIn.value);
    if (!approval.ok) throw new SwapAbort(approval.error);
    reach('Approved');

    // ============================================
    // Approved → Quoted
    // ============================================
    this.logger.log('\n🔍 Getting quote...');
    const quote = await this.quotes.quote(tokenIn.address, tokenOut.address, amountIn.value, fee.value);
    if (!quote.ok) throw new SwapAbort(quote.error);
    reach('Quoted');

    // ============================================
    // Quoted → PlanBuilt
    // ============================================
    const plan: SwapPlan = Object.freeze({
      tokenIn: tokenIn.address,
      tokenOut: tokenOut.address,
      amountIn: amountIn.value,
      amountOutMinimum: minimumAmountOut(quote.value, slippage.value),
      recipient: holder,
      deadline: this.now() + DEADLINE_WINDOW_SECONDS,
      fee: fee.value,
    });
    reach('PlanBuilt');

    this.logger.log(`  Expected out: ${formatAmount(quote.value, tokenOut.decimals)} ${tokenOut.symbol}`);
    this.logger.log(
      `  Min out (${slippage.value.toFixed(2)}% slippage): ${formatAmount(plan.amountOutMinimum, tokenOut.decimals)} ${tokenOut.symbol}`
    );
    this.logger.log(`  Deadline: ${new Date(plan.deadline * 1000).toISOString()}`);

    // ============================================
    // PlanBuilt → Submitted
    // ============================================
    const command = this.commandBuilder.build(plan);
    if (!command.ok) throw new SwapAbort(command.error);

    let gasPrice: BigNumber;
    try {
      gasPrice = (await this.client.getGasPrice()).mul(GAS_PRICE_MARKUP.numerator).div(GAS_PRICE_MARKUP.denominator);
    } catch (error) {
      abort('SubmissionFailed', `Could not read gas price: ${describeError(error)}`, {});
    }

    this.logger.log(`\n📤 Submitting swap (${command.value.encoding})...`);
    const sent = await this.sender.send({
      to: this.network.universalRouter,
      data: encodeExecuteCall(command.value, plan.deadline),
      gasLimit: SWAP_GAS_LIMIT,
      gasPrice,
      value: BigNumber.from(0),
    });
    if (!sent.ok) throw new SwapAbort(sent.error);

    const transactionHash = sent.value;
    reach('Submitted');
    this.logger.log(`  Transaction hash: ${transactionHash}`);
    this.logger.log('  Waiting for confirmation...');

    // ============================================
    // Submitted → Confirmed
    // ============================================
    const confirmation = await this.sender.awaitConfirmation(transactionHash, this.timeoutMs);
    if (!confirmation.ok) throw new SwapAbort(confirmation.error, transactionHash);

    const result = confirmation.value;
    if (result.status === 'timeout') {
      abort(
        'ConfirmationTimeout',
        `No receipt within ${this.timeoutMs / 1000}s; outcome unknown, the transaction may still be mined`,
        { transactionHash },
        transactionHash
      );
    }
    if (result.status === 'reverted') {
      abort(
        'TransactionReverted',
        'Swap transaction reverted',
        { transactionHash, gasUsed: result.receipt.gasUsed.toString(), encoding: command.value.encoding },
        transactionHash
      );
    }

    const { receipt } = result;
    reach('Confirmed');
    this.logger.log(`  ✅ Confirmed in block: ${receipt.blockNumber}`);
    this.logger.log(`  Gas used: ${receipt.gasUsed.toString()}`);

    const balances = await this.refreshBalances(tokenIn, tokenOut);

    return {
      success: true,
      stage: 'Confirmed',
      transactionHash,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
      plan,
      expectedAmountOut: quote.value,
      encoding: command.value.encoding,
      balances,
    };
  }

  private async fetchTokenInfo(token: string): Promise<TokenInfo> {
    const info = await this.reader.getTokenInfo(token, this.client.address, this.network.permit2);
    if (!info.ok) throw new SwapAbort(info.error);
    return info.value;
  }

  /** Post-trade balances. A failed read leaves the outcome successful. */
  private async refreshBalances(tokenIn: TokenInfo, tokenOut: TokenInfo): Promise<SwapSuccess['balances']> {
    const [inBalance, outBalance] = await Promise.all([
      this.reader.readBalance(tokenIn.address, this.client.address),
      this.reader.readBalance(tokenOut.address, this.client.address),
    ]);

    if (!inBalance.ok || !outBalance.ok) {
      this.logger.warn('⚠️  Swap confirmed but balances could not be refreshed');
      return undefined;
    }

    const snapshot = (token: TokenInfo, raw: BigNumber): BalanceSnapshot => ({
      symbol: token.symbol,
      raw,
      formatted: formatAmount(raw, token.decimals),
    });

    this.logger.log('\n💰 Balances After:');
    this.logger.log(`  ${tokenIn.symbol}: ${formatAmount(inBalance.value, tokenIn.decimals)}`);
    this.logger.log(`  ${tokenOut.symbol}: ${formatAmount(outBalance.value, tokenOut.decimals)}`);

    return {
      tokenIn: snapshot(tokenIn, inBalance.value),
      tokenOut: snapshot(tokenOut, outBalance.value),
    };
  }
}

function abort(
  kind: SwapErrorKind,
  message: string,
  context: Record<string, string>,
  transactionHash?: string
): never {
  throw new SwapAbort({ kind, message, context }, transactionHash);
}
