import { BigNumber } from 'ethers';
import { ChainClient } from './chain-client';
import { quoterInterface } from './abis';
import { Result, ok, fail, describeError } from './errors';

export interface FeeTierQuote {
  fee: number;
  result: Result<BigNumber>;
}

export interface FeeTierScan {
  quotes: FeeTierQuote[];
  best: { fee: number; amountOut: BigNumber } | null;
}

/**
 * Exact-input quotes from the QuoterV2 contract via eth_call.
 * A quote is simulated, never sent, and carries no price limit.
 */
export class QuoteService {
  constructor(
    private readonly client: ChainClient,
    private readonly quoterAddress: string
  ) {}

  async quote(tokenIn: string, tokenOut: string, amountIn: BigNumber, fee: number): Promise<Result<BigNumber>> {
    const context = { tokenIn, tokenOut, amountIn: amountIn.toString(), fee: String(fee) };

    try {
      const data = quoterInterface.encodeFunctionData('quoteExactInputSingle', [
        { tokenIn, tokenOut, amountIn, fee, sqrtPriceLimitX96: 0 },
      ]);
      const raw = await this.client.call({ to: this.quoterAddress, data });
      const [amountOut] = quoterInterface.decodeFunctionResult('quoteExactInputSingle', raw);

      if (!BigNumber.isBigNumber(amountOut) || amountOut.lte(0)) {
        return fail('QuoteUnavailable', 'Quoter returned no usable amountOut', context);
      }
      return ok(amountOut);
    } catch (error) {
      return fail('QuoteUnavailable', describeError(error), context);
    }
  }

  /**
   * Quote the same pair on several fee tiers, one pool at a time.
   */
  async quoteAcrossFeeTiers(
    tokenIn: string,
    tokenOut: string,
    amountIn: BigNumber,
    feeTiers: number[]
  ): Promise<FeeTierScan> {
    const quotes: FeeTierQuote[] = [];
    let best: FeeTierScan['best'] = null;

    for (const fee of feeTiers) {
      const result = await this.quote(tokenIn, tokenOut, amountIn, fee);
      quotes.push({ fee, result });

      if (result.ok && (!best || result.value.gt(best.amountOut))) {
        best = { fee, amountOut: result.value };
      }
    }

    return { quotes, best };
  }
}
