/**
 * Check Quote Script
 *
 * Quotes one token pair on every standard V3 fee tier and shows which pool
 * gives the most output. Read-only: nothing is signed or sent.
 *
 * Usage:
 *   npx ts-node scripts/check-quote.ts <tokenIn> <amount> [tokenOut]
 *
 * tokenOut defaults to the network's wrapped native token.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { formatAmount, toSmallestUnit } from './amounts';
import { EthersChainClient } from './chain-client';
import { FEE_TIERS, loadSwapConfig, resolveNetwork } from './config';
import { formatSwapError } from './errors';
import { QuoteService } from './quote-service';
import { TokenReader } from './token-reader';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

async function main() {
  const [tokenInAddress, amount, tokenOutArg] = process.argv.slice(2);
  if (!tokenInAddress || !amount) {
    throw new Error('Usage: check-quote.ts <tokenIn> <amount> [tokenOut]');
  }

  const config = loadSwapConfig();
  const network = resolveNetwork(config.chainId);
  const tokenOutAddress = tokenOutArg ?? network.weth;
  const client = new EthersChainClient(config.rpcUrl, config.privateKey, config.chainId);

  console.log('='.repeat(80));
  console.log(`Fee Tier Check - ${network.name}`);
  console.log('='.repeat(80));

  const reader = new TokenReader(client);
  const tokenIn = await reader.getTokenInfo(tokenInAddress, client.address, network.permit2);
  const tokenOut = await reader.getTokenInfo(tokenOutAddress, client.address, network.permit2);
  if (!tokenIn.ok) throw new Error(formatSwapError(tokenIn.error));
  if (!tokenOut.ok) throw new Error(formatSwapError(tokenOut.error));

  const amountIn = toSmallestUnit(amount, tokenIn.value.decimals);
  if (!amountIn.ok) throw new Error(formatSwapError(amountIn.error));

  console.log(`\nQuoting ${amount} ${tokenIn.value.symbol} → ${tokenOut.value.symbol}\n`);

  const quotes = new QuoteService(client, network.quoter);
  const scan = await quotes.quoteAcrossFeeTiers(tokenIn.value.address, tokenOut.value.address, amountIn.value, FEE_TIERS);

  for (const { fee, result } of scan.quotes) {
    if (result.ok) {
      console.log(`  ✓ ${fee / 10000}%: ${formatAmount(result.value, tokenOut.value.decimals)} ${tokenOut.value.symbol}`);
    } else {
      console.log(`  ✗ ${fee / 10000}%: ${result.error.message}`);
    }
  }

  console.log('\n' + '='.repeat(80));
  if (scan.best) {
    console.log(`✅ Best pool: ${scan.best.fee / 10000}% fee → ${formatAmount(scan.best.amountOut, tokenOut.value.decimals)} ${tokenOut.value.symbol}`);
  } else {
    console.log('❌ No pool returned a quote');
    process.exitCode = 1;
  }
  console.log('='.repeat(80) + '\n');
}

main().catch((error) => {
  console.error('\n💥 Error:', error.message);
  process.exit(1);
});
