/**
 * Swap one ERC20 for another through a single Uniswap V3 pool
 *
 * This script:
 * 1. Reads both tokens and checks the input balance
 * 2. Approves Permit2 for the input token if needed
 * 3. Quotes the pool, applies slippage and submits UniversalRouter.execute()
 * 4. Waits for the receipt and prints the new balances
 *
 * Usage:
 *   npx ts-node scripts/swap-token.ts <tokenIn> <tokenOut> <amount> [slippagePercent] [feeTier]
 *
 * Example (10 USDC → WETH, 0.5% slippage, 0.3% pool):
 *   npx ts-node scripts/swap-token.ts 0xA0b8...eB48 0xC02a...6Cc2 10 0.5 3000
 *
 * Note: this script only approves Permit2 on the input token. The router pulls
 * funds through Permit2, so the account also needs a Permit2 allowance for the
 * UniversalRouter (Permit2.approve(token, router, amount, expiration)) granted
 * beforehand, or the swap reverts on-chain.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { ethers } from 'ethers';
import { EthersChainClient } from './chain-client';
import { CommandBuilder, loadCommandEncodingStrategy } from './command-builder';
import { DEFAULT_FEE_TIER, loadSwapConfig, resolveNetwork } from './config';
import { formatSwapError } from './errors';
import { SwapOrchestrator } from './swap-orchestrator';
import { SwapIntent } from './types';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

function parseArgs(argv: string[]): SwapIntent {
  const [tokenIn, tokenOut, amountIn, slippage = '0.5', fee = String(DEFAULT_FEE_TIER)] = argv;
  if (!tokenIn || !tokenOut || !amountIn) {
    throw new Error('Usage: swap-token.ts <tokenIn> <tokenOut> <amount> [slippagePercent] [feeTier]');
  }
  return { tokenIn, tokenOut, amountIn, slippagePercent: slippage, fee: Number(fee) };
}

// ============================================
// MAIN
// ============================================

async function main() {
  const intent = parseArgs(process.argv.slice(2));
  const config = loadSwapConfig();
  const network = resolveNetwork(config.chainId);

  console.log('='.repeat(70));
  console.log(`Swap on ${network.name} via Universal Router`);
  console.log('='.repeat(70));

  const client = new EthersChainClient(config.rpcUrl, config.privateKey, config.chainId);
  const strategy = await loadCommandEncodingStrategy({ preference: config.encoder });

  console.log('\n📋 Configuration:');
  console.log('  Chain:', `${network.name} (${config.chainId})${network.isFallback ? ' [default contracts]' : ''}`);
  console.log('  Wallet:', client.address);
  console.log('  Native balance:', ethers.utils.formatEther(await client.getNativeBalance(client.address)));
  console.log('  Universal Router:', network.universalRouter);
  console.log('  Permit2:', network.permit2);
  console.log('  Quoter:', network.quoter);

  const orchestrator = new SwapOrchestrator({
    client,
    network,
    commandBuilder: new CommandBuilder(strategy),
  });

  const outcome = await orchestrator.execute(intent);

  console.log('\n' + '='.repeat(70));
  if (outcome.success) {
    console.log('✅ Swap complete!');
    console.log('  Transaction:', outcome.transactionHash);
    console.log('  Gas used:', outcome.gasUsed.toString());
    if (!outcome.balances) {
      console.log('  (balances could not be refreshed)');
    }
  } else {
    console.log(`❌ Swap failed at stage ${outcome.stage}`);
    console.log('  ' + formatSwapError(outcome.error));
    if (outcome.transactionHash) {
      console.log('  Transaction:', outcome.transactionHash);
    }
    process.exitCode = 1;
  }
  console.log('='.repeat(70) + '\n');
}

main().catch((error) => {
  console.error('\n💥 Error:', error.message);
  process.exit(1);
});
