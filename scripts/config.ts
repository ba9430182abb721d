/**
 * Network contract tables and runtime settings.
 *
 * The table for the configured chain is resolved once and handed to every
 * component; nothing below the entry scripts looks up NETWORKS on its own.
 */

export interface NetworkContracts {
  chainId: number;
  name: string;
  universalRouter: string;
  permit2: string;
  quoter: string;
  weth: string;
}

export interface ResolvedNetwork extends NetworkContracts {
  // true when the requested chain had no table and the default was used
  isFallback: boolean;
}

const PERMIT2 = '0x000000000022D473030F116dDEE9F6B43aC78BA3';

export const NETWORKS: Record<number, NetworkContracts> = {
  // Ethereum Mainnet
  1: {
    chainId: 1,
    name: 'Ethereum',
    universalRouter: '0x3fC91A3afd70395Cd496C647d5a6CC9D4B2b7FAD',
    permit2: PERMIT2,
    quoter: '0x61fFE014bA17989E743c5F6cB21bF9697530B21e',
    weth: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
  },
  // Polygon PoS (weth slot holds WMATIC)
  137: {
    chainId: 137,
    name: 'Polygon',
    universalRouter: '0xec7BE89e9d109e7e3Fec59c222CF297125FEFda2',
    permit2: PERMIT2,
    quoter: '0x61fFE014bA17989E743c5F6cB21bF9697530B21e',
    weth: '0x0d500B1d8E8eF31E21C99d1Db9A6444d3ADf1270',
  },
  // Ethereum Sepolia
  11155111: {
    chainId: 11155111,
    name: 'Sepolia',
    universalRouter: '0x3fC91A3afd70395Cd496C647d5a6CC9D4B2b7FAD',
    permit2: PERMIT2,
    quoter: '0xEd1f6473345F45b75F8179591dd5bA1888cf2FB3',
    weth: '0xfFf9976782d46CC05630D1f6eBAb18b2324d6B14',
  },
};

export const DEFAULT_CHAIN_ID = 1;

// ============================================
// SWAP POLICY
// ============================================

export const DEADLINE_WINDOW_SECONDS = 30 * 60;
export const SWAP_GAS_LIMIT = 300000;
export const APPROVAL_GAS_LIMIT = 100000;
export const GAS_PRICE_MARKUP = { numerator: 110, denominator: 100 };
export const CONFIRMATION_TIMEOUT_MS = 300 * 1000;
export const DEFAULT_FEE_TIER = 3000;
export const FEE_TIERS = [100, 500, 3000, 10000]; // 0.01%, 0.05%, 0.3%, 1%

/**
 * Contract table for a chain, falling back to the default table for unknown ids.
 */
export function resolveNetwork(
  chainId: number,
  logger: Pick<Console, 'warn'> = console
): ResolvedNetwork {
  const known = NETWORKS[chainId];
  if (known) {
    return { ...known, isFallback: false };
  }

  logger.warn(`Unknown chain id ${chainId}. Falling back to ${NETWORKS[DEFAULT_CHAIN_ID].name} contracts.`);
  return { ...NETWORKS[DEFAULT_CHAIN_ID], isFallback: true };
}

export type EncoderPreference = 'auto' | 'fallback';

export interface SwapConfig {
  privateKey: string;
  rpcUrl: string;
  chainId: number;
  encoder: EncoderPreference;
}

/**
 * Read the signing key, RPC endpoint and chain from the environment.
 */
export function loadSwapConfig(env: NodeJS.ProcessEnv = process.env): SwapConfig {
  const privateKey = env.PRIVATE_KEY;
  if (!privateKey) {
    throw new Error('PRIVATE_KEY not set in .env file');
  }

  const rpcUrl = env.RPC_URL;
  if (!rpcUrl) {
    throw new Error('RPC_URL not set in .env file');
  }

  let chainId = DEFAULT_CHAIN_ID;
  if (env.CHAIN_ID) {
    chainId = Number(env.CHAIN_ID);
    if (!Number.isInteger(chainId) || chainId <= 0) {
      throw new Error(`CHAIN_ID must be a positive integer, got "${env.CHAIN_ID}"`);
    }
  }

  return {
    privateKey,
    rpcUrl,
    chainId,
    encoder: env.SWAP_ENCODER === 'fallback' ? 'fallback' : 'auto',
  };
}
