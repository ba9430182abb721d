import { BigNumber } from 'ethers';
import { SwapError } from './errors';

/** A swap request as the caller states it. Amount and slippage stay decimal strings until parsed. */
export interface SwapIntent {
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: string;      // human-readable, e.g. "10.5"
  readonly slippagePercent: string | number; // e.g. 0.5 for 0.5%
  readonly fee: number;           // pool fee tier, 3000 = 0.30%
}

export interface TokenInfo {
  address: string;
  symbol: string;
  decimals: number;
  balance: BigNumber;
  allowance: BigNumber;
}

export interface SwapPlan {
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: BigNumber;
  readonly amountOutMinimum: BigNumber;
  readonly recipient: string;
  readonly deadline: number;      // unix seconds
  readonly fee: number;
}

export type CommandEncoding = 'route-planner' | 'abi-coder';

export interface RouterCommand {
  commands: string;               // one opcode byte per command, hex
  inputs: string[];               // one ABI-encoded payload per opcode
  encoding: CommandEncoding;
}

export type SwapStage =
  | 'Init'
  | 'InfoFetched'
  | 'BalanceChecked'
  | 'Approved'
  | 'Quoted'
  | 'PlanBuilt'
  | 'Submitted'
  | 'Confirmed';

export interface BalanceSnapshot {
  symbol: string;
  raw: BigNumber;
  formatted: string;
}

export interface SwapSuccess {
  success: true;
  stage: 'Confirmed';
  transactionHash: string;
  blockNumber: number;
  gasUsed: BigNumber;
  plan: SwapPlan;
  expectedAmountOut: BigNumber;
  encoding: CommandEncoding;
  // best-effort: absent when the post-trade refresh failed
  balances?: {
    tokenIn: BalanceSnapshot;
    tokenOut: BalanceSnapshot;
  };
}

export interface SwapFailure {
  success: false;
  stage: SwapStage;
  error: SwapError;
  transactionHash?: string;
}

export type SwapOutcome = SwapSuccess | SwapFailure;

export type SwapLogger = Pick<Console, 'log' | 'warn' | 'error'>;
