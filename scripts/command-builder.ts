import { ethers, BigNumber } from 'ethers';
import { universalRouterInterface } from './abis';
import { Result, ok, fail, describeError } from './errors';
import { encodePath } from './path-encoder';
import { CommandEncoding, RouterCommand, SwapLogger, SwapPlan } from './types';

// Universal Router opcode for an exact-input V3 swap (single or multi hop)
export const V3_SWAP_EXACT_IN = 0x00;

// recipient, amountIn, amountOutMin, path, payerIsUser
const V3_SWAP_EXACT_IN_PARAMS = ['address', 'uint256', 'uint256', 'bytes', 'bool'];

export interface V3SwapExactInParams {
  recipient: string;
  amountIn: BigNumber;
  amountOutMinimum: BigNumber;
  path: string;
  payerIsUser: boolean;
}

/**
 * Turns one exact-input swap into Universal Router commands and inputs.
 */
export interface CommandEncodingStrategy {
  readonly name: CommandEncoding;
  encodeV3SwapExactIn(params: V3SwapExactInParams): RouterCommand;
}

type UniversalRouterSdk = Pick<typeof import('@uniswap/universal-router-sdk'), 'RoutePlanner' | 'CommandType'>;

/**
 * Preferred encoder: the SDK's RoutePlanner.
 */
export class RoutePlannerStrategy implements CommandEncodingStrategy {
  readonly name = 'route-planner';

  constructor(private readonly sdk: UniversalRouterSdk) {}

  encodeV3SwapExactIn(params: V3SwapExactInParams): RouterCommand {
    const planner = new this.sdk.RoutePlanner();
    planner.addCommand(this.sdk.CommandType.V3_SWAP_EXACT_IN, [
      params.recipient,
      params.amountIn.toString(),
      params.amountOutMinimum.toString(),
      params.path,
      params.payerIsUser,
    ]);
    return { commands: planner.commands, inputs: planner.inputs, encoding: this.name };
  }
}

/**
 * Fallback encoder: the same fields through ethers' generic ABI coder.
 * Best effort; the router has the final say on whether it accepts the payload.
 */
export class AbiCoderStrategy implements CommandEncodingStrategy {
  readonly name = 'abi-coder';

  encodeV3SwapExactIn(params: V3SwapExactInParams): RouterCommand {
    const input = ethers.utils.defaultAbiCoder.encode(V3_SWAP_EXACT_IN_PARAMS, [
      params.recipient,
      params.amountIn,
      params.amountOutMinimum,
      params.path,
      params.payerIsUser,
    ]);
    return { commands: ethers.utils.hexlify([V3_SWAP_EXACT_IN]), inputs: [input], encoding: this.name };
  }
}

export interface StrategyOptions {
  preference?: 'auto' | 'fallback';
  logger?: SwapLogger;
  importSdk?: () => Promise<UniversalRouterSdk>;
}

/**
 * Pick the encoder once, at startup. The SDK is loaded lazily so a broken or
 * missing install degrades to the ABI coder instead of failing the process.
 */
export async function loadCommandEncodingStrategy(options: StrategyOptions = {}): Promise<CommandEncodingStrategy> {
  const logger = options.logger ?? console;

  if (options.preference === 'fallback') {
    logger.log('🧩 Command encoder: abi-coder (forced)');
    return new AbiCoderStrategy();
  }

  const importSdk = options.importSdk ?? (() => import('@uniswap/universal-router-sdk'));
  try {
    const sdk = await importSdk();
    logger.log('🧩 Command encoder: route-planner');
    return new RoutePlannerStrategy(sdk);
  } catch (error) {
    logger.warn(`⚠️  Universal Router SDK unavailable (${describeError(error)}). Falling back to abi-coder.`);
    return new AbiCoderStrategy();
  }
}

export class CommandBuilder {
  constructor(private readonly strategy: CommandEncodingStrategy) {}

  get encoding(): CommandEncoding {
    return this.strategy.name;
  }

  /**
   * Single V3_SWAP_EXACT_IN command paid by the transaction sender.
   */
  build(plan: SwapPlan): Result<RouterCommand> {
    const path = encodePath(plan.tokenIn, plan.fee, plan.tokenOut);
    if (!path.ok) {
      return path;
    }

    try {
      const command = this.strategy.encodeV3SwapExactIn({
        recipient: plan.recipient,
        amountIn: plan.amountIn,
        amountOutMinimum: plan.amountOutMinimum,
        path: path.value,
        payerIsUser: true,
      });

      if (ethers.utils.hexDataLength(command.commands) !== command.inputs.length) {
        return fail('EncodingError', 'Command and input counts differ', { commands: command.commands });
      }
      return ok(command);
    } catch (error) {
      return fail('EncodingError', describeError(error), { encoding: this.strategy.name });
    }
  }
}

/**
 * Calldata for UniversalRouter.execute(commands, inputs, deadline).
 */
export function encodeExecuteCall(command: RouterCommand, deadline: number): string {
  return universalRouterInterface.encodeFunctionData('execute', [command.commands, command.inputs, deadline]);
}
