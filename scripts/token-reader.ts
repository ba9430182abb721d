import { BigNumber } from 'ethers';
import { ChainClient } from './chain-client';
import { erc20Interface } from './abis';
import { Result, ok, fail, describeError } from './errors';
import { TokenInfo } from './types';

/**
 * Fresh ERC20 reads. Nothing here is cached: balances and allowances move
 * between calls.
 */
export class TokenReader {
  constructor(private readonly client: ChainClient) {}

  async getTokenInfo(token: string, owner: string, spender: string): Promise<Result<TokenInfo>> {
    try {
      const [symbol, decimals, balance, allowance] = await Promise.all([
        this.read(token, 'symbol', []),
        this.read(token, 'decimals', []),
        this.read(token, 'balanceOf', [owner]),
        this.read(token, 'allowance', [owner, spender]),
      ]);

      if (typeof symbol !== 'string' || typeof decimals !== 'number') {
        return fail('TokenInfoUnavailable', 'Token returned malformed metadata', { token });
      }
      if (!BigNumber.isBigNumber(balance) || !BigNumber.isBigNumber(allowance)) {
        return fail('TokenInfoUnavailable', 'Token returned malformed balance data', { token });
      }

      return ok({ address: token, symbol, decimals, balance, allowance });
    } catch (error) {
      return fail('TokenInfoUnavailable', describeError(error), { token });
    }
  }

  async readBalance(token: string, owner: string): Promise<Result<BigNumber>> {
    return this.readAmount(token, 'balanceOf', [owner]);
  }

  async readAllowance(token: string, owner: string, spender: string): Promise<Result<BigNumber>> {
    return this.readAmount(token, 'allowance', [owner, spender]);
  }

  private async readAmount(token: string, method: 'balanceOf' | 'allowance', args: string[]): Promise<Result<BigNumber>> {
    try {
      const value = await this.read(token, method, args);
      if (!BigNumber.isBigNumber(value)) {
        return fail('TokenInfoUnavailable', `${method} returned a non-numeric value`, { token });
      }
      return ok(value);
    } catch (error) {
      return fail('TokenInfoUnavailable', describeError(error), { token });
    }
  }

  private async read(token: string, method: string, args: string[]): Promise<unknown> {
    const data = erc20Interface.encodeFunctionData(method, args);
    const raw = await this.client.call({ to: token, data });
    const decoded = erc20Interface.decodeFunctionResult(method, raw);
    return decoded[0];
  }
}
