import { ethers, BigNumber } from 'ethers';
import { Percent } from '@uniswap/sdk-core';
import { Result, ok, fail } from './errors';

const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const HUNDRED_PERCENT = new Percent(1);

/**
 * Convert a human amount ("10.5") to the token's smallest unit.
 * Digits beyond the token's precision are truncated, never rounded.
 */
export function toSmallestUnit(amount: string, decimals: number): Result<BigNumber> {
  const trimmed = amount.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return fail('InvalidIntent', `Amount "${amount}" is not a plain decimal number`, { amount });
  }

  const [whole, fraction = ''] = trimmed.split('.');
  const kept = fraction.slice(0, decimals);
  const value = ethers.utils.parseUnits(kept ? `${whole || '0'}.${kept}` : whole || '0', decimals);

  if (value.isZero()) {
    return fail('InvalidIntent', `Amount "${amount}" is zero at ${decimals} decimals`, { amount });
  }
  return ok(value);
}

/**
 * Parse a slippage percentage (0.5 means 0.5%) into an exact Percent.
 * Accepts 0 up to but excluding 100.
 */
export function parseSlippage(slippagePercent: string | number): Result<Percent> {
  const text = String(slippagePercent).trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return fail('InvalidIntent', `Slippage "${text}" is not a plain decimal number`, { slippage: text });
  }

  const [whole, fraction = ''] = text.split('.');
  const digits = `${whole}${fraction}`.replace(/^0+(?=\d)/, '');
  const denominator = BigNumber.from(10).pow(fraction.length).mul(100);

  if (BigNumber.from(digits).gte(denominator)) {
    return fail('InvalidIntent', `Slippage must be below 100%, got ${text}%`, { slippage: text });
  }
  return ok(new Percent(digits, denominator.toString()));
}

/**
 * floor(quoted * (100 - slippage) / 100), computed on integers.
 */
export function minimumAmountOut(quoted: BigNumber, slippage: Percent): BigNumber {
  const kept = HUNDRED_PERCENT.subtract(slippage);
  return BigNumber.from(kept.multiply(quoted.toString()).quotient.toString());
}

export function formatAmount(raw: BigNumber, decimals: number): string {
  return ethers.utils.formatUnits(raw, decimals);
}
