import { ethers } from 'ethers';
import { Result, ok, fail } from './errors';

// tokenA (20) + fee (3, big-endian) + tokenB (20)
export const PATH_LENGTH = 43;
const ADDRESS_LENGTH = 20;
const FEE_LENGTH = 3;
const MAX_FEE = 2 ** 24;

export interface DecodedPath {
  tokenA: string;
  fee: number;
  tokenB: string;
}

export function validateFee(fee: number): Result<number> {
  if (!Number.isInteger(fee) || fee < 0 || fee >= MAX_FEE) {
    return fail('EncodingError', `Fee ${fee} does not fit in uint24`, { fee: String(fee) });
  }
  return ok(fee);
}

function isRawAddress(value: string): boolean {
  return ethers.utils.isHexString(value, ADDRESS_LENGTH) && ethers.utils.isAddress(value);
}

/**
 * Pack a single-pool V3 path the way the router reads it.
 */
export function encodePath(tokenA: string, fee: number, tokenB: string): Result<string> {
  for (const [label, address] of [['tokenA', tokenA], ['tokenB', tokenB]]) {
    if (!isRawAddress(address)) {
      return fail('EncodingError', `${label} is not a 20-byte address: ${address}`, { [label]: address });
    }
  }

  const checkedFee = validateFee(fee);
  if (!checkedFee.ok) {
    return checkedFee;
  }

  return ok(ethers.utils.solidityPack(['address', 'uint24', 'address'], [tokenA, fee, tokenB]));
}

export function decodePath(path: string): Result<DecodedPath> {
  if (!ethers.utils.isHexString(path) || ethers.utils.hexDataLength(path) !== PATH_LENGTH) {
    return fail('EncodingError', `Path must be ${PATH_LENGTH} bytes`, { path });
  }

  const feeOffset = ADDRESS_LENGTH;
  const tokenBOffset = ADDRESS_LENGTH + FEE_LENGTH;

  return ok({
    tokenA: ethers.utils.getAddress(ethers.utils.hexDataSlice(path, 0, feeOffset)),
    fee: parseInt(ethers.utils.hexDataSlice(path, feeOffset, tokenBOffset), 16),
    tokenB: ethers.utils.getAddress(ethers.utils.hexDataSlice(path, tokenBOffset)),
  });
}
