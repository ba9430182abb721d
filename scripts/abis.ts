import { ethers } from 'ethers';

// Human-readable ABIs, only the fragments the swap pipeline calls.

export const ERC20_ABI = [
  'function symbol() external view returns (string)',
  'function decimals() external view returns (uint8)',
  'function balanceOf(address owner) external view returns (uint256)',
  'function allowance(address owner, address spender) external view returns (uint256)',
  'function approve(address spender, uint256 amount) external returns (bool)',
];

export const UNIVERSAL_ROUTER_ABI = [
  'function execute(bytes commands, bytes[] inputs, uint256 deadline) external payable',
];

// QuoterV2: not a view function, must be eth_call'ed rather than sent
export const QUOTER_V2_ABI = [
  'function quoteExactInputSingle(tuple(address tokenIn, address tokenOut, uint256 amountIn, uint24 fee, uint160 sqrtPriceLimitX96) params) external returns (uint256 amountOut, uint160 sqrtPriceX96After, uint32 initializedTicksCrossed, uint256 gasEstimate)',
];

export const erc20Interface = new ethers.utils.Interface(ERC20_ABI);
export const universalRouterInterface = new ethers.utils.Interface(UNIVERSAL_ROUTER_ABI);
export const quoterInterface = new ethers.utils.Interface(QUOTER_V2_ABI);
