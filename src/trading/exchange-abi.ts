/**
 * Constant-product AMM contract ABIs (Uniswap V2 style)
 *
 * Human-readable fragments, parsed by ethers. The execution engine calls
 * them through the ChainClient by function signature.
 */

/**
 * Pair contract: reserves and token ordering
 */
export const PAIR_ABI = [
  "function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)",
  "function token0() view returns (address)",
  "function token1() view returns (address)",
  "event Swap(address indexed sender, uint256 amount0In, uint256 amount1In, uint256 amount0Out, uint256 amount1Out, address indexed to)",
] as const;

/**
 * Router contract: exact-input swaps
 */
export const ROUTER_ABI = [
  "function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)",
  "function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)",
] as const;

/**
 * Standard ERC20 ABI for token approvals and balances
 */
export const ERC20_ABI = [
  "function approve(address spender, uint256 amount) returns (bool)",
  "function allowance(address owner, address spender) view returns (uint256)",
  "function balanceOf(address account) view returns (uint256)",
  "function decimals() view returns (uint8)",
] as const;

// Signatures used by the engine (ChainClient addresses calls by signature)
export const SIG = {
  GET_RESERVES: PAIR_ABI[0],
  SWAP_EXACT_TOKENS: ROUTER_ABI[0],
  APPROVE: ERC20_ABI[0],
  ALLOWANCE: ERC20_ABI[1],
  BALANCE_OF: ERC20_ABI[2],
} as const;

export const PAIR_SWAP_EVENT = PAIR_ABI[3];
