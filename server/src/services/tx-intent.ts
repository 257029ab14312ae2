/**
 * Transaction intents
 * Encodes router, lending-pool and executor-contract calldata for an opportunity
 */

import { encodeFunctionData, type Address, type Hex } from 'viem';
import type { Opportunity, TxIntent, VenueId } from '../../../shared/schema.js';

// Uniswap V2 router (exact-in swap)
const UNISWAP_V2_ROUTER_ABI = [
  {
    inputs: [
      { name: 'amountIn', type: 'uint256' },
      { name: 'amountOutMin', type: 'uint256' },
      { name: 'path', type: 'address[]' },
      { name: 'to', type: 'address' },
      { name: 'deadline', type: 'uint256' },
    ],
    name: 'swapExactTokensForTokens',
    outputs: [{ name: 'amounts', type: 'uint256[]' }],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;

// Aave-style lending pool
const LENDING_POOL_ABI = [
  {
    inputs: [
      { name: 'collateralAsset', type: 'address' },
      { name: 'debtAsset', type: 'address' },
      { name: 'user', type: 'address' },
      { name: 'debtToCover', type: 'uint256' },
      { name: 'receiveAToken', type: 'bool' },
    ],
    name: 'liquidationCall',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;

// Own executor contract: runs every leg atomically and reverts below minProfit
const EXECUTOR_ABI = [
  {
    inputs: [
      {
        components: [
          { name: 'pool', type: 'address' },
          { name: 'tokenIn', type: 'address' },
          { name: 'tokenOut', type: 'address' },
          { name: 'amountIn', type: 'uint256' },
          { name: 'minAmountOut', type: 'uint256' },
        ],
        name: 'legs',
        type: 'tuple[]',
      },
      { name: 'minProfit', type: 'uint256' },
      { name: 'deadline', type: 'uint256' },
    ],
    name: 'executePath',
    outputs: [{ name: 'profit', type: 'uint256' }],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;

export interface IntentContext {
  intentId: string;
  chainId: number;
  wallet: Address;
  executorContract: Address;
  routerFor: (venueId: VenueId) => Address | null;
  /** borrower address for liquidation positions */
  borrowerFor: (opportunity: Opportunity) => Address | null;
  deadline: bigint;
  maxFeePerGas?: bigint;
}

export type IntentResult = { success: true; intent: TxIntent } | { success: false; error: string };

export function buildTxIntent(opportunity: Opportunity, context: IntentContext): IntentResult {
  const legs = opportunity.inputs.legs;
  const first = legs[0];
  const last = legs[legs.length - 1];
  if (!first || !last) {
    return { success: false, error: 'Opportunity has no execution legs' };
  }

  let to: Address;
  let data: Hex;

  switch (opportunity.kind) {
    case 'snipe': {
      const router = context.routerFor(first.venueId);
      if (!router) return { success: false, error: `No router configured for ${first.venueId}` };
      to = router;
      data = encodeFunctionData({
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: 'swapExactTokensForTokens',
        args: [first.amountIn, first.minAmountOut, [first.tokenIn, first.tokenOut], context.wallet, context.deadline],
      });
      break;
    }
    case 'liquidation': {
      const borrower = context.borrowerFor(opportunity);
      if (!borrower) return { success: false, error: 'Liquidation position not found' };
      to = first.poolAddress;
      data = encodeFunctionData({
        abi: LENDING_POOL_ABI,
        functionName: 'liquidationCall',
        args: [first.tokenOut, first.tokenIn, borrower, first.amountIn, false],
      });
      break;
    }
    case 'arbitrage': {
      // the last leg must at least return what the first put in
      const minProfit = last.minAmountOut > first.amountIn ? last.minAmountOut - first.amountIn : 0n;
      to = context.executorContract;
      data = encodeFunctionData({
        abi: EXECUTOR_ABI,
        functionName: 'executePath',
        args: [
          legs.map((leg) => ({
            pool: leg.poolAddress,
            tokenIn: leg.tokenIn,
            tokenOut: leg.tokenOut,
            amountIn: leg.amountIn,
            minAmountOut: leg.minAmountOut,
          })),
          minProfit,
          context.deadline,
        ],
      });
      break;
    }
  }

  return {
    success: true,
    intent: {
      intentId: context.intentId,
      opportunityId: opportunity.id,
      resourceKey: opportunity.resourceKey,
      chainId: context.chainId,
      from: context.wallet,
      to,
      data,
      value: 0n,
      slippageBps: opportunity.inputs.slippageBps,
      minAmountOut: last.minAmountOut,
      deadline: context.deadline,
      maxFeePerGas: context.maxFeePerGas,
    },
  };
}
