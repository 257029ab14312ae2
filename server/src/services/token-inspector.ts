/**
 * Token Inspector
 * Honeypot round-trip simulation through the venue router, and contract verification
 * and holder concentration from a block-explorer API
 */

import { createPublicClient, erc20Abi, http, parseAbi, parseUnits, type Address } from 'viem';
import { z } from 'zod';
import { structuredLogger } from './logger.js';
import { fetchWithTimeout } from '../utils/async.js';
import { toError } from '../utils/errors.js';

export interface RoundTripResult {
  honeypot: boolean;
  /** fraction of the probe lost buying then selling; null when the round trip failed */
  loss: number | null;
  reason: string;
}

export interface ContractInfo {
  /** null when the explorer could not tell */
  verified: boolean | null;
  /** largest holder's share of supply, 0..1 */
  topHolderShare: number | null;
  holderCount: number | null;
}

export interface TokenInspector {
  simulateRoundTrip(token: Address): Promise<RoundTripResult>;
  getContractInfo(token: Address): Promise<ContractInfo>;
}

const routerAbi = parseAbi([
  'function getAmountsOut(uint256 amountIn, address[] path) view returns (uint256[] amounts)',
]);

const sourceCodeSchema = z.object({
  status: z.string(),
  result: z.array(z.object({ SourceCode: z.string() })),
});

const holderCountSchema = z.object({
  status: z.string(),
  result: z.string().regex(/^\d+$/),
});

const holderListSchema = z.object({
  status: z.string(),
  result: z.array(z.object({ TokenHolderQuantity: z.string().regex(/^\d+$/) })),
});

export interface ChainTokenInspectorOptions {
  rpcUrl: string;
  router: Address;
  quoteToken: Address;
  quoteDecimals: number;
  /** probe size in whole quote units */
  probeAmount: number;
  maxLoss: number;
  explorerApiUrl?: string;
  explorerApiKey?: string;
  requestTimeoutMs: number;
}

export class ChainTokenInspector implements TokenInspector {
  private readonly client;

  constructor(private readonly options: ChainTokenInspectorOptions) {
    this.client = createPublicClient({ transport: http(options.rpcUrl) });
  }

  /**
   * Quote a buy then a sell of the proceeds; any failure counts as unsellable
   */
  async simulateRoundTrip(token: Address): Promise<RoundTripResult> {
    const { router, quoteToken } = this.options;
    const probe = parseUnits(this.options.probeAmount.toString(), this.options.quoteDecimals);

    try {
      const bought = await this.client.readContract({
        address: router,
        abi: routerAbi,
        functionName: 'getAmountsOut',
        args: [probe, [quoteToken, token]],
      });
      const tokensReceived = bought[bought.length - 1] ?? 0n;
      if (tokensReceived === 0n) {
        return { honeypot: true, loss: null, reason: 'Cannot simulate buy' };
      }

      const sold = await this.client.readContract({
        address: router,
        abi: routerAbi,
        functionName: 'getAmountsOut',
        args: [tokensReceived, [token, quoteToken]],
      });
      const quoteBack = sold[sold.length - 1] ?? 0n;

      const loss = Number(probe - quoteBack) / Number(probe);
      const honeypot = loss > this.options.maxLoss;
      return { honeypot, loss, reason: honeypot ? 'High round-trip loss' : 'Normal behavior' };
    } catch (error) {
      structuredLogger.warning('risk', 'Round-trip simulation failed', { token, error: toError(error).message });
      return { honeypot: true, loss: null, reason: 'Simulation error' };
    }
  }

  async getContractInfo(token: Address): Promise<ContractInfo> {
    const { explorerApiUrl, explorerApiKey } = this.options;
    if (!explorerApiUrl) {
      return { verified: null, topHolderShare: null, holderCount: null };
    }

    const [verified, topHolderShare, holderCount] = await Promise.all([
      this.fetchVerified(explorerApiUrl, token, explorerApiKey),
      this.fetchTopHolderShare(explorerApiUrl, token, explorerApiKey),
      this.fetchHolderCount(explorerApiUrl, token, explorerApiKey),
    ]);
    return { verified, topHolderShare, holderCount };
  }

  private async fetchHolderCount(baseUrl: string, token: Address, apiKey?: string): Promise<number | null> {
    const url = new URL(baseUrl);
    url.searchParams.set('module', 'token');
    url.searchParams.set('action', 'tokenholdercount');
    url.searchParams.set('contractaddress', token);
    if (apiKey) url.searchParams.set('apikey', apiKey);

    const response = await fetchWithTimeout(url.toString(), { method: 'GET' }, this.options.requestTimeoutMs);
    if (!response.ok) return null;

    const parsed = holderCountSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.status !== '1') return null;
    return Number(parsed.data.result);
  }

  private async fetchVerified(baseUrl: string, token: Address, apiKey?: string): Promise<boolean | null> {
    const url = new URL(baseUrl);
    url.searchParams.set('module', 'contract');
    url.searchParams.set('action', 'getsourcecode');
    url.searchParams.set('address', token);
    if (apiKey) url.searchParams.set('apikey', apiKey);

    const response = await fetchWithTimeout(url.toString(), { method: 'GET' }, this.options.requestTimeoutMs);
    if (!response.ok) return null;

    const parsed = sourceCodeSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.status !== '1') return null;
    return parsed.data.result.some((entry) => entry.SourceCode.length > 0);
  }

  private async fetchTopHolderShare(baseUrl: string, token: Address, apiKey?: string): Promise<number | null> {
    const url = new URL(baseUrl);
    url.searchParams.set('module', 'token');
    url.searchParams.set('action', 'tokenholderlist');
    url.searchParams.set('contractaddress', token);
    url.searchParams.set('page', '1');
    url.searchParams.set('offset', '10');
    if (apiKey) url.searchParams.set('apikey', apiKey);

    const [response, totalSupply] = await Promise.all([
      fetchWithTimeout(url.toString(), { method: 'GET' }, this.options.requestTimeoutMs),
      this.client.readContract({ address: token, abi: erc20Abi, functionName: 'totalSupply' }),
    ]);
    if (!response.ok || totalSupply === 0n) return null;

    const parsed = holderListSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.status !== '1') return null;

    let top = 0n;
    for (const holder of parsed.data.result) {
      const quantity = BigInt(holder.TokenHolderQuantity);
      if (quantity > top) top = quantity;
    }
    return Number((top * 10000n) / totalSupply) / 10000;
  }
}
