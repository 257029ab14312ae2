/**
 * Gas Estimation Service
 * Tracks the network gas price (EIP-1559 base + median priority fee) and prices
 * execution legs in quote-token units for the detectors
 */

import { createPublicClient, formatUnits, http, parseGwei } from 'viem';
import { config } from '../config/env.js';
import { structuredLogger } from './logger.js';

interface GasPriceHistory {
  timestamp: number;
  baseFee: bigint;
  priorityFee: bigint;
}

export interface GasEstimatorOptions {
  rpcUrl: string;
  unitsPerLeg: number;
  gasPriceGwei: number;
  nativePriceQuote: number;
}

export class GasEstimatorService {
  private client: ReturnType<typeof createPublicClient> | null = null;
  private priceHistory: GasPriceHistory[] = [];
  private maxHistorySize = 100;

  private baseFee: bigint;
  private priorityFee = 0n;
  private nativePriceQuote: number;

  constructor(private readonly options: GasEstimatorOptions) {
    this.baseFee = parseGwei(options.gasPriceGwei.toString());
    this.nativePriceQuote = options.nativePriceQuote;
  }

  private getClient() {
    if (!this.client) {
      this.client = createPublicClient({ transport: http(this.options.rpcUrl) });
    }
    return this.client;
  }

  /**
   * Pull current gas prices from the network; falls back to legacy gas price
   */
  async refresh(): Promise<bigint> {
    const client = this.getClient();

    try {
      const block = await client.getBlock({ blockTag: 'latest' });
      const feeHistory = await client.getFeeHistory({ blockCount: 10, rewardPercentiles: [25, 50, 75] });

      const priorityFees = feeHistory.reward
        ?.map((r) => r[1])
        .filter((f): f is bigint => f !== undefined) ?? [];

      const medianPriorityFee = priorityFees.length > 0
        ? priorityFees.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))[Math.floor(priorityFees.length / 2)]
        : parseGwei('2');

      this.setGasPrice(block.baseFeePerGas ?? 0n, medianPriorityFee);
    } catch (error) {
      structuredLogger.debug('execution', 'Fee history unavailable, using legacy gas price', {
        error: error instanceof Error ? error.message : String(error),
      });
      this.setGasPrice(await client.getGasPrice(), 0n);
    }

    return this.getGasPrice();
  }

  setGasPrice(baseFee: bigint, priorityFee: bigint): void {
    this.baseFee = baseFee;
    this.priorityFee = priorityFee;
    this.priceHistory.push({ timestamp: Date.now(), baseFee, priorityFee });
    if (this.priceHistory.length > this.maxHistorySize) {
      this.priceHistory = this.priceHistory.slice(-this.maxHistorySize);
    }
  }

  getGasPrice(): bigint {
    return this.baseFee + this.priorityFee;
  }

  getGasPriceGwei(): number {
    return Number(formatUnits(this.getGasPrice(), 9));
  }

  /**
   * Fee cap for a transaction: 2x base fee plus priority with 20% buffer
   */
  getMaxFeePerGas(): bigint {
    return this.baseFee * 2n + (this.priorityFee * 120n) / 100n;
  }

  /**
   * Gas cost in quote units for a path with the given number of legs
   */
  estimateCostQuote(legCount: number): number {
    const units = BigInt(this.options.unitsPerLeg * Math.max(1, legCount));
    return Number(formatUnits(units * this.getGasPrice(), 18)) * this.nativePriceQuote;
  }

  isGasFavorable(maxGasGwei: number): boolean {
    return this.getGasPrice() <= parseGwei(maxGasGwei.toString());
  }

  getGasTrend(): 'rising' | 'falling' | 'stable' {
    const recent = this.priceHistory.slice(-5);
    const older = this.priceHistory.slice(-10, -5);
    if (recent.length < 5 || older.length === 0) return 'stable';

    const recentAvg = recent.reduce((sum, h) => sum + Number(h.baseFee), 0) / recent.length;
    const olderAvg = older.reduce((sum, h) => sum + Number(h.baseFee), 0) / older.length;
    if (olderAvg === 0) return 'stable';

    const changePercent = ((recentAvg - olderAvg) / olderAvg) * 100;
    if (changePercent > 10) return 'rising';
    if (changePercent < -10) return 'falling';
    return 'stable';
  }

  /**
   * Update the native token price used to convert gas into quote units
   */
  setNativePrice(priceQuote: number): void {
    this.nativePriceQuote = priceQuote;
  }
}

export const gasEstimatorService = new GasEstimatorService({
  rpcUrl: config.chain.rpcUrl,
  unitsPerLeg: config.gas.unitsPerLeg,
  gasPriceGwei: config.gas.gasPriceGwei,
  nativePriceQuote: config.gas.nativePriceQuote,
});
