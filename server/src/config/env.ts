/**
 * Environment Configuration
 * Validates and exports all environment variables
 */

import { z } from 'zod';
import { getAddress } from 'viem';
import * as dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000'),
  LOG_ENDPOINT: z.string().url().optional(),
  LOG_API_KEY: z.string().optional(),

  // Database (optional: history is kept in memory when unset)
  DATABASE_URL: z.string().optional(),

  // Venues
  VENUES_CONFIG_PATH: z.string().default('config/venues.json'),
  CHAIN_ID: z.string().default('1'),
  RPC_URL: z.string().default('http://127.0.0.1:8545'),

  // Signing collaborator
  EXECUTOR_WALLET: z
    .string()
    .regex(/^0x[a-fA-F0-9]{40}$/, 'EXECUTOR_WALLET must be an address')
    .default('0x0000000000000000000000000000000000000001'),
  EXECUTOR_CONTRACT: z
    .string()
    .regex(/^0x[a-fA-F0-9]{40}$/, 'EXECUTOR_CONTRACT must be an address')
    .default('0x0000000000000000000000000000000000000002'),
  SIGNER_URL: z.string().default('http://127.0.0.1:8600'),
  SIGNER_API_KEY: z.string().optional(),
  EXECUTION_TIMEOUT_MS: z.string().default('15000'),
  RECONCILE_INTERVAL_MS: z.string().default('5000'),
  MAX_GAS_PRICE_GWEI: z.string().default('50'),
  AUTO_EXECUTE: z.string().default('false'),

  // Token inspection
  EXPLORER_API_URL: z.string().optional(),
  EXPLORER_API_KEY: z.string().optional(),

  // Feed
  RECONNECT_BASE_DELAY_MS: z.string().default('500'),
  RECONNECT_MAX_DELAY_MS: z.string().default('30000'),
  RECONNECT_BUDGET: z.string().default('5'),
  STALL_TIMEOUT_MS: z.string().default('30000'),
  RESYNC_TIMEOUT_MS: z.string().default('10000'),
  HEALTH_PROBE_INTERVAL_MS: z.string().default('15000'),

  // Detection
  MIN_PROFIT_BPS: z.string().default('50'),
  MIN_PRICE_MOVE_BPS: z.string().default('5'),
  MIN_CONFIDENCE: z.string().default('40'),
  ARB_MAX_TRADE_SIZE: z.string().default('1000'),
  ARB_DEPTH_FRACTION: z.string().default('0.01'),
  SNIPE_RISK_BUDGET: z.string().default('0.5'),
  SNIPE_EXPECTED_RETURN: z.string().default('0.5'),
  MIN_LIQUIDITY: z.string().default('1'),
  LIQUIDATION_HEALTH_THRESHOLD: z.string().default('1'),
  DEFAULT_SLIPPAGE_BPS: z.string().default('200'),
  MAX_SLIPPAGE_BPS: z.string().default('1000'),
  ARB_TTL_MS: z.string().default('3000'),
  SNIPE_TTL_MS: z.string().default('10000'),
  LIQUIDATION_TTL_MS: z.string().default('6000'),
  GAS_UNITS_PER_LEG: z.string().default('150000'),
  GAS_PRICE_GWEI: z.string().default('20'),
  NATIVE_PRICE_QUOTE: z.string().default('1'),

  // Risk
  MAX_RISK_SCORE: z.string().default('50'),
  RISK_EVALUATION_TIMEOUT_MS: z.string().default('1500'),
  EXECUTION_LATENCY_BUDGET_MS: z.string().default('500'),
  HONEYPOT_MAX_LOSS: z.string().default('0.1'),
  MAX_HOLDER_CONCENTRATION: z.string().default('0.5'),
});

// Parse and validate environment
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

// Export typed config object
export const config = {
  server: {
    nodeEnv: env.NODE_ENV,
    port: parseInt(env.PORT, 10),
    logEndpoint: env.LOG_ENDPOINT,
    logApiKey: env.LOG_API_KEY,
  },
  database: {
    url: env.DATABASE_URL,
  },
  chain: {
    id: parseInt(env.CHAIN_ID, 10),
    rpcUrl: env.RPC_URL,
  },
  venues: {
    configPath: env.VENUES_CONFIG_PATH,
  },
  feed: {
    reconnectBaseDelayMs: parseInt(env.RECONNECT_BASE_DELAY_MS, 10),
    reconnectMaxDelayMs: parseInt(env.RECONNECT_MAX_DELAY_MS, 10),
    reconnectBudget: parseInt(env.RECONNECT_BUDGET, 10),
    stallTimeoutMs: parseInt(env.STALL_TIMEOUT_MS, 10),
    resyncTimeoutMs: parseInt(env.RESYNC_TIMEOUT_MS, 10),
    healthProbeIntervalMs: parseInt(env.HEALTH_PROBE_INTERVAL_MS, 10),
  },
  detection: {
    minProfitBps: parseFloat(env.MIN_PROFIT_BPS),
    minPriceMoveBps: parseFloat(env.MIN_PRICE_MOVE_BPS),
    minConfidence: parseFloat(env.MIN_CONFIDENCE),
    arbMaxTradeSize: parseFloat(env.ARB_MAX_TRADE_SIZE),
    arbDepthFraction: parseFloat(env.ARB_DEPTH_FRACTION),
    snipeRiskBudget: parseFloat(env.SNIPE_RISK_BUDGET),
    snipeExpectedReturn: parseFloat(env.SNIPE_EXPECTED_RETURN),
    minLiquidity: parseFloat(env.MIN_LIQUIDITY),
    liquidationHealthThreshold: parseFloat(env.LIQUIDATION_HEALTH_THRESHOLD),
    defaultSlippageBps: parseInt(env.DEFAULT_SLIPPAGE_BPS, 10),
    maxSlippageBps: parseInt(env.MAX_SLIPPAGE_BPS, 10),
    ttlMs: {
      arbitrage: parseInt(env.ARB_TTL_MS, 10),
      snipe: parseInt(env.SNIPE_TTL_MS, 10),
      liquidation: parseInt(env.LIQUIDATION_TTL_MS, 10),
    },
  },
  gas: {
    unitsPerLeg: parseInt(env.GAS_UNITS_PER_LEG, 10),
    gasPriceGwei: parseFloat(env.GAS_PRICE_GWEI),
    nativePriceQuote: parseFloat(env.NATIVE_PRICE_QUOTE),
  },
  risk: {
    maxRiskScore: parseFloat(env.MAX_RISK_SCORE),
    evaluationTimeoutMs: parseInt(env.RISK_EVALUATION_TIMEOUT_MS, 10),
    executionLatencyBudgetMs: parseInt(env.EXECUTION_LATENCY_BUDGET_MS, 10),
    honeypotMaxLoss: parseFloat(env.HONEYPOT_MAX_LOSS),
    maxHolderConcentration: parseFloat(env.MAX_HOLDER_CONCENTRATION),
    explorerApiUrl: env.EXPLORER_API_URL,
    explorerApiKey: env.EXPLORER_API_KEY,
  },
  executor: {
    wallet: getAddress(env.EXECUTOR_WALLET),
    contract: getAddress(env.EXECUTOR_CONTRACT),
    signerUrl: env.SIGNER_URL,
    signerApiKey: env.SIGNER_API_KEY,
    executionTimeoutMs: parseInt(env.EXECUTION_TIMEOUT_MS, 10),
    reconcileIntervalMs: parseInt(env.RECONCILE_INTERVAL_MS, 10),
    maxGasPriceGwei: parseFloat(env.MAX_GAS_PRICE_GWEI),
    autoExecute: env.AUTO_EXECUTE === 'true',
  },
} as const;
