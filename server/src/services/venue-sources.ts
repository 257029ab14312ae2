/**
 * Raw venue sources
 * ChainVenueSource watches an AMM factory and its pairs over a viem WebSocket client;
 * RelayVenueSource consumes a JSON event relay (used for lending-position feeds)
 */

import { createPublicClient, erc20Abi, parseAbi, parseAbiItem, webSocket, type Address } from 'viem';
import WebSocket from 'ws';
import { z } from 'zod';
import { structuredLogger } from './logger.js';
import { fetchWithTimeout } from '../utils/async.js';
import { toError } from '../utils/errors.js';
import {
  rawSnapshotSchema,
  type RawSnapshot,
  type RawSourceHandlers,
  type RawVenueSource,
} from './venue-feed.js';
import type { PoolStatePayload, VenueId } from '../../../shared/schema.js';

const pairCreatedEvent = parseAbiItem(
  'event PairCreated(address indexed token0, address indexed token1, address pair, uint256)'
);
const syncEvent = parseAbiItem('event Sync(uint112 reserve0, uint112 reserve1)');
const pairAbi = parseAbi([
  'function token0() view returns (address)',
  'function token1() view returns (address)',
  'function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
]);

function createChainClient(wsUrl: string) {
  return createPublicClient({ transport: webSocket(wsUrl) });
}

type ChainClient = ReturnType<typeof createChainClient>;

interface PoolMeta {
  poolAddress: Address;
  token0: Address;
  token1: Address;
  decimals0: number;
  decimals1: number;
  reserve0: bigint;
  reserve1: bigint;
}

export interface ChainVenueSourceOptions {
  venueId: VenueId;
  wsUrl: string;
  factory?: Address;
  pools: Address[];
  quoteTokens: Address[];
}

export class ChainVenueSource implements RawVenueSource {
  readonly venueId: VenueId;

  private client: ChainClient | null = null;
  private unwatchers: Array<() => void> = [];
  private readonly pools = new Map<string, PoolMeta>();
  private readonly quoteTokens: Set<string>;
  private sequence = 0;

  constructor(private readonly options: ChainVenueSourceOptions) {
    this.venueId = options.venueId;
    this.quoteTokens = new Set(options.quoteTokens.map((t) => t.toLowerCase()));
  }

  async connect(handlers: RawSourceHandlers): Promise<void> {
    const client = createChainClient(this.options.wsUrl);
    await client.getBlockNumber();
    this.client = client;

    for (const pool of this.options.pools) {
      if (!this.pools.has(pool.toLowerCase())) {
        await this.loadPool(client, pool);
      }
    }

    const onError = (error: Error) => handlers.onDisconnect(error);

    this.unwatchers.push(
      client.watchBlockNumber({
        onBlockNumber: () => handlers.onHeartbeat(),
        onError,
      })
    );

    if (this.options.factory) {
      this.unwatchers.push(
        client.watchEvent({
          address: this.options.factory,
          event: pairCreatedEvent,
          onLogs: (logs) => {
            for (const log of logs) {
              if (!log.args.pair) continue;
              this.handlePairCreated(client, log.args.pair, handlers).catch((error) => {
                structuredLogger.warning('feed', 'Failed to load created pair', {
                  venueId: this.venueId,
                  pair: log.args.pair,
                  error: toError(error).message,
                });
              });
            }
          },
          onError,
        })
      );
    }

    this.unwatchers.push(
      client.watchEvent({
        event: syncEvent,
        onLogs: (logs) => {
          for (const log of logs) {
            const { reserve0, reserve1 } = log.args;
            if (reserve0 === undefined || reserve1 === undefined) continue;
            this.handleSync(log.address, reserve0, reserve1, handlers);
          }
        },
        onError,
      })
    );
  }

  async disconnect(): Promise<void> {
    for (const unwatch of this.unwatchers) {
      unwatch();
    }
    this.unwatchers = [];
    this.client = null;
  }

  async fetchSnapshot(): Promise<RawSnapshot> {
    const client = this.client;
    if (!client) {
      throw new Error(`${this.venueId} is not connected`);
    }

    const sequenceNo = this.sequence;
    const pools: PoolStatePayload[] = await Promise.all(
      Array.from(this.pools.values()).map(async (meta) => {
        const [reserve0, reserve1] = await client.readContract({
          address: meta.poolAddress,
          abi: pairAbi,
          functionName: 'getReserves',
        });
        meta.reserve0 = reserve0;
        meta.reserve1 = reserve1;
        return { ...meta };
      })
    );

    return { sequenceNo, pools, positions: [] };
  }

  async probe(): Promise<boolean> {
    try {
      await createChainClient(this.options.wsUrl).getBlockNumber();
      return true;
    } catch {
      return false;
    }
  }

  private async loadPool(client: ChainClient, poolAddress: Address): Promise<PoolMeta> {
    const [token0, token1, reserves] = await Promise.all([
      client.readContract({ address: poolAddress, abi: pairAbi, functionName: 'token0' }),
      client.readContract({ address: poolAddress, abi: pairAbi, functionName: 'token1' }),
      client.readContract({ address: poolAddress, abi: pairAbi, functionName: 'getReserves' }),
    ]);
    const [decimals0, decimals1] = await Promise.all([
      client.readContract({ address: token0, abi: erc20Abi, functionName: 'decimals' }),
      client.readContract({ address: token1, abi: erc20Abi, functionName: 'decimals' }),
    ]);

    const meta: PoolMeta = {
      poolAddress,
      token0,
      token1,
      decimals0,
      decimals1,
      reserve0: reserves[0],
      reserve1: reserves[1],
    };
    this.pools.set(poolAddress.toLowerCase(), meta);
    return meta;
  }

  private async handlePairCreated(client: ChainClient, pair: Address, handlers: RawSourceHandlers): Promise<void> {
    const meta = await this.loadPool(client, pair);
    handlers.onEvent({
      name: 'PairCreated',
      sequenceNo: ++this.sequence,
      args: { ...meta, factory: this.options.factory },
    });
  }

  /**
   * Sync carries absolute reserves; direction and kind come from the reserve change
   */
  private handleSync(poolAddress: Address, reserve0: bigint, reserve1: bigint, handlers: RawSourceHandlers): void {
    const meta = this.pools.get(poolAddress.toLowerCase());
    if (!meta) return;

    const d0 = reserve0 - meta.reserve0;
    const d1 = reserve1 - meta.reserve1;
    meta.reserve0 = reserve0;
    meta.reserve1 = reserve1;

    const state = {
      poolAddress: meta.poolAddress,
      token0: meta.token0,
      token1: meta.token1,
      decimals0: meta.decimals0,
      decimals1: meta.decimals1,
      reserve0: reserve0.toString(),
      reserve1: reserve1.toString(),
    };

    // both sides moving together is a liquidity change
    if ((d0 > 0n && d1 > 0n) || (d0 < 0n && d1 < 0n)) {
      handlers.onEvent({ name: d0 > 0n ? 'Mint' : 'Burn', sequenceNo: ++this.sequence, args: state });
      return;
    }

    const quoteIsToken0 = this.quoteTokens.has(meta.token0.toLowerCase());
    const quoteDelta = quoteIsToken0 ? d0 : d1;
    const quoteDecimals = quoteIsToken0 ? meta.decimals0 : meta.decimals1;
    const absDelta = quoteDelta < 0n ? -quoteDelta : quoteDelta;

    handlers.onEvent({
      name: 'Sync',
      sequenceNo: ++this.sequence,
      args: {
        ...state,
        buysToken0: d0 < 0n,
        volumeQuote: Number(absDelta) / 10 ** quoteDecimals,
      },
    });
  }
}

const relayMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('event'),
    name: z.string(),
    sequenceNo: z.number().int().nonnegative(),
    args: z.record(z.unknown()),
    observedAt: z.number().optional(),
  }),
  z.object({ type: z.literal('heartbeat') }),
]);

export interface RelayVenueSourceOptions {
  venueId: VenueId;
  wsUrl: string;
  snapshotUrl: string;
  requestTimeoutMs: number;
}

export class RelayVenueSource implements RawVenueSource {
  readonly venueId: VenueId;
  private socket: WebSocket | null = null;

  constructor(private readonly options: RelayVenueSourceOptions) {
    this.venueId = options.venueId;
  }

  connect(handlers: RawSourceHandlers): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.options.wsUrl);
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.socket = socket;
        resolve();
      });

      socket.on('message', (data) => {
        this.handleMessage(data.toString(), handlers);
      });

      socket.on('error', (error) => {
        if (!opened) {
          reject(error);
        }
      });

      socket.on('close', () => {
        if (!opened) return;
        // only report closes of the live socket; disconnect() clears it first
        if (this.socket === socket) {
          this.socket = null;
          handlers.onDisconnect(new Error(`relay ${this.venueId} closed`));
        }
      });
    });
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  async fetchSnapshot(): Promise<RawSnapshot> {
    const response = await fetchWithTimeout(this.options.snapshotUrl, { method: 'GET' }, this.options.requestTimeoutMs);
    if (!response.ok) {
      throw new Error(`snapshot request failed with ${response.status}`);
    }
    return rawSnapshotSchema.parse(await response.json());
  }

  async probe(): Promise<boolean> {
    try {
      const response = await fetchWithTimeout(this.options.snapshotUrl, { method: 'GET' }, this.options.requestTimeoutMs);
      return response.ok;
    } catch {
      return false;
    }
  }

  private handleMessage(text: string, handlers: RawSourceHandlers): void {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      structuredLogger.warning('feed', 'Relay sent invalid JSON', { venueId: this.venueId, error: toError(error).message });
      return;
    }

    const parsed = relayMessageSchema.safeParse(json);
    if (!parsed.success) {
      structuredLogger.warning('feed', 'Relay sent unknown message', { venueId: this.venueId });
      return;
    }

    if (parsed.data.type === 'heartbeat') {
      handlers.onHeartbeat();
      return;
    }

    const { name, sequenceNo, args, observedAt } = parsed.data;
    handlers.onEvent({ name, sequenceNo, args, observedAt });
  }
}
