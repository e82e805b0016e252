import { PriceSource } from "../core/collaborators.js";
import { DexScreenerClient } from "../rpc/dexScreenerClient.js";
import { logger } from "../utils/logger.js";

interface CacheEntry {
  price: number;
  expiresAt: number;
}

export class PriceOracle implements PriceSource {
  private readonly client: DexScreenerClient;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly clock: () => number;

  constructor(client: DexScreenerClient, ttlMs = 5_000, clock: () => number = Date.now) {
    this.client = client;
    this.ttlMs = ttlMs;
    this.clock = clock;
  }

  async getPrice(pairAddress: string, chainId: string): Promise<number | null> {
    const key = `${chainId}:${pairAddress}`;
    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > this.clock()) {
      return cached.price;
    }

    const pair = await this.client.getPair(chainId, pairAddress);
    const price = pair?.priceUsd;
    if (price === undefined || !(price > 0)) {
      logger.warn({ pairAddress, chainId }, "No price available");
      return null;
    }

    this.cache.set(key, { price, expiresAt: this.clock() + this.ttlMs });
    return price;
  }
}
