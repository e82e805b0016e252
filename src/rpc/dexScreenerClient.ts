import { z } from "zod";
import { logger } from "../utils/logger.js";

const DEXSCREENER_BASE = "https://api.dexscreener.com";

const txnWindowSchema = z.object({ buys: z.number().default(0), sells: z.number().default(0) });

export const dexPairSchema = z.object({
  chainId: z.string(),
  pairAddress: z.string(),
  baseToken: z.object({
    address: z.string(),
    symbol: z.string().default("UNKNOWN")
  }),
  priceUsd: z.coerce.number().optional(),
  liquidity: z.object({ usd: z.number().default(0) }).optional(),
  fdv: z.number().optional(),
  pairCreatedAt: z.number().optional(),
  txns: z.object({ m5: txnWindowSchema.optional() }).optional(),
  volume: z.object({ m5: z.number().optional() }).optional(),
  priceChange: z.object({ m5: z.number().optional() }).optional()
});

export type DexPair = z.infer<typeof dexPairSchema>;

const pairsResponseSchema = z.object({
  pairs: z.array(dexPairSchema).nullable().default([])
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class DexScreenerClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(baseUrl = DEXSCREENER_BASE, fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl;
    this.fetchImpl = fetchImpl;
  }

  async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
      headers: { accept: "application/json" }
    });
    if (!response.ok) {
      throw new Error(`DexScreener error ${response.status} for ${endpoint}`);
    }
    const body: unknown = await response.json();
    return schema.parse(body);
  }

  async getPair(chainId: string, pairAddress: string): Promise<DexPair | null> {
    const endpoint = `/latest/dex/pairs/${encodeURIComponent(chainId)}/${encodeURIComponent(pairAddress)}`;
    try {
      const body = await this.request(endpoint, pairsResponseSchema);
      return body.pairs?.[0] ?? null;
    } catch (err) {
      logger.warn({ err, chainId, pairAddress }, "DexScreener pair lookup failed");
      return null;
    }
  }

  async searchPairs(query: string): Promise<DexPair[]> {
    try {
      const body = await this.request(`/latest/dex/search?q=${encodeURIComponent(query)}`, pairsResponseSchema);
      return body.pairs ?? [];
    } catch (err) {
      logger.warn({ err, query }, "DexScreener search failed");
      return [];
    }
  }
}
