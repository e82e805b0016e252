import { describe, it, expect, vi } from "vitest";
import { MarketObserver, summarizeObservations } from "../marketObserver.js";
import { ObservationSnapshot } from "../../core/types.js";
import { DexScreenerClient } from "../../rpc/dexScreenerClient.js";
import { makeConfig } from "./fixtures.js";

vi.mock("../../utils/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const snapshot = (priceUsd: number, liquidityUsd = 1_000, buys5m = 10, sells5m = 10): ObservationSnapshot => ({
  timestamp: 0,
  priceUsd,
  liquidityUsd,
  buys5m,
  sells5m
});

const pairBody = (priceUsd: string) => ({
  pairs: [
    {
      chainId: "solana",
      pairAddress: "PAIR_A",
      baseToken: { address: "TOKEN_A", symbol: "AAA" },
      priceUsd,
      liquidity: { usd: 1_000 },
      txns: { m5: { buys: 5, sells: 5 } }
    }
  ]
});

describe("summarizeObservations", () => {
  it("returns null without samples", () => {
    expect(summarizeObservations([])).toBeNull();
  });

  it("measures trend, volatility and liquidity drift across the window", () => {
    const summary = summarizeObservations([snapshot(1), snapshot(1.1), snapshot(1.2, 900, 30, 10)]);

    expect(summary?.priceTrend).toBe("uptrend");
    expect(summary?.priceChangePct).toBeCloseTo(20);
    expect(summary?.volatility).toBeCloseTo(0.1);
    expect(summary?.liquidityChangePct).toBeCloseTo(-10);
    expect(summary?.buySellRatio).toBe(3);
    expect(summary?.buys5m).toBe(30);
    expect(summary?.activityLevel).toBe("low");
    expect(summary?.samples).toBe(3);
  });

  it("calls small moves stable and large drops a downtrend", () => {
    expect(summarizeObservations([snapshot(1), snapshot(1.01)])?.priceTrend).toBe("stable");
    expect(summarizeObservations([snapshot(1), snapshot(0.5)])?.priceTrend).toBe("downtrend");
  });

  it("reports high activity when the price keeps moving", () => {
    const summary = summarizeObservations([snapshot(1), snapshot(1.01), snapshot(1.02), snapshot(1.015)]);

    expect(summary?.activityLevel).toBe("high");
  });
});

describe("MarketObserver", () => {
  it("polls once per interval and waits between polls", async () => {
    const prices = ["1.0", "1.5", "2.0"];
    let call = 0;
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => {
      const price = prices[call] ?? "2.0";
      call += 1;
      return new Response(JSON.stringify(pairBody(price)), { status: 200 });
    });
    const waits: number[] = [];
    const observer = new MarketObserver(
      makeConfig({ observation: { durationSeconds: 30, pollIntervalSeconds: 10 } }).observation,
      new DexScreenerClient("https://dex.test", fetchImpl),
      async (ms) => {
        waits.push(ms);
      }
    );

    const summary = await observer.observe("PAIR_A", "solana");

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://dex.test/latest/dex/pairs/solana/PAIR_A");
    expect(waits).toEqual([10_000, 10_000]);
    expect(summary?.samples).toBe(3);
    expect(summary?.priceChangePct).toBe(100);
    expect(summary?.priceTrend).toBe("uptrend");
  });

  it("returns null when no poll produced a price", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response("down", { status: 502 }));
    const observer = new MarketObserver(
      makeConfig({ observation: { durationSeconds: 20, pollIntervalSeconds: 10 } }).observation,
      new DexScreenerClient("https://dex.test", fetchImpl),
      async () => {}
    );

    await expect(observer.observe("PAIR_A", "solana")).resolves.toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
