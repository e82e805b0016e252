import { describe, it, expect, vi } from "vitest";
import { PriceOracle } from "../priceOracle.js";
import { DexScreenerClient } from "../../rpc/dexScreenerClient.js";

vi.mock("../../utils/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const body = (priceUsd?: string) =>
  JSON.stringify({
    pairs: [{ chainId: "solana", pairAddress: "PAIR_A", baseToken: { address: "TOKEN_A" }, priceUsd }]
  });

describe("PriceOracle", () => {
  it("serves a cached price until the TTL runs out", async () => {
    let now = 0;
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(body("0.002"), { status: 200 }));
    const oracle = new PriceOracle(new DexScreenerClient("https://dex.test", fetchImpl), 5_000, () => now);

    expect(await oracle.getPrice("PAIR_A", "solana")).toBe(0.002);
    now = 4_999;
    expect(await oracle.getPrice("PAIR_A", "solana")).toBe(0.002);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    now = 5_000;
    await oracle.getPrice("PAIR_A", "solana");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("returns null when the pair has no price", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(body(), { status: 200 }));
    const oracle = new PriceOracle(new DexScreenerClient("https://dex.test", fetchImpl));

    expect(await oracle.getPrice("PAIR_A", "solana")).toBeNull();
  });

  it("returns null when the lookup fails", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response("", { status: 500 }));
    const oracle = new PriceOracle(new DexScreenerClient("https://dex.test", fetchImpl));

    expect(await oracle.getPrice("PAIR_A", "solana")).toBeNull();
  });
});
