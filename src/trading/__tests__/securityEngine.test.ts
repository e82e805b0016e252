import { describe, it, expect, vi } from "vitest";
import { normalizeSecurity, SecurityEngine } from "../securityEngine.js";
import { makeConfig } from "./fixtures.js";

vi.mock("../../utils/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

const evmEntry = {
  is_honeypot: "0",
  buy_tax: "0.05",
  sell_tax: "0.1",
  is_mintable: "0",
  is_blacklisted: "1",
  is_open_source: "1",
  owner_address: "0xowner",
  can_take_back_ownership: "1",
  holder_count: "120",
  holders: [{ address: "0xholder", percent: "0.12" }]
};

const solanaEntry = {
  non_transferable: "0",
  mintable: { status: "1" },
  freezable: { status: "0" },
  holder_count: 300,
  holders: [{ account: "HOLDER_1", percent: "0.05" }]
};

const securityConfig = makeConfig({ security: { retryDelayMs: 10 } }).security;

describe("normalizeSecurity", () => {
  it("converts EVM fractions to percentages", () => {
    const profile = normalizeSecurity({
      kind: "evm",
      data: {
        is_honeypot: "0",
        buy_tax: 0.05,
        sell_tax: 0.1,
        is_mintable: "0",
        is_blacklisted: "1",
        is_open_source: "1",
        owner_address: "0xowner",
        can_take_back_ownership: "1",
        holder_count: 120,
        holders: [{ address: "0xholder", percent: 0.12 }]
      }
    });

    expect(profile.buyTaxPct).toBeCloseTo(5);
    expect(profile.sellTaxPct).toBeCloseTo(10);
    expect(profile.isBlacklisted).toBe(true);
    expect(profile.isOpenSource).toBe(true);
    expect(profile.ownerAddress).toBe("0xowner");
    expect(profile.canTakeBackOwnership).toBe(true);
    expect(profile.holders[0]?.percent).toBeCloseTo(12);
  });

  it("treats SPL tokens as verified and tax-free", () => {
    const profile = normalizeSecurity({
      kind: "solana",
      data: {
        non_transferable: "1",
        mintable: { status: "0" },
        freezable: { status: "1" },
        holder_count: 40,
        holders: [{ address: "HOLDER_9", percent: 0.3 }]
      }
    });

    expect(profile).toMatchObject({
      isHoneypot: true,
      isMintable: false,
      isBlacklisted: true,
      isOpenSource: true,
      buyTaxPct: 0,
      sellTaxPct: 0,
      ownerAddress: null,
      canTakeBackOwnership: false
    });
    expect(profile.holders[0]?.address).toBe("HOLDER_9");
  });
});

describe("SecurityEngine", () => {
  it("queries the Solana endpoint and maps SPL authorities", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      json({ code: 1, result: { TokSol: solanaEntry } })
    );
    const engine = new SecurityEngine(securityConfig, fetchImpl, async () => {});

    const profile = await engine.check("TokSol", "solana");

    expect(fetchImpl.mock.calls[0]?.[0]).toBe(
      "https://api.gopluslabs.io/api/v1/solana/token_security?contract_addresses=TokSol"
    );
    expect(profile?.isMintable).toBe(true);
    expect(profile?.isBlacklisted).toBe(false);
    expect(profile?.isOpenSource).toBe(true);
    expect(profile?.buyTaxPct).toBe(0);
    expect(profile?.holderCount).toBe(300);
    expect(profile?.holders[0]?.address).toBe("HOLDER_1");
    expect(profile?.holders[0]?.percent).toBeCloseTo(5);
  });

  it("maps EVM chain names to GoPlus chain ids and looks the token up case-insensitively", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      json({ code: 1, result: { "0xabc": evmEntry } })
    );
    const engine = new SecurityEngine(securityConfig, fetchImpl, async () => {});

    const profile = await engine.check("0xABC", "bsc");

    expect(fetchImpl.mock.calls[0]?.[0]).toBe(
      "https://api.gopluslabs.io/api/v1/token_security/56?contract_addresses=0xABC"
    );
    expect(profile?.holderCount).toBe(120);
    expect(profile?.sellTaxPct).toBeCloseTo(10);
  });

  it("sends the API key when one is configured", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      json({ code: 1, result: { TokSol: solanaEntry } })
    );
    const config = makeConfig({ security: { apiKey: "test-secret" } }).security;
    const engine = new SecurityEngine(config, fetchImpl, async () => {});

    await engine.check("TokSol", "solana");

    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({
      accept: "application/json",
      authorization: "test-secret"
    });
  });

  it("retries while the token is not indexed yet", async () => {
    const fetchImpl = vi
      .fn(async (_url: string, _init?: RequestInit) => json({ code: 1, result: { TokSol: solanaEntry } }))
      .mockResolvedValueOnce(json({ code: 2, message: "not indexed", result: null }));
    const waits: number[] = [];
    const engine = new SecurityEngine(securityConfig, fetchImpl, async (ms) => {
      waits.push(ms);
    });

    const profile = await engine.check("TokSol", "solana");

    expect(profile).not.toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(waits).toEqual([10]);
  });

  it("returns null once every attempt has failed", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => json({}, 500));
    const waits: number[] = [];
    const engine = new SecurityEngine(securityConfig, fetchImpl, async (ms) => {
      waits.push(ms);
    });

    await expect(engine.check("TokSol", "solana")).resolves.toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([10, 20]);
  });
});
