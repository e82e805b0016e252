import { BotConfig, parseConfig } from "../../config/config.js";
import { Candidate, ObservationSummary, SecurityProfile } from "../../core/types.js";

export const makeConfig = (raw: Record<string, unknown> = {}): BotConfig => parseConfig(raw, {});

export const makeCandidate = (overrides: Partial<Candidate> = {}): Candidate => ({
  pairAddress: "PAIR_A",
  chainId: "solana",
  symbol: "AAA",
  tokenAddress: "TOKEN_A",
  priceUsd: 0.001,
  liquidityUsd: 30_000,
  fdv: 20_000,
  ageMinutes: 5,
  buys5m: 140,
  sells5m: 50,
  volume5m: 28_500,
  priceChange5m: 5,
  buySellRatio: 2.8,
  txPerMin: 38,
  avgTxSizeUsd: 150,
  ...overrides
});

export const makeSecurity = (overrides: Partial<SecurityProfile> = {}): SecurityProfile => ({
  isHoneypot: false,
  isMintable: false,
  isBlacklisted: false,
  isOpenSource: true,
  buyTaxPct: 0,
  sellTaxPct: 0,
  holderCount: 250,
  holders: [
    { address: "HOLDER_1", percent: 10 },
    { address: "HOLDER_2", percent: 5 }
  ],
  ownerAddress: null,
  canTakeBackOwnership: false,
  ...overrides
});

export const makeObservation = (overrides: Partial<ObservationSummary> = {}): ObservationSummary => ({
  priceTrend: "uptrend",
  volatility: 0.0001,
  liquidityChangePct: 0.5,
  buySellRatio: 2.8,
  activityLevel: "high",
  buys5m: 140,
  sells5m: 50,
  priceChangePct: 3,
  samples: 6,
  ...overrides
});
