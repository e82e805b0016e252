import { BotConfig } from "../config/config.js";
import { ObservationSource } from "../core/collaborators.js";
import { ObservationSnapshot, ObservationSummary, PriceTrend } from "../core/types.js";
import { DexScreenerClient } from "../rpc/dexScreenerClient.js";
import { logger } from "../utils/logger.js";
import { pctChange, sampleStd } from "../utils/math.js";
import { sleep } from "../utils/sleep.js";
import { buySellRatio } from "./candidateBuilder.js";

const STABLE_BAND_PCT = 2;
const HIGH_ACTIVITY_DISTINCT_PRICES = 3;

const classifyTrend = (changePct: number): PriceTrend => {
  if (Math.abs(changePct) < STABLE_BAND_PCT) return "stable";
  if (changePct > STABLE_BAND_PCT) return "uptrend";
  if (changePct < -STABLE_BAND_PCT) return "downtrend";
  return "volatile";
};

export const summarizeObservations = (history: ObservationSnapshot[]): ObservationSummary | null => {
  const first = history[0];
  const last = history[history.length - 1];
  if (!first || !last) {
    return null;
  }
  const prices = history.map((snapshot) => snapshot.priceUsd);
  const priceChangePct = pctChange(first.priceUsd, last.priceUsd);

  return {
    priceTrend: classifyTrend(priceChangePct),
    volatility: sampleStd(prices),
    liquidityChangePct: pctChange(first.liquidityUsd, last.liquidityUsd),
    buySellRatio: buySellRatio(last.buys5m, last.sells5m),
    activityLevel: new Set(prices).size > HIGH_ACTIVITY_DISTINCT_PRICES ? "high" : "low",
    buys5m: last.buys5m,
    sells5m: last.sells5m,
    priceChangePct,
    samples: history.length
  };
};

/**
 * Watches a pair for a fixed window, sampling DexScreener at a fixed
 * interval, and reduces the samples to an ObservationSummary.
 */
export class MarketObserver implements ObservationSource {
  private readonly config: BotConfig["observation"];
  private readonly client: DexScreenerClient;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    config: BotConfig["observation"],
    client: DexScreenerClient,
    wait: (ms: number) => Promise<void> = sleep
  ) {
    this.config = config;
    this.client = client;
    this.wait = wait;
  }

  async observe(pairAddress: string, chainId: string): Promise<ObservationSummary | null> {
    const polls = Math.max(1, Math.floor(this.config.durationSeconds / this.config.pollIntervalSeconds));
    const history: ObservationSnapshot[] = [];
    logger.info({ pairAddress, chainId, seconds: this.config.durationSeconds }, "Observing pair");

    for (let i = 0; i < polls; i++) {
      const pair = await this.client.getPair(chainId, pairAddress);
      if (pair?.priceUsd !== undefined) {
        history.push({
          timestamp: Date.now(),
          priceUsd: pair.priceUsd,
          liquidityUsd: pair.liquidity?.usd ?? 0,
          buys5m: pair.txns?.m5?.buys ?? 0,
          sells5m: pair.txns?.m5?.sells ?? 0
        });
      }
      if (i < polls - 1) {
        await this.wait(this.config.pollIntervalSeconds * 1000);
      }
    }

    const summary = summarizeObservations(history);
    if (!summary) {
      logger.warn({ pairAddress, chainId }, "Observation produced no samples");
    }
    return summary;
  }
}
