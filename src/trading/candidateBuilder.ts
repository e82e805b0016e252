import { Candidate } from "../core/types.js";
import { DexPair } from "../rpc/dexScreenerClient.js";

const M5_MINUTES = 5;

export const buySellRatio = (buys: number, sells: number): number => {
  if (sells > 0) return buys / sells;
  return buys > 0 ? buys : 1;
};

/**
 * Normalizes a DexScreener pair into a Candidate. Returns null when the pair
 * has no usable USD price, since nothing downstream can size a position then.
 */
export const toCandidate = (pair: DexPair, now = Date.now()): Candidate | null => {
  const priceUsd = pair.priceUsd ?? 0;
  if (!(priceUsd > 0)) {
    return null;
  }
  const buys = pair.txns?.m5?.buys ?? 0;
  const sells = pair.txns?.m5?.sells ?? 0;
  const volume5m = pair.volume?.m5 ?? 0;
  const txCount = buys + sells;
  const ageMinutes = pair.pairCreatedAt ? (now - pair.pairCreatedAt) / 60_000 : Number.POSITIVE_INFINITY;

  return {
    pairAddress: pair.pairAddress,
    chainId: pair.chainId,
    symbol: pair.baseToken.symbol,
    tokenAddress: pair.baseToken.address,
    priceUsd,
    liquidityUsd: pair.liquidity?.usd ?? 0,
    fdv: pair.fdv ?? 0,
    ageMinutes,
    buys5m: buys,
    sells5m: sells,
    volume5m,
    priceChange5m: pair.priceChange?.m5 ?? 0,
    buySellRatio: buySellRatio(buys, sells),
    txPerMin: txCount / M5_MINUTES,
    avgTxSizeUsd: txCount > 0 ? volume5m / txCount : 0
  };
};
