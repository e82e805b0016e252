import { BotConfig } from "../config/config.js";
import { Candidate, FunnelVerdict, LedgerSnapshot, Position, SecurityProfile } from "./types.js";

export interface PortfolioView {
  snapshot(): LedgerSnapshot;
  listPositions(): Position[];
}

const money = (value: number) => `$${value.toFixed(2)}`;
const signed = (value: number) => `${value >= 0 ? "+" : "-"}$${Math.abs(value).toFixed(2)}`;

export const formatStartup = (config: BotConfig): string =>
  [
    "Launch scanner started",
    `Chain: ${config.discovery.chainId}`,
    `Grading: ${config.grading.mode}`,
    `Capital: ${money(config.trade.initialCapitalUsd)}, ${config.trade.maxOpenPositions} slots`
  ].join("\n");

export const formatWatchAlert = (candidate: Candidate, security: SecurityProfile, verdict: FunnelVerdict): string => {
  const header = verdict.confidence > 80 ? "GEM FOUND" : "NEW LAUNCH WATCH";
  const lines = [
    `${header} | ${candidate.symbol}`,
    "",
    `Verdict: ${verdict.decision} (${verdict.confidence}%)`
  ];
  if (verdict.grading && verdict.grading.potentialMarketCap > 0) {
    lines.push(`Potential: $${Math.round(verdict.grading.potentialMarketCap)} MC`);
  }
  lines.push(
    `Why: ${verdict.reasons[verdict.reasons.length - 1] ?? "n/a"}`,
    "",
    `Liquidity: $${Math.round(candidate.liquidityUsd)}`,
    `Market cap: $${Math.round(candidate.fdv)}`,
    `Age: ${candidate.ageMinutes.toFixed(1)}m`,
    `Tax: ${security.buyTaxPct}% / ${security.sellTaxPct}%`,
    `Holders: ${security.holderCount}`,
    `Pair: ${candidate.pairAddress}`,
    `https://dexscreener.com/${candidate.chainId}/${candidate.pairAddress}`
  );
  return lines.join("\n");
};

export const formatOpened = (position: Position): string =>
  `[OPEN] ${position.symbol} size ${money(position.positionSize)} at $${position.entryPrice.toFixed(6)}, target $${position.targetPrice.toFixed(6)}`;

export const formatBalance = (snapshot: LedgerSnapshot): string =>
  [
    "WALLET STATUS",
    `Capital: ${money(snapshot.capital)}`,
    `Realized PnL: ${signed(snapshot.realizedPnl)}`,
    `Active trades: ${snapshot.openCount}/${snapshot.maxPositions}`
  ].join("\n");

export const formatActive = (positions: Position[]): string => {
  if (positions.length === 0) {
    return "No active trades.";
  }
  const blocks = positions.map((position) => {
    const roi = ((position.currentPrice - position.entryPrice) / position.entryPrice) * 100;
    return [
      position.symbol,
      `Entry: $${position.entryPrice.toFixed(6)}`,
      `Current: $${position.currentPrice.toFixed(6)}`,
      `PnL: ${roi >= 0 ? "+" : ""}${roi.toFixed(2)}%`,
      `Value: ${money(position.tokensHeld * position.currentPrice)}`
    ].join("\n");
  });
  return ["ACTIVE TRADES", ...blocks].join("\n\n");
};

/** Reply text for a chat command, or null when the text is not a known command. */
export const replyToCommand = (text: string, view: PortfolioView): string | null => {
  const command = text.trim().split(/\s+/)[0]?.replace(/@.*$/, "");
  switch (command) {
    case "/balance":
      return formatBalance(view.snapshot());
    case "/active":
      return formatActive(view.listPositions());
    default:
      return null;
  }
};
