export interface Candidate {
  pairAddress: string;
  chainId: string;
  symbol: string;
  tokenAddress: string;
  priceUsd: number;
  liquidityUsd: number;
  fdv: number;
  ageMinutes: number;
  buys5m: number;
  sells5m: number;
  volume5m: number;
  priceChange5m: number;
  buySellRatio: number;
  txPerMin: number;
  avgTxSizeUsd: number;
}

export interface HolderShare {
  address: string;
  percent: number;
}

export interface SecurityProfile {
  isHoneypot: boolean;
  isMintable: boolean;
  isBlacklisted: boolean;
  isOpenSource: boolean;
  buyTaxPct: number;
  sellTaxPct: number;
  holderCount: number;
  holders: HolderShare[];
  ownerAddress: string | null;
  canTakeBackOwnership: boolean;
}

export type PriceTrend = "stable" | "uptrend" | "downtrend" | "volatile";

export interface ObservationSnapshot {
  timestamp: number;
  priceUsd: number;
  liquidityUsd: number;
  buys5m: number;
  sells5m: number;
}

export interface ObservationSummary {
  priceTrend: PriceTrend;
  volatility: number;
  liquidityChangePct: number;
  buySellRatio: number;
  activityLevel: "high" | "low";
  buys5m: number;
  sells5m: number;
  priceChangePct: number;
  samples: number;
}

export type Decision = "WATCH" | "IGNORE";

export interface GradingDecision {
  decision: Decision;
  grade: number;
  reasoning: string;
  potentialMarketCap: number;
  fallback: boolean;
}

export type BuyConsistency = "steady" | "spiky" | "neutral";
export type HolderGrowthPattern = "smooth" | "bursty" | "neutral";
export type ConcentrationTrend = "decreasing" | "increasing" | "stable";

export interface BehaviorInput {
  liquidityUsd: number;
  liquidityChangePct: number;
  buySellRatio: number;
  buyConsistency: BuyConsistency;
  avgPriceRecoverySeconds: number;
  holderGrowthPattern: HolderGrowthPattern;
  top5HolderPct: number;
  top5Trend: ConcentrationTrend;
  txPerMin: number;
  avgTxSizeUsd: number;
  observedPriceChangePct?: number;
}

export interface SubScores {
  demand: number;
  absorption: number;
  liquidity: number;
  holders: number;
  activity: number;
}

export interface BehaviorResult {
  decision: Decision;
  confidence: number;
  subScores: SubScores | null;
  positivePatterns: string[];
  negativePatterns: string[];
  summary: string;
}

export type FunnelStage =
  | "liquidity"
  | "metadata"
  | "gatekeeper"
  | "security"
  | "holders"
  | "final_score"
  | "behavior";

export type FunnelInput = "security" | "observation" | "grading";

export interface FunnelInputs {
  security?: SecurityProfile;
  observation?: ObservationSummary;
  grading?: GradingDecision;
}

export interface FunnelVerdict {
  decision: Decision;
  score: number;
  confidence: number;
  reasons: string[];
  stage: FunnelStage;
  awaiting?: FunnelInput;
  behavior?: BehaviorResult;
  grading?: GradingDecision;
}

/** Identifies an open position: one pair on one chain. Tickers are not unique. */
export interface PositionId {
  chainId: string;
  pairAddress: string;
}

export interface Position extends PositionId {
  symbol: string;
  entryPrice: number;
  entryMarketCap: number;
  currentPrice: number;
  highWaterMark: number;
  positionSize: number;
  tokensHeld: number;
  targetPrice: number;
  targetMarketCap: number;
  nextLadderPrice: number;
  targetHit: boolean;
  realizedProceeds: number;
  openedAt: number;
}

/** `tokensHeld` is the balance sold by the closing sale. */
export interface ClosedTrade extends Position {
  exitReason: string;
  netPnl: number;
  closedAt: number;
}

export type TradeEvent =
  | { kind: "trailing_stop"; symbol: string; price: number; peak: number; proceeds: number; netPnl: number }
  | { kind: "target_hit"; symbol: string; price: number; tokensSold: number; proceeds: number }
  | {
      kind: "ladder";
      symbol: string;
      price: number;
      multiple: number;
      tokensSold: number;
      proceeds: number;
      nextLadderPrice: number;
    };

export interface PositionUpdate {
  event: TradeEvent | null;
  message: string | null;
  closed: boolean;
}

export interface ExitDecision {
  shouldExit: boolean;
  rule: TradeEvent["kind"] | "hold";
  reason: string;
  sellPortion: number;
}

export interface LedgerSnapshot {
  capital: number;
  openCount: number;
  maxPositions: number;
  realizedPnl: number;
}
