import {
  BehaviorInput,
  BehaviorResult,
  Candidate,
  Decision,
  ObservationSummary,
  SecurityProfile,
  SubScores
} from "../core/types.js";
import { clamp, round } from "../utils/math.js";

const PILLARS = ["demand", "absorption", "liquidity", "holders", "activity"] as const;

export const SUB_SCORE_WEIGHTS: SubScores = {
  demand: 0.25,
  absorption: 0.25,
  liquidity: 0.2,
  holders: 0.15,
  activity: 0.15
};

const WATCH_CONFIDENCE = 0.75;
const CRITICAL_SUB_SCORE = 0.4;

const MAX_LIQUIDITY_DROP_PCT = -5;
const MAX_TOP5_HOLDER_PCT = 40;
const MIN_TX_PER_MIN = 5;
const PANIC_DUMP_PCT = -60;

interface SubScore {
  score: number;
  positive: string[];
  negative: string[];
}

const start = (): SubScore => ({ score: 0.5, positive: [], negative: [] });

const finish = (sub: SubScore): SubScore => ({ ...sub, score: clamp(sub.score, 0, 1) });

const redFlag = (input: BehaviorInput): string | null => {
  if (input.liquidityChangePct < MAX_LIQUIDITY_DROP_PCT) {
    return "Liquidity removed (>5%)";
  }
  if (input.top5HolderPct > MAX_TOP5_HOLDER_PCT) {
    return "Extreme holder concentration (>40%)";
  }
  if (input.txPerMin < MIN_TX_PER_MIN) {
    return "Insufficient transaction volume (<5 tx/min)";
  }
  if (input.observedPriceChangePct !== undefined && input.observedPriceChangePct <= PANIC_DUMP_PCT) {
    return "Panic dump during observation (>60% drop)";
  }
  return null;
};

const demandQuality = (input: BehaviorInput): SubScore => {
  const sub = start();
  if (input.buySellRatio > 2.5) {
    sub.score += 0.2;
    sub.positive.push("Strong buy dominance");
  } else if (input.buySellRatio > 1.2) {
    sub.score += 0.1;
    sub.positive.push("Healthy buy pressure");
  } else if (input.buySellRatio < 0.5) {
    sub.score -= 0.3;
    sub.negative.push("Heavy sell pressure");
  }

  if (input.buyConsistency === "steady") {
    sub.score += 0.2;
    sub.positive.push("Steady buying");
  } else if (input.buyConsistency === "spiky") {
    sub.score -= 0.2;
    sub.negative.push("Spiky, bot-like buying");
  }
  return finish(sub);
};

const sellAbsorption = (input: BehaviorInput): SubScore => {
  const sub = start();
  if (input.avgPriceRecoverySeconds < 45) {
    sub.score += 0.3;
    sub.positive.push("Rapid sell absorption (<45s)");
  } else if (input.avgPriceRecoverySeconds < 120) {
    sub.score += 0.1;
    sub.positive.push("Moderate sell absorption");
  } else {
    sub.score -= 0.2;
    sub.negative.push("Slow price recovery");
  }
  return finish(sub);
};

const liquidityStability = (input: BehaviorInput): SubScore => {
  const sub = start();
  if (input.liquidityUsd < 5_000) {
    sub.score -= 0.2;
    sub.negative.push("Very low liquidity");
  } else if (input.liquidityUsd > 20_000) {
    sub.score += 0.1;
    sub.positive.push("Deep liquidity base");
  }

  if (Math.abs(input.liquidityChangePct) < 2) {
    sub.score += 0.2;
    sub.positive.push("Liquidity stable");
  } else if (input.liquidityChangePct < 0) {
    sub.score -= 0.3;
    sub.negative.push("Liquidity reduction detected");
  }
  return finish(sub);
};

const holderDistribution = (input: BehaviorInput): SubScore => {
  const sub = start();
  if (input.holderGrowthPattern === "smooth") {
    sub.score += 0.2;
    sub.positive.push("Organic holder growth");
  } else if (input.holderGrowthPattern === "bursty") {
    sub.score -= 0.2;
    sub.negative.push("Bursty holder inflation");
  }

  if (input.top5Trend === "decreasing") {
    sub.score += 0.1;
    sub.positive.push("Improving distribution");
  } else if (input.top5Trend === "increasing") {
    sub.score -= 0.2;
    sub.negative.push("Whale accumulation risk");
  }
  return finish(sub);
};

const marketActivity = (input: BehaviorInput): SubScore => {
  const sub = start();
  if (input.txPerMin > 30) {
    sub.score += 0.2;
    sub.positive.push("High transaction velocity");
  } else if (input.txPerMin > 10) {
    sub.score += 0.1;
  }

  if (input.avgTxSizeUsd < 10) {
    sub.score -= 0.2;
    sub.negative.push("Micro-transaction spam suspected");
  } else if (input.avgTxSizeUsd > 100) {
    sub.score += 0.1;
    sub.positive.push("Healthy trade sizing");
  }
  return finish(sub);
};

export const weightedConfidence = (scores: SubScores): number => {
  const total = PILLARS.reduce((acc, key) => acc + scores[key] * SUB_SCORE_WEIGHTS[key], 0);
  return round(total, 2);
};

/**
 * WATCH needs a high weighted confidence and no critically weak pillar:
 * one sub-score under 0.4 forces IGNORE whatever the average says.
 */
export const decide = (scores: SubScores): { decision: Decision; confidence: number; critical: boolean } => {
  const confidence = weightedConfidence(scores);
  const critical = Math.min(...PILLARS.map((key) => scores[key])) < CRITICAL_SUB_SCORE;
  const decision = !critical && confidence >= WATCH_CONFIDENCE ? "WATCH" : "IGNORE";
  return { decision, confidence, critical };
};

const summarize = (result: Omit<BehaviorResult, "summary">): string => {
  if (result.decision === "IGNORE") {
    if (result.subScores === null) {
      return result.negativePatterns[0] ?? "Safety violations";
    }
    const first = result.negativePatterns[0] ?? "Insufficient quality";
    return `Metrics display instability (score ${result.confidence}). ${first}.`;
  }
  return `Behavior aligns with organic launch patterns (score ${result.confidence}). Strengths: ${result.positivePatterns
    .slice(0, 2)
    .join(", ")}.`;
};

export class BehaviorScorer {
  score(input: BehaviorInput): BehaviorResult {
    const flag = redFlag(input);
    if (flag) {
      const result = {
        decision: "IGNORE" as const,
        confidence: 0,
        subScores: null,
        positivePatterns: [],
        negativePatterns: [flag]
      };
      return { ...result, summary: summarize(result) };
    }

    const parts = {
      demand: demandQuality(input),
      absorption: sellAbsorption(input),
      liquidity: liquidityStability(input),
      holders: holderDistribution(input),
      activity: marketActivity(input)
    };
    const subScores: SubScores = {
      demand: parts.demand.score,
      absorption: parts.absorption.score,
      liquidity: parts.liquidity.score,
      holders: parts.holders.score,
      activity: parts.activity.score
    };
    const positivePatterns = Object.values(parts).flatMap((part) => part.positive);
    const negativePatterns = Object.values(parts).flatMap((part) => part.negative);

    const { decision, confidence, critical } = decide(subScores);
    if (critical) {
      negativePatterns.push("Critical weakness in one or more metrics");
    }

    const result = { decision, confidence, subScores, positivePatterns, negativePatterns };
    return { ...result, summary: summarize(result) };
  }
}

/** Transactions per minute over the 5 minute window as of the last observation. */
export const observedTxPerMin = (observation: ObservationSummary): number =>
  (observation.buys5m + observation.sells5m) / 5;

/**
 * Adapts candidate, observation and security records into scorer input.
 * Flow figures come from the observation window, not the scan snapshot.
 * Holder growth and top-5 trend have no data source yet and stay neutral.
 */
export const buildBehaviorInput = (
  candidate: Candidate,
  observation: ObservationSummary,
  security?: SecurityProfile
): BehaviorInput => {
  const ratio = observation.buySellRatio;
  const top5HolderPct = security
    ? security.holders.slice(0, 5).reduce((acc, holder) => acc + holder.percent, 0)
    : 0;
  return {
    liquidityUsd: candidate.liquidityUsd,
    liquidityChangePct: observation.liquidityChangePct,
    buySellRatio: ratio,
    buyConsistency: ratio > 0.5 && ratio < 3 ? "steady" : "spiky",
    avgPriceRecoverySeconds: candidate.priceChange5m > 0 ? 30 : 120,
    holderGrowthPattern: "neutral",
    top5HolderPct,
    top5Trend: "stable",
    txPerMin: observedTxPerMin(observation),
    avgTxSizeUsd: candidate.avgTxSizeUsd,
    observedPriceChangePct: observation.priceChangePct
  };
};
