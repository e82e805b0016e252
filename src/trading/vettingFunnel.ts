import { BotConfig } from "../config/config.js";
import {
  Candidate,
  FunnelInput,
  FunnelInputs,
  FunnelStage,
  FunnelVerdict,
  GradingDecision,
  ObservationSummary,
  SecurityProfile
} from "../core/types.js";
import { usd } from "../utils/math.js";
import { BehaviorScorer, buildBehaviorInput } from "./behaviorScorer.js";

const RENOUNCED_OWNER_MARKER = "11111111111111111111111111111111";

interface RunningScore {
  score: number;
  reasons: string[];
}

type StageOutcome = { pass: true } | { pass: false; reason: string; awaiting?: FunnelInput };

const pass: StageOutcome = { pass: true };
const reject = (reason: string): StageOutcome => ({ pass: false, reason });

/**
 * Ordered vetting gates for a new pair. Stages run in a fixed order and the
 * first rejection is terminal. Missing collaborator data rejects at the stage
 * that needs it and names the input in `awaiting`, so the caller can fetch it
 * and evaluate again; the funnel itself never does I/O.
 */
export class VettingFunnel {
  private readonly config: BotConfig;
  private readonly scorer: BehaviorScorer;

  constructor(config: BotConfig, scorer = new BehaviorScorer()) {
    this.config = config;
    this.scorer = scorer;
  }

  evaluate(candidate: Candidate, inputs: FunnelInputs = {}): FunnelVerdict {
    const running: RunningScore = { score: 0, reasons: [] };
    const ignore = (stage: FunnelStage, outcome: { reason: string; awaiting?: FunnelInput }): FunnelVerdict => ({
      decision: "IGNORE",
      score: running.score,
      confidence: 0,
      reasons: [...running.reasons, outcome.reason],
      stage,
      ...(outcome.awaiting ? { awaiting: outcome.awaiting } : {})
    });

    const liquidity = this.checkLiquidity(candidate);
    if (!liquidity.pass) return ignore("liquidity", liquidity);

    this.applyMetadataPenalties(candidate, running);

    if (running.score < this.config.filters.minScoreToProceed) {
      return ignore("gatekeeper", { reason: `score ${running.score} below minimum ${this.config.filters.minScoreToProceed}` });
    }

    const profile = inputs.security;
    if (!profile) return ignore("security", { reason: "security data unavailable", awaiting: "security" });

    const security = this.checkSecurity(profile);
    if (!security.pass) return ignore("security", security);

    const holders = this.checkHolders(profile, running);
    if (!holders.pass) return ignore("holders", holders);

    if (running.score < this.config.filters.minScoreToProceed) {
      return ignore("final_score", {
        reason: `final score ${running.score} below minimum ${this.config.filters.minScoreToProceed}`
      });
    }

    return this.behaviorGate(candidate, inputs, running);
  }

  private checkLiquidity(candidate: Candidate): StageOutcome {
    const floor = this.config.filters.minLiquidityUsd;
    if (candidate.liquidityUsd < floor) {
      return reject(`liquidity below floor: ${usd(candidate.liquidityUsd)} < ${usd(floor)}`);
    }
    return pass;
  }

  private applyMetadataPenalties(candidate: Candidate, running: RunningScore): void {
    const { filters, penalties } = this.config;
    if (candidate.fdv < filters.lowMarketCapUsd) {
      running.score += penalties.lowMarketCap;
      running.reasons.push(`market cap below ${usd(filters.lowMarketCapUsd)} (${penalties.lowMarketCap})`);
    }
    if (candidate.fdv > filters.highMarketCapUsd) {
      running.score += penalties.highMarketCap;
      running.reasons.push(`market cap above ${usd(filters.highMarketCapUsd)} (${penalties.highMarketCap})`);
    }
    if (candidate.liquidityUsd > filters.highLiquidityUsd) {
      running.score += penalties.highLiquidity;
      running.reasons.push(`liquidity above ${usd(filters.highLiquidityUsd)} (${penalties.highLiquidity})`);
    }
  }

  private checkSecurity(profile: SecurityProfile): StageOutcome {
    const { maxBuyTaxPct, maxSellTaxPct } = this.config.filters;
    if (profile.isHoneypot) {
      return reject("honeypot detected");
    }
    if (profile.buyTaxPct > maxBuyTaxPct || profile.sellTaxPct > maxSellTaxPct) {
      return reject(`high tax (buy ${profile.buyTaxPct}%, sell ${profile.sellTaxPct}%)`);
    }
    if (profile.isMintable) {
      return reject("mintable contract");
    }
    if (profile.isBlacklisted) {
      return reject("blacklist or freeze authority present");
    }
    const owner = profile.ownerAddress;
    if (owner && !owner.includes(RENOUNCED_OWNER_MARKER) && profile.canTakeBackOwnership) {
      return reject("owner can take back ownership");
    }
    if (!profile.isOpenSource) {
      return reject("unverified contract");
    }
    return pass;
  }

  private checkHolders(profile: SecurityProfile, running: RunningScore): StageOutcome {
    const { softTopHolderPct, hardTopHolderPct, minHolders } = this.config.filters;
    const top = profile.holders[0];
    if (top) {
      if (top.percent > hardTopHolderPct) {
        return reject(`top holder ${top.percent.toFixed(1)}% above ${hardTopHolderPct}% (critical concentration)`);
      }
      if (top.percent > softTopHolderPct) {
        running.score += this.config.penalties.topHolder;
        running.reasons.push(`top holder ${top.percent.toFixed(1)}% (${this.config.penalties.topHolder})`);
      }
    }
    if (profile.holderCount < minHolders) {
      return reject(`holders ${profile.holderCount} below minimum ${minHolders}`);
    }
    return pass;
  }

  private behaviorGate(candidate: Candidate, inputs: FunnelInputs, running: RunningScore): FunnelVerdict {
    const base = { score: running.score, stage: "behavior" as const };
    const observation = inputs.observation;
    if (!observation) {
      return {
        ...base,
        decision: "IGNORE",
        confidence: 0,
        reasons: [...running.reasons, "observation data unavailable"],
        awaiting: "observation"
      };
    }

    const { mode, fallbackToAlgorithmic, gradeCutoff } = this.config.grading;
    const grading = inputs.grading;
    const useScorer = mode === "algorithmic" || (grading?.fallback === true && fallbackToAlgorithmic);
    if (useScorer) {
      return this.algorithmicVerdict(candidate, observation, inputs.security, running, grading);
    }

    if (!grading) {
      return {
        ...base,
        decision: "IGNORE",
        confidence: 0,
        reasons: [...running.reasons, "grading unavailable"],
        awaiting: "grading"
      };
    }

    const watch = grading.decision === "WATCH" && grading.grade >= gradeCutoff;
    const note = watch
      ? `graded ${grading.grade}/100: ${grading.reasoning}`
      : `not accepted: ${grading.decision} at ${grading.grade}/100, cutoff ${gradeCutoff}: ${grading.reasoning}`;
    return {
      ...base,
      decision: watch ? "WATCH" : "IGNORE",
      confidence: grading.grade,
      reasons: [...running.reasons, note],
      grading
    };
  }

  private algorithmicVerdict(
    candidate: Candidate,
    observation: ObservationSummary,
    security: SecurityProfile | undefined,
    running: RunningScore,
    grading: GradingDecision | undefined
  ): FunnelVerdict {
    const behavior = this.scorer.score(buildBehaviorInput(candidate, observation, security));
    return {
      decision: behavior.decision,
      score: running.score,
      confidence: Math.round(behavior.confidence * 100),
      reasons: [...running.reasons, behavior.summary],
      stage: "behavior",
      behavior,
      ...(grading ? { grading } : {})
    };
  }
}
