import { TradeConfig } from "../config/config.js";
import { ExitDecision, Position } from "../core/types.js";

export class ExitEngine {
  private readonly config: TradeConfig;

  constructor(config: TradeConfig) {
    this.config = config;
  }

  /**
   * Picks at most one exit rule for the current price, in priority order:
   * trailing stop, one-shot target, then the doubling ladder. Expects the
   * position's high-water mark to already include `price`.
   */
  evaluate(position: Position, price: number): ExitDecision {
    const peak = position.highWaterMark;
    const dropPct = ((price - peak) / peak) * 100;

    if (dropPct <= -this.config.trailingStopPct) {
      return {
        shouldExit: true,
        rule: "trailing_stop",
        reason: `Trailing stop (${dropPct.toFixed(1)}% from peak $${peak.toFixed(6)})`,
        sellPortion: 1
      };
    }

    if (!position.targetHit && price >= position.targetPrice) {
      return {
        shouldExit: true,
        rule: "target_hit",
        reason: "Target reached",
        sellPortion: this.config.targetSellFraction
      };
    }

    if (price >= position.nextLadderPrice) {
      const multiple = price / position.entryPrice;
      return {
        shouldExit: true,
        rule: "ladder",
        reason: `Ladder (${multiple.toFixed(1)}x)`,
        sellPortion: this.config.ladderSellFraction
      };
    }

    return { shouldExit: false, rule: "hold", reason: "Hold", sellPortion: 0 };
  }
}
