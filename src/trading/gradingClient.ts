import { z } from "zod";
import { BotConfig } from "../config/config.js";
import { GradingRequest, GradingSource } from "../core/collaborators.js";
import { GradingDecision } from "../core/types.js";
import { FetchLike } from "../rpc/dexScreenerClient.js";
import { logger } from "../utils/logger.js";
import { observedTxPerMin } from "./behaviorScorer.js";

const SYSTEM_PROMPT = [
  "You are a quantitative analyst of early-stage token launches on decentralized exchanges.",
  "Judge whether the launch's first minutes resemble launches that went on to grow.",
  "Be conservative and never optimistic without evidence."
].join(" ");

const gradeSchema = z.object({
  grade_score: z.coerce.number().min(0).max(100),
  decision: z.enum(["WATCH", "IGNORE"]),
  reasoning: z.string().default(""),
  potential_mc: z.coerce.number().min(0).catch(0)
});

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1)
});

export const fallbackGrade = (reasoning: string): GradingDecision => ({
  decision: "WATCH",
  grade: 0,
  reasoning,
  potentialMarketCap: 0,
  fallback: true
});

export const buildGradingPrompt = ({ candidate, security, observation, score }: GradingRequest): string => {
  const exam = {
    security: {
      buyTaxPct: security.buyTaxPct,
      sellTaxPct: security.sellTaxPct,
      honeypot: security.isHoneypot,
      mintable: security.isMintable,
      verified: security.isOpenSource,
      blacklist: security.isBlacklisted
    },
    behavior: {
      buySellRatio: Number(observation.buySellRatio.toFixed(2)),
      txPerMin: observedTxPerMin(observation),
      activity: observation.activityLevel,
      priceTrend: observation.priceTrend,
      volatility: observation.volatility,
      observedPriceChangePct: Number(observation.priceChangePct.toFixed(2)),
      liquidityChangePct: Number(observation.liquidityChangePct.toFixed(2))
    },
    market: {
      liquidityUsd: candidate.liquidityUsd,
      marketCapUsd: candidate.fdv,
      pairAgeMinutes: Number(candidate.ageMinutes.toFixed(1)),
      volume5mUsd: candidate.volume5m
    },
    holders: {
      count: security.holderCount,
      top10Pct: Number(security.holders.slice(0, 10).reduce((sum, h) => sum + h.percent, 0).toFixed(2))
    },
    gatekeeperScore: score
  };

  return `Grade this token launch from 0 to 100.

Weights: security 35% (tax <= 8%, not mintable, verified), behavior 35% (many transactions,
buyers outnumber sellers), market 20% (liquidity $5k-$80k, market cap $8k-$40k), holders 10%
(spread out, not concentrated).

Any of these caps the grade at 40: suspicious security (honeypot, tax > 50%, blacklist);
liquidity being removed or below $1,000; no volume in the last minute; price down more
than 90%; a panic dump (buy/sell ratio under 0.2 or a drop over 60%). Dips are acceptable
only when sells are being absorbed (high volume and buy/sell ratio above 0.4).
Do not average: a failed pillar fails the launch.

Estimate a realistic peak market cap in USD. If the grade is below 80, set it to 0.

Reply with JSON only:
{"grade_score": number, "decision": "WATCH" | "IGNORE", "reasoning": string, "potential_mc": number}

DATA:
${JSON.stringify(exam, null, 2)}`;
};

export const parseGradingReply = (content: string): GradingDecision | null => {
  const cleaned = content.replace(/```json/g, "").replace(/```/g, "").trim();
  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch {
    return null;
  }
  const parsed = gradeSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }
  return {
    decision: parsed.data.decision,
    grade: parsed.data.grade_score,
    reasoning: parsed.data.reasoning,
    potentialMarketCap: parsed.data.potential_mc,
    fallback: false
  };
};

/**
 * Language-model grader behind an OpenAI-compatible chat completions
 * endpoint. Every failure resolves to `fallbackGrade`.
 */
export class GradingClient implements GradingSource {
  private readonly config: BotConfig["grading"];
  private readonly fetchImpl: FetchLike;

  constructor(config: BotConfig["grading"], fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  async grade(request: GradingRequest): Promise<GradingDecision> {
    if (!this.config.apiKey) {
      return fallbackGrade("grading skipped: no API key");
    }

    try {
      const response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.config.apiKey}`
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildGradingPrompt(request) }
          ],
          temperature: 0.3,
          max_tokens: 500
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
      if (!response.ok) {
        logger.warn({ status: response.status, symbol: request.candidate.symbol }, "Grading API error");
        return fallbackGrade(`grading offline (HTTP ${response.status})`);
      }

      const completion = completionSchema.safeParse(await response.json());
      const content = completion.success ? completion.data.choices[0]?.message.content : undefined;
      const decision = content === undefined ? null : parseGradingReply(content);
      if (!decision) {
        logger.warn({ symbol: request.candidate.symbol }, "Grading reply was not valid JSON");
        return fallbackGrade("grading reply unreadable");
      }
      return decision;
    } catch (err) {
      logger.error({ err, symbol: request.candidate.symbol }, "Grading request failed");
      return fallbackGrade("grading request failed");
    }
  }
}
