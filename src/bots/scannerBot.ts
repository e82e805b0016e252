import { BotConfig } from "../config/config.js";
import {
  CandidateSource,
  GradingSource,
  Notifier,
  ObservationSource,
  PriceSource,
  SecuritySource
} from "../core/collaborators.js";
import { formatOpened, formatStartup, formatWatchAlert, PortfolioView } from "../core/messages.js";
import { TelegramNotifier } from "../core/telegramNotifier.js";
import { Candidate, FunnelInput, FunnelInputs, FunnelVerdict } from "../core/types.js";
import { DexScreenerClient } from "../rpc/dexScreenerClient.js";
import { NewPairsFeed } from "../listeners/newPairsFeed.js";
import { GradingClient } from "../trading/gradingClient.js";
import { MarketObserver } from "../trading/marketObserver.js";
import { PositionManager } from "../trading/positionManager.js";
import { PriceOracle } from "../trading/priceOracle.js";
import { SecurityEngine } from "../trading/securityEngine.js";
import { VettingFunnel } from "../trading/vettingFunnel.js";
import { logger } from "../utils/logger.js";

export interface ScannerDeps {
  feed: CandidateSource;
  prices: PriceSource;
  security: SecuritySource;
  observer: ObservationSource;
  grader: GradingSource;
  notifier: Notifier;
  commands?: { listenForCommands(view: PortfolioView): void; stop(): Promise<void> };
}

export const createDefaultDeps = (config: BotConfig): ScannerDeps => {
  const client = new DexScreenerClient();
  const telegram = new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
  return {
    feed: new NewPairsFeed(config.discovery, client),
    prices: new PriceOracle(client),
    security: new SecurityEngine(config.security),
    observer: new MarketObserver(config.observation, client),
    grader: new GradingClient(config.grading),
    notifier: telegram,
    commands: telegram
  };
};

/**
 * Drives one polling cycle at a time: first every open position gets a
 * fresh price, then unseen candidates go through the vetting funnel. Ticks
 * never overlap; the next one is scheduled only after the current finishes.
 */
export class ScannerBot {
  private readonly config: BotConfig;
  private readonly deps: ScannerDeps;
  private readonly funnel: VettingFunnel;
  readonly positions: PositionManager;
  private readonly seenPairs = new Set<string>();
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(config: BotConfig, deps: ScannerDeps = createDefaultDeps(config)) {
    this.config = config;
    this.deps = deps;
    this.funnel = new VettingFunnel(config);
    this.positions = new PositionManager(config.trade);
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.deps.commands?.listenForCommands(this.positions);
    await this.notify(formatStartup(this.config));
    logger.info({ chain: this.config.discovery.chainId, mode: this.config.grading.mode }, "Scanner started");
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.deps.commands?.stop();
    logger.info("Scanner stopped");
  }

  async tick(): Promise<void> {
    await this.monitorPositions();
    await this.scanCandidates();
  }

  async monitorPositions(): Promise<void> {
    for (const position of this.positions.listPositions()) {
      const price = await this.deps.prices.getPrice(position.pairAddress, position.chainId);
      if (price === null) {
        logger.warn({ symbol: position.symbol }, "Price unavailable, keeping position as is");
        continue;
      }
      const update = this.positions.update(position, price);
      if (update.message) {
        await this.notify(update.message);
      }
    }
  }

  async scanCandidates(): Promise<void> {
    const candidates = await this.deps.feed.fetchCandidates();
    const fresh = candidates.filter((candidate) => !this.seenPairs.has(candidate.pairAddress));
    if (fresh.length === 0) {
      logger.debug("No new pairs");
      return;
    }
    logger.info({ count: fresh.length }, "Vetting new pairs");
    for (const candidate of fresh) {
      if (this.seenPairs.has(candidate.pairAddress)) {
        continue;
      }
      this.seenPairs.add(candidate.pairAddress);
      await this.vet(candidate);
    }
  }

  hasSeen(pairAddress: string): boolean {
    return this.seenPairs.has(pairAddress);
  }

  /**
   * Re-runs the funnel, fetching one missing collaborator input at a time
   * whenever a stage rejects for want of it.
   */
  async vet(candidate: Candidate): Promise<FunnelVerdict> {
    const inputs: FunnelInputs = {};
    const attempted = new Set<FunnelInput>();
    let verdict = this.funnel.evaluate(candidate, inputs);

    while (verdict.awaiting && !attempted.has(verdict.awaiting)) {
      attempted.add(verdict.awaiting);
      await this.fetchInput(verdict.awaiting, candidate, inputs, verdict.score);
      verdict = this.funnel.evaluate(candidate, inputs);
    }

    logger.info(
      {
        symbol: candidate.symbol,
        pairAddress: candidate.pairAddress,
        decision: verdict.decision,
        stage: verdict.stage,
        score: verdict.score,
        confidence: verdict.confidence,
        reasons: verdict.reasons
      },
      "Funnel verdict"
    );

    if (verdict.decision === "WATCH" && inputs.security) {
      await this.notify(formatWatchAlert(candidate, inputs.security, verdict));
      await this.openPosition(candidate, verdict);
    }
    return verdict;
  }

  private async fetchInput(input: FunnelInput, candidate: Candidate, inputs: FunnelInputs, score: number): Promise<void> {
    switch (input) {
      case "security": {
        const profile = await this.deps.security.check(candidate.tokenAddress, candidate.chainId);
        if (profile) inputs.security = profile;
        return;
      }
      case "observation": {
        const observation = await this.deps.observer.observe(candidate.pairAddress, candidate.chainId);
        if (observation) inputs.observation = observation;
        return;
      }
      case "grading": {
        if (!inputs.security || !inputs.observation) return;
        inputs.grading = await this.deps.grader.grade({
          candidate,
          security: inputs.security,
          observation: inputs.observation,
          score
        });
        return;
      }
    }
  }

  private async openPosition(candidate: Candidate, verdict: FunnelVerdict): Promise<void> {
    const potential = verdict.grading?.potentialMarketCap;
    const opened = this.positions.open(
      candidate.symbol,
      candidate.priceUsd,
      candidate.fdv,
      candidate.pairAddress,
      candidate.chainId,
      potential && potential > 0 ? potential : undefined
    );
    const position = opened ? this.positions.getPosition(candidate) : undefined;
    if (position) {
      await this.notify(formatOpened(position));
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.tick()
        .catch((err: unknown) => logger.error({ err }, "Tick failed"))
        .finally(() => {
          if (this.running) {
            this.schedule(this.config.scanIntervalSeconds * 1000);
          }
        });
    }, delayMs);
  }

  private async notify(message: string): Promise<void> {
    try {
      await this.deps.notifier.send(message);
    } catch (err) {
      logger.warn({ err }, "Notification failed");
    }
  }
}
