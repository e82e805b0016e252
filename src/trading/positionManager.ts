import { TradeConfig } from "../config/config.js";
import {
  ClosedTrade,
  ExitDecision,
  LedgerSnapshot,
  Position,
  PositionId,
  PositionUpdate,
  TradeEvent
} from "../core/types.js";
import { logger } from "../utils/logger.js";
import { CapitalLedger, LedgerView } from "./capitalLedger.js";
import { ExitEngine } from "./exitEngine.js";

const NO_UPDATE: PositionUpdate = { event: null, message: null, closed: false };

const positionKey = (id: PositionId): string => `${id.chainId}:${id.pairAddress}`;

/** Open positions keyed by chain and pair; a pair holds at most one open position. */
class PositionBook {
  private readonly positions = new Map<string, Position>();

  get size(): number {
    return this.positions.size;
  }

  has(id: PositionId): boolean {
    return this.positions.has(positionKey(id));
  }

  get(id: PositionId): Position | undefined {
    return this.positions.get(positionKey(id));
  }

  add(position: Position): boolean {
    const key = positionKey(position);
    if (this.positions.has(key)) {
      return false;
    }
    this.positions.set(key, position);
    return true;
  }

  remove(id: PositionId): void {
    this.positions.delete(positionKey(id));
  }

  values(): Position[] {
    return [...this.positions.values()];
  }
}

const fmt = (price: number) => `$${price.toFixed(6)}`;

const describeEvent = (event: TradeEvent): string => {
  switch (event.kind) {
    case "trailing_stop":
      return `[TRAILING STOP] ${event.symbol} fell to ${fmt(event.price)} from peak ${fmt(event.peak)}. Closed, net PnL $${event.netPnl.toFixed(2)}`;
    case "target_hit":
      return `[TARGET HIT] ${event.symbol} reached ${fmt(event.price)}. Sold ${event.tokensSold.toFixed(2)} tokens for $${event.proceeds.toFixed(2)}`;
    case "ladder":
      return `[LADDER] ${event.symbol} at ${event.multiple.toFixed(1)}x. Sold ${event.tokensSold.toFixed(2)} tokens for $${event.proceeds.toFixed(2)}. Next level ${fmt(event.nextLadderPrice)}`;
  }
};

/**
 * Owns every open paper position and the capital ledger. All mutation of
 * either goes through `open` and `update`; both are synchronous and either
 * apply one rule completely or change nothing.
 */
export class PositionManager {
  private readonly config: TradeConfig;
  private readonly exitEngine: ExitEngine;
  private readonly clock: () => number;
  private readonly book = new PositionBook();
  private readonly capital: CapitalLedger;

  constructor(config: TradeConfig, clock: () => number = Date.now) {
    this.config = config;
    this.exitEngine = new ExitEngine(config);
    this.clock = clock;
    this.capital = new CapitalLedger(config.initialCapitalUsd);
  }

  get ledger(): LedgerView {
    return this.capital;
  }

  canOpen(): boolean {
    return this.book.size < this.config.maxOpenPositions;
  }

  open(
    symbol: string,
    entryPrice: number,
    marketCap: number,
    pairAddress: string,
    chainId: string,
    potentialTargetMc?: number
  ): boolean {
    if (!this.canOpen()) {
      logger.warn({ symbol, maxOpenPositions: this.config.maxOpenPositions }, "Position rejected: all slots in use");
      return false;
    }
    if (this.book.has({ chainId, pairAddress })) {
      logger.warn({ symbol, chainId, pairAddress }, "Position rejected: pair already open");
      return false;
    }
    if (!(entryPrice > 0)) {
      logger.warn({ symbol, entryPrice }, "Position rejected: entry price must be positive");
      return false;
    }

    const positionSize = this.capital.getBalance() * this.config.riskPerTrade;
    if (!(positionSize > 0)) {
      logger.warn({ symbol, capital: this.capital.getBalance() }, "Position rejected: no free capital");
      return false;
    }

    const hasMarketCap = marketCap > 0;
    const targetMarketCap =
      potentialTargetMc && potentialTargetMc > 0 ? potentialTargetMc : marketCap * this.config.defaultTargetMultiple;
    const targetPrice = hasMarketCap
      ? entryPrice * (targetMarketCap / marketCap)
      : entryPrice * this.config.defaultTargetMultiple;

    const position: Position = {
      symbol,
      pairAddress,
      chainId,
      entryPrice,
      entryMarketCap: marketCap,
      currentPrice: entryPrice,
      highWaterMark: entryPrice,
      positionSize,
      tokensHeld: positionSize / entryPrice,
      targetPrice,
      targetMarketCap,
      nextLadderPrice: entryPrice * this.config.ladderMultiplier,
      targetHit: false,
      realizedProceeds: 0,
      openedAt: this.clock()
    };

    this.book.add(position);
    this.capital.debit(positionSize);
    logger.info(
      { symbol, entryPrice, positionSize, targetPrice, targetMarketCap, openCount: this.book.size },
      "Position opened"
    );
    return true;
  }

  update(id: PositionId, currentPrice: number): PositionUpdate {
    const position = this.book.get(id);
    if (!position || !Number.isFinite(currentPrice) || currentPrice <= 0) {
      return NO_UPDATE;
    }

    position.currentPrice = currentPrice;
    if (currentPrice > position.highWaterMark) {
      position.highWaterMark = currentPrice;
    }

    const decision = this.exitEngine.evaluate(position, currentPrice);
    const event = this.apply(position, decision, currentPrice);
    if (!event) {
      return NO_UPDATE;
    }

    const message = describeEvent(event);
    logger.info({ event }, message);
    return { event, message, closed: event.kind === "trailing_stop" };
  }

  getPosition(id: PositionId): Position | undefined {
    const position = this.book.get(id);
    return position ? { ...position } : undefined;
  }

  listPositions(): Position[] {
    return this.book.values().map((position) => ({ ...position }));
  }

  history(): ClosedTrade[] {
    return this.capital.getHistory();
  }

  snapshot(): LedgerSnapshot {
    return {
      capital: this.capital.getBalance(),
      openCount: this.book.size,
      maxPositions: this.config.maxOpenPositions,
      realizedPnl: this.capital.getRealizedPnl()
    };
  }

  private apply(position: Position, decision: ExitDecision, price: number): TradeEvent | null {
    const symbol = position.symbol;
    switch (decision.rule) {
      case "hold":
        return null;
      case "trailing_stop": {
        const peak = position.highWaterMark;
        const { trade, proceeds } = this.closeFull(position, price, decision.reason);
        return { kind: "trailing_stop", symbol, price, peak, proceeds, netPnl: trade.netPnl };
      }
      case "target_hit": {
        const sale = this.sellPartial(position, decision.sellPortion, price);
        position.targetHit = true;
        return { kind: "target_hit", symbol, price, ...sale };
      }
      case "ladder": {
        const sale = this.sellPartial(position, decision.sellPortion, price);
        position.nextLadderPrice *= this.config.ladderMultiplier;
        return {
          kind: "ladder",
          symbol,
          price,
          multiple: price / position.entryPrice,
          nextLadderPrice: position.nextLadderPrice,
          ...sale
        };
      }
    }
  }

  private sellPartial(position: Position, fraction: number, price: number): { tokensSold: number; proceeds: number } {
    const tokensSold = position.tokensHeld * fraction;
    const proceeds = tokensSold * price;
    position.tokensHeld -= tokensSold;
    position.realizedProceeds += proceeds;
    this.capital.credit(proceeds);
    return { tokensSold, proceeds };
  }

  private closeFull(position: Position, price: number, reason: string): { trade: ClosedTrade; proceeds: number } {
    const tokensSold = position.tokensHeld;
    const proceeds = tokensSold * price;
    position.tokensHeld = 0;
    position.realizedProceeds += proceeds;
    this.capital.credit(proceeds);

    const trade: ClosedTrade = {
      ...position,
      tokensHeld: tokensSold,
      exitReason: reason,
      netPnl: position.realizedProceeds - position.positionSize,
      closedAt: this.clock()
    };
    this.capital.record(trade);
    this.book.remove(position);
    logger.info({ symbol: position.symbol, netPnl: trade.netPnl, reason, capital: this.capital.getBalance() }, "Position closed");
    return { trade, proceeds };
  }
}
