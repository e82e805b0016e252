import { ClosedTrade } from "../core/types.js";

/** Read side of the ledger handed out to reporting code. */
export interface LedgerView {
  getBalance(): number;
  getHistory(): ClosedTrade[];
  getRealizedPnl(): number;
}

/**
 * Free cash plus closed-trade history. Capital is uncommitted cash, not
 * mark-to-market equity: it drops by a position's size at open and rises
 * by every sale's proceeds as they happen. Only the position manager holds
 * an instance; everyone else sees a `LedgerView`.
 */
export class CapitalLedger implements LedgerView {
  private capital: number;
  private readonly closed: ClosedTrade[] = [];

  constructor(initialCapital: number) {
    this.capital = initialCapital;
  }

  getBalance(): number {
    return this.capital;
  }

  /** Copies; the recorded trades cannot be changed through the result. */
  getHistory(): ClosedTrade[] {
    return this.closed.map((trade) => ({ ...trade }));
  }

  getRealizedPnl(): number {
    return this.closed.reduce((sum, trade) => sum + trade.netPnl, 0);
  }

  debit(amount: number): void {
    this.capital -= amount;
  }

  credit(amount: number): void {
    this.capital += amount;
  }

  record(trade: ClosedTrade): void {
    this.closed.push(trade);
  }
}
