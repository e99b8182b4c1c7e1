import type { Direction, Signal } from '../core/types.js';

export interface OpenPosition {
  signalId: string;
  symbol: string;
  direction: Direction;
  entry: number;
  quantity: number;
  openedAt: number;
}

/** What the agent needs to know about exposure. Execution itself lives elsewhere. */
export interface PortfolioView {
  openPositions(now: number): OpenPosition[];
  hasOpenPosition(symbol: string, now: number): boolean;
  open(signal: Signal, now: number): OpenPosition;
  close(symbol: string): boolean;
}

/**
 * Paper portfolio: a position counts as open for `holdMs` after the signal
 * that opened it, then frees its slot.
 */
export class InMemoryPortfolio implements PortfolioView {
  private readonly positions = new Map<string, OpenPosition>();

  constructor(private readonly holdMs: number) {}

  openPositions(now: number): OpenPosition[] {
    this.expire(now);
    return [...this.positions.values()];
  }

  hasOpenPosition(symbol: string, now: number): boolean {
    this.expire(now);
    return this.positions.has(symbol);
  }

  open(signal: Signal, now: number): OpenPosition {
    const position: OpenPosition = {
      signalId: signal.id,
      symbol: signal.symbol,
      direction: signal.direction,
      entry: signal.entry,
      quantity: signal.quantity,
      openedAt: now
    };
    this.positions.set(signal.symbol, position);
    return position;
  }

  close(symbol: string): boolean {
    return this.positions.delete(symbol);
  }

  private expire(now: number): void {
    for (const [symbol, p] of this.positions) {
      if (now - p.openedAt >= this.holdMs) this.positions.delete(symbol);
    }
  }
}
