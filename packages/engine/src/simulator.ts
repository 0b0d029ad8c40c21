import type {
  Bar,
  Decision,
  EquityPoint,
  ExitReason,
  Position,
  PositionSizing,
  Trade,
} from "@quantlens/sdk";
import { silentLogger, type Logger } from "@quantlens/logger";

export type SimulatorState = "FLAT" | "LONG";

export interface SimulatorOptions {
  readonly initialCapital: number;
  readonly positionSizing?: PositionSizing;
  readonly logger?: Logger;
}

/**
 * Single-asset, all-in/all-out position tracker. One instance per run.
 */
export interface Simulator {
  readonly state: SimulatorState;
  readonly position: Position;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  /** Applies the decision at the bar close and records one equity point. */
  step(bar: Bar, decision: Decision): EquityPoint;
  /** Closes an open position at the bar close; `null` while flat. */
  liquidate(bar: Bar, reason: ExitReason): Trade | null;
}

interface OpenPosition {
  cash: number;
  sharesHeld: number;
  entryPrice: number | null;
  entryTimestamp: string | null;
}

export const createSimulator = ({
  initialCapital,
  positionSizing = "fractional",
  logger = silentLogger,
}: SimulatorOptions): Simulator => {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new Error(`initialCapital must be a positive number, received ${initialCapital}`);
  }

  const position: OpenPosition = {
    cash: initialCapital,
    sharesHeld: 0,
    entryPrice: null,
    entryTimestamp: null,
  };
  const trades: Trade[] = [];
  const equityCurve: EquityPoint[] = [];

  const isLong = (): boolean => position.entryPrice !== null;

  const openPosition = (bar: Bar): void => {
    const price = bar.close;
    const shares =
      positionSizing === "whole" ? Math.floor(position.cash / price) : position.cash / price;
    if (shares <= 0) {
      logger.debug("Insufficient cash to open a position", {
        timestamp: bar.timestamp,
        cash: position.cash,
        price,
      });
      return;
    }
    position.cash = positionSizing === "whole" ? Math.max(0, position.cash - shares * price) : 0;
    position.sharesHeld = shares;
    position.entryPrice = price;
    position.entryTimestamp = bar.timestamp;
    logger.debug("Opened long position", { timestamp: bar.timestamp, price, shares });
  };

  const closePosition = (bar: Bar, reason: ExitReason): Trade | null => {
    if (position.entryPrice === null || position.entryTimestamp === null) {
      return null;
    }
    const exitPrice = bar.close;
    const shares = position.sharesHeld;
    const pnl = shares * (exitPrice - position.entryPrice);
    const trade: Trade = {
      entryTimestamp: position.entryTimestamp,
      entryPrice: position.entryPrice,
      exitTimestamp: bar.timestamp,
      exitPrice,
      shares,
      pnl,
      pnlPct: ((exitPrice - position.entryPrice) / position.entryPrice) * 100,
      exitReason: reason,
    };
    position.cash += shares * exitPrice;
    position.sharesHeld = 0;
    position.entryPrice = null;
    position.entryTimestamp = null;
    trades.push(trade);
    logger.debug("Closed long position", {
      timestamp: bar.timestamp,
      price: exitPrice,
      shares,
      pnl,
      reason,
    });
    return trade;
  };

  return {
    get state(): SimulatorState {
      return isLong() ? "LONG" : "FLAT";
    },
    get position(): Position {
      return { ...position };
    },
    get trades(): ReadonlyArray<Trade> {
      return trades;
    },
    get equityCurve(): ReadonlyArray<EquityPoint> {
      return equityCurve;
    },
    step(bar, decision) {
      if (decision.action === "BUY" && !isLong()) {
        openPosition(bar);
      } else if (decision.action === "SELL" && isLong()) {
        closePosition(bar, "signal");
      }
      const point: EquityPoint = {
        timestamp: bar.timestamp,
        portfolioValue: position.cash + position.sharesHeld * bar.close,
      };
      equityCurve.push(point);
      return point;
    },
    liquidate(bar, reason) {
      return closePosition(bar, reason);
    },
  };
};
