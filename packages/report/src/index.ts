import type { BacktestResult, Position, Trade } from "@quantlens/sdk";
import type { Recommendation } from "@quantlens/signals";

export interface ReportPayload {
  readonly symbol: string;
  readonly result: BacktestResult;
  readonly runId?: string;
  readonly strategyName?: string;
  readonly recommendation?: Recommendation;
}

const money = (value: number): string => value.toFixed(2);
const percent = (value: number): string => `${value.toFixed(2)}%`;

const summaryRows = (result: BacktestResult): Array<[string, string]> => [
  ["Initial capital", money(result.initialCapital)],
  ["Final value", money(result.finalValue)],
  ["Total return", `${money(result.totalReturn)} (${percent(result.totalReturnPct)})`],
  [
    "Trades",
    `${result.totalTrades} (${result.profitableTrades} winning, ${result.losingTrades} losing)`,
  ],
  ["Win rate", percent(result.winRate)],
  ["Average profit", money(result.avgProfit)],
  ["Average loss", money(result.avgLoss)],
  ["Max drawdown", percent(result.maxDrawdown)],
  ["Sharpe ratio", result.sharpeRatio.toFixed(2)],
  ["Sortino ratio", result.sortinoRatio.toFixed(2)],
  ["CAGR", percent(result.cagr * 100)],
];

const describePosition = (position: Position): string => {
  if (position.entryPrice === null || position.entryTimestamp === null) {
    return `Flat with ${money(position.cash)} cash.`;
  }
  return (
    `Long ${position.sharesHeld.toFixed(4)} shares since ${position.entryTimestamp} ` +
    `at ${money(position.entryPrice)}; cash ${money(position.cash)}.`
  );
};

const tradeRow = (trade: Trade, index: number): string =>
  `| ${index + 1} | ${trade.entryTimestamp} | ${money(trade.entryPrice)} | ${trade.exitTimestamp} | ` +
  `${money(trade.exitPrice)} | ${trade.shares.toFixed(4)} | ${money(trade.pnl)} | ` +
  `${percent(trade.pnlPct)} | ${trade.exitReason} |`;

const recommendationSection = (recommendation: Recommendation): string[] => [
  "## Recommendation",
  "",
  `**${recommendation.action}** with confidence ${recommendation.confidence.toFixed(1)}/10 ` +
    `as of ${recommendation.timestamp}${recommendation.advised ? " (advisor consulted)" : ""}.`,
  "",
  `- Market outlook: ${recommendation.marketOutlook}`,
  `- Entry strategy: ${recommendation.entryStrategy}`,
  `- Risk management: ${recommendation.riskManagement}`,
  `- Time horizon: ${recommendation.timeHorizon}`,
  "",
  "### Signals",
  "",
  ...(recommendation.signals.length > 0
    ? recommendation.signals.map((line) => `- ${line}`)
    : ["- Not enough history for any indicator."]),
  "",
];

/**
 * Renders a backtest result, and optionally the latest recommendation, as
 * Markdown. Output always ends with a single newline.
 */
export const buildReportMarkdown = (payload: ReportPayload): string => {
  const { symbol, result } = payload;
  const lines: string[] = [`# Backtest report: ${symbol}`, ""];

  const details = [
    payload.runId ? `Run \`${payload.runId}\`` : null,
    payload.strategyName ? `strategy \`${payload.strategyName}\`` : null,
    `${result.equityCurve.length} bars`,
  ].filter((part): part is string => part !== null);
  lines.push(`${details.join(", ")}.`, "");

  lines.push("## Summary", "", "| Metric | Value |", "| --- | --- |");
  for (const [label, value] of summaryRows(result)) {
    lines.push(`| ${label} | ${value} |`);
  }
  lines.push("", "## Final position", "", describePosition(result.finalPosition), "");

  lines.push("## Trades", "");
  if (result.trades.length === 0) {
    lines.push("No trades were closed.", "");
  } else {
    lines.push(
      "| # | Entry | Entry price | Exit | Exit price | Shares | PnL | PnL % | Exit reason |",
      "| --- | --- | --- | --- | --- | --- | --- | --- | --- |",
      ...result.trades.map(tradeRow),
      "",
    );
  }

  if (payload.recommendation) {
    lines.push(...recommendationSection(payload.recommendation));
  }

  return `${lines.join("\n").trimEnd()}\n`;
};
