import { InvestmentReport } from "../models/PlanningResult";

/**
 * Presentation sink for a planning report. One sink is selected at startup;
 * the analytics core never formats text itself.
 */
export interface ReportSink {
  readonly format: ReportFormat;
  write(report: InvestmentReport): string;
}

export type ReportFormat = "text" | "json";

const currency = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(amount: number): string {
  return `$${currency.format(amount)}`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

/**
 * Plain-text report for terminals
 */
export class TextReportSink implements ReportSink {
  readonly format = "text" as const;

  write(report: InvestmentReport): string {
    const { recommendation, schedule } = report;
    const by = report.targetDate
      ? `by ${report.targetDate}`
      : `in ${report.horizonYears.toFixed(1)} years`;

    const lines = [
      "Investment Recommendations",
      "",
      `Based on your goals and timeframe, we recommend investing in ${recommendation.id}`,
      "",
      `To reach your goal of ${formatCurrency(report.goalAmount)} ${by}, you should invest:`,
      `  ${formatCurrency(schedule.yearly)} yearly`,
      `  ${formatCurrency(schedule.monthly)} monthly`,
      `  ${formatCurrency(schedule.weekly)} weekly`,
      "",
      "Key Metrics:",
      `Average Annual Return: ${formatPercent(recommendation.metrics.avgAnnualReturn)}`,
      `Volatility: ${formatPercent(recommendation.metrics.volatility)}`,
      `Maximum Drawdown: ${formatPercent(recommendation.metrics.maxDrawdown)}`,
      "",
      "Scores:",
      ...report.ranking.map((c) => `  ${c.id}: ${c.score.toFixed(4)}`),
    ];
    return lines.join("\n");
  }
}

/**
 * Machine-readable report, pretty-printed JSON
 */
export class JsonReportSink implements ReportSink {
  readonly format = "json" as const;

  write(report: InvestmentReport): string {
    return JSON.stringify(report, null, 2);
  }
}

/**
 * Pick the report sink for this process
 */
export function selectReportSink(format: ReportFormat): ReportSink {
  switch (format) {
    case "text":
      return new TextReportSink();
    case "json":
      return new JsonReportSink();
  }
}

export function isReportFormat(value: string): value is ReportFormat {
  return value === "text" || value === "json";
}
