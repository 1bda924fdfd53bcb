/**
 * Leverage Chart Generator
 *
 * Turns a LeverageResult into series for a leverage-vs-strike plot with
 * a secondary break-even axis. Rows with an undefined ratio are left out
 * of the series and reported in `skipped`.
 *
 * Output can be consumed by any charting library (Chart.js, Recharts, D3).
 */

import { isDefined } from "../quant/leverage.js";
import type {
  LeverageResult,
  LeverageRow,
  Ratio,
  ResolvedScenario,
  UndefinedReason,
} from "../types/options.js";

export type SeriesKey = "leverage" | "adjusted";

export interface ChartPoint {
  strike: number;
  value: number;
}

export interface ChartSeries {
  key: SeriesKey;
  label: string;
  marker: "circle" | "cross";
  points: ChartPoint[];
}

export interface LeverageChartData {
  title: string;
  xLabel: string;
  yLabel: string;
  series: ChartSeries[];
  /** Secondary x axis: break-even price at each strike */
  breakEvenAxis: {
    label: string;
    ticks: Array<{ strike: number; label: string }>;
  };
  skipped: Array<{ strike: number; series: SeriesKey; reason: UndefinedReason }>;
}

export interface ChartOptions {
  showAdjusted: boolean;
}

export function buildLeverageChart(
  result: LeverageResult,
  options: ChartOptions
): LeverageChartData {
  const skipped: LeverageChartData["skipped"] = [];

  const collect = (key: SeriesKey, pick: (row: LeverageRow) => Ratio): ChartPoint[] => {
    const points: ChartPoint[] = [];
    for (const row of result.rows) {
      const ratio = pick(row);
      if (isDefined(ratio)) {
        points.push({ strike: row.strike, value: ratio.value });
      } else {
        skipped.push({ strike: row.strike, series: key, reason: ratio.reason });
      }
    }
    return points;
  };

  const series: ChartSeries[] = [
    {
      key: "leverage",
      label: "Leverage Ratio",
      marker: "circle",
      points: collect("leverage", (row) => row.leverageRatio),
    },
  ];

  if (options.showAdjusted) {
    series.push({
      key: "adjusted",
      label: "Adjusted Leverage Ratio",
      marker: "cross",
      points: collect("adjusted", (row) => row.adjustedLeverageRatio),
    });
  }

  return {
    title: "Leverage Ratios vs. Strike Prices",
    xLabel: "Strike Price",
    yLabel: "Leverage Ratio",
    series,
    breakEvenAxis: {
      label: "Break-Even Price",
      ticks: result.rows.map((row) => ({
        strike: row.strike,
        label: row.breakEven.toFixed(1),
      })),
    },
    skipped,
  };
}

/** Current/target price lines shown above the chart */
export function describeScenario(scenario: ResolvedScenario): string[] {
  const { currentPrice, targetPct, targetPrice } = scenario;
  const direction =
    targetPct > 0 ? "increase" : targetPct < 0 ? "decrease" : "change";

  return [
    `Current Price: $${currentPrice.toFixed(2)}`,
    `Target Price (after ${Math.abs(targetPct)}% ${direction}): $${targetPrice.toFixed(2)}`,
  ];
}
