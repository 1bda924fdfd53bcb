/**
 * Leverage Chart Generator Tests
 */

import { describe, it, expect } from "vitest";
import { buildLeverageChart, describeScenario } from "../../src/xai/leverage-chart.js";
import { computeLeverage, filterByStrikeRange } from "../../src/quant/leverage.js";

const result = computeLeverage(
  [
    { strike: 90, ask: 12 },
    { strike: 95, ask: 0 },
    { strike: 110, ask: 1 },
  ],
  100,
  20
);

describe("buildLeverageChart", () => {
  it("should emit leverage and adjusted series when showAdjusted is set", () => {
    const chart = buildLeverageChart(result, { showAdjusted: true });

    expect(chart.title).toBe("Leverage Ratios vs. Strike Prices");
    expect(chart.series.map((s) => s.label)).toEqual([
      "Leverage Ratio",
      "Adjusted Leverage Ratio",
    ]);
    expect(chart.series[0].marker).toBe("circle");
    expect(chart.series[1].marker).toBe("cross");
  });

  it("should omit the adjusted series when showAdjusted is off", () => {
    const chart = buildLeverageChart(result, { showAdjusted: false });
    expect(chart.series.map((s) => s.key)).toEqual(["leverage"]);
    expect(chart.skipped).toEqual([{ strike: 95, series: "leverage", reason: "zero_premium" }]);
  });

  it("should skip undefined ratios and report them", () => {
    const chart = buildLeverageChart(result, { showAdjusted: true });

    expect(chart.series[0].points.map((p) => p.strike)).toEqual([90, 110]);
    expect(chart.series[0].points[1].value).toBe(100);
    expect(chart.series[1].points.map((p) => p.strike)).toEqual([90, 110]);
    expect(chart.skipped).toEqual([
      { strike: 95, series: "leverage", reason: "zero_premium" },
      { strike: 95, series: "adjusted", reason: "zero_premium" },
    ]);
  });

  it("should label the break-even axis to one decimal at each strike", () => {
    const chart = buildLeverageChart(result, { showAdjusted: true });
    expect(chart.breakEvenAxis.label).toBe("Break-Even Price");
    expect(chart.breakEvenAxis.ticks).toEqual([
      { strike: 90, label: "102.0" },
      { strike: 95, label: "95.0" },
      { strike: 110, label: "111.0" },
    ]);
  });

  it("should render an empty chart for an empty strike band", () => {
    const empty = filterByStrikeRange(result, 100, 10, -10);
    const chart = buildLeverageChart(empty, { showAdjusted: true });
    expect(chart.series.every((s) => s.points.length === 0)).toBe(true);
    expect(chart.breakEvenAxis.ticks).toEqual([]);
    expect(chart.skipped).toEqual([]);
  });
});

describe("describeScenario", () => {
  it("should describe an increase", () => {
    expect(describeScenario(result.scenario)).toEqual([
      "Current Price: $100.00",
      "Target Price (after 20% increase): $120.00",
    ]);
  });

  it("should describe a decrease with the absolute move", () => {
    const down = computeLeverage([{ strike: 100, ask: 5 }], 250, -12.5);
    expect(describeScenario(down.scenario)).toEqual([
      "Current Price: $250.00",
      "Target Price (after 12.5% decrease): $218.75",
    ]);
  });
});
