import { describe, it, expect } from "vitest";
import { parsePercentiles, summaryStats } from "../summaryStats";
import { signalInputs } from "@/__tests__/fixtures";

const inputs = () => signalInputs([0, 1, 2, 3, 4], [1, 2, 3, 4, NaN]);

describe("parsePercentiles", () => {
  it("parses a comma-separated list", () => {
    expect(parsePercentiles("10, 90")).toEqual([10, 90]);
    expect(parsePercentiles("")).toEqual([]);
  });

  it("falls back to the quartiles on bad input", () => {
    expect(parsePercentiles("10,abc")).toEqual([25, 75]);
  });
});

describe("summaryStats", () => {
  it("computes one row of NaN-aware statistics", () => {
    expect(summaryStats.compute(inputs(), {})).toEqual([
      {
        mean: 2.5,
        std: Math.sqrt(1.25),
        min: 1,
        max: 4,
        median: 2.5,
        count: 5,
        valid_count: 4,
        p25: 1.75,
        p75: 3.25,
        range: 3,
        iqr: 1.5,
      },
    ]);
  });

  it("truncates percentile column names", () => {
    const [row] = summaryStats.compute(inputs(), {
      percentiles: "50, 12.7",
      include_range: false,
      include_iqr: false,
    });
    expect(Object.keys(row)).toEqual([
      "mean",
      "std",
      "min",
      "max",
      "median",
      "count",
      "valid_count",
      "p50",
      "p12",
    ]);
  });

  it("adds shape moments when asked", () => {
    const [row] = summaryStats.compute(inputs(), { include_skew_kurtosis: true });
    expect(row.skewness).toBe(0);
    expect(row.kurtosis).toBeCloseTo(-1.36, 10);
  });

  it("adds derivative statistics when asked", () => {
    const [row] = summaryStats.compute(inputs(), { include_derivatives: true });
    expect(row.derivative_mean).toBe(1);
    expect(row.derivative_std).toBe(0);
    expect(row.derivative_max).toBe(1);
  });

  it("skips derivative statistics for a single sample", () => {
    const [row] = summaryStats.compute(signalInputs([0], [5]), {
      include_derivatives: true,
    });
    expect(row).not.toHaveProperty("derivative_mean");
    expect(row.mean).toBe(5);
    expect(row.std).toBe(0);
  });
});
