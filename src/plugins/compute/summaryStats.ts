/**
 * SummaryStats - descriptive statistics for one bound signal channel.
 * Produces a single-row metrics table. NaN samples are ignored everywhere
 * except `count`.
 */

import type { ComputePlugin, MetricsRow } from "@/types/plugins";
import { booleanParam, stringParam } from "@/utils/params";
import {
  computeDerivative,
  nanMean,
  nanPercentile,
  nanStd,
} from "@/utils/signalMath";

const DEFAULT_PERCENTILES = [25, 75];

/**
 * "25, 75" → [25, 75]; any unparseable entry falls back to the defaults
 */
export function parsePercentiles(spec: string): number[] {
  const parts = spec
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
  const parsed = parts.map(Number);
  if (parsed.some((p) => !Number.isFinite(p))) return DEFAULT_PERCENTILES;
  return parsed;
}

function nanExtent(values: number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (Number.isNaN(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min > max ? { min: NaN, max: NaN } : { min, max };
}

/** Biased (population) skewness and excess kurtosis */
function shapeMoments(values: number[]): { skewness: number; kurtosis: number } {
  const valid = values.filter((v) => !Number.isNaN(v));
  const m = nanMean(valid);
  let m2 = 0;
  let m3 = 0;
  let m4 = 0;
  for (const v of valid) {
    const d = v - m;
    m2 += d * d;
    m3 += d * d * d;
    m4 += d * d * d * d;
  }
  const n = valid.length;
  m2 /= n;
  m3 /= n;
  m4 /= n;
  return { skewness: m3 / m2 ** 1.5, kurtosis: m4 / (m2 * m2) - 3 };
}

export const summaryStats: ComputePlugin = {
  kind: "compute",
  name: "SummaryStats",
  version: "1.0.0",
  requiredChannels: {
    signal: { semanticRole: "signal", allowDerived: false },
  },
  requiredEvents: {},

  getParameters: () => [
    {
      name: "percentiles",
      label: "Percentiles (comma-separated)",
      type: "str",
      default: "25,75",
    },
    {
      name: "include_derivatives",
      label: "Include Derivative Stats",
      type: "bool",
      default: false,
    },
    {
      name: "include_range",
      label: "Include Range (max-min)",
      type: "bool",
      default: true,
    },
    {
      name: "include_iqr",
      label: "Include IQR",
      type: "bool",
      default: true,
    },
    {
      name: "include_skew_kurtosis",
      label: "Include Skewness/Kurtosis",
      type: "bool",
      default: false,
    },
  ],

  compute(inputs, params) {
    const { time, values } = inputs.channels.signal;
    const { min, max } = nanExtent(values);

    const row: MetricsRow = {
      mean: nanMean(values),
      std: nanStd(values),
      min,
      max,
      median: nanPercentile(values, 50),
      count: values.length,
      valid_count: values.filter((v) => !Number.isNaN(v)).length,
    };

    for (const pct of parsePercentiles(stringParam(params, "percentiles", "25,75"))) {
      row[`p${Math.trunc(pct)}`] = nanPercentile(values, pct);
    }

    if (booleanParam(params, "include_range", true)) {
      row.range = max - min;
    }

    if (booleanParam(params, "include_iqr", true)) {
      row.iqr = nanPercentile(values, 75) - nanPercentile(values, 25);
    }

    if (booleanParam(params, "include_skew_kurtosis", false)) {
      Object.assign(row, shapeMoments(values));
    }

    // Derivative stats need at least two samples
    if (booleanParam(params, "include_derivatives", false) && values.length >= 2) {
      const dy = computeDerivative(time, values, 1);
      row.derivative_mean = nanMean(dy);
      row.derivative_std = nanStd(dy);
      row.derivative_max = nanExtent(dy.map(Math.abs)).max;
    }

    return [row];
  },
};
