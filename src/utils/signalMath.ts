/**
 * Numeric helpers for time-series channels.
 * NaN marks a missing sample throughout.
 */

import { InvalidSignalError, LengthMismatchError } from "@/lib/errors";

function median(values: number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/**
 * Estimate sampling rate in Hz from the median sample spacing.
 * @returns null for fewer than 2 samples or non-positive spacing
 */
export function estimateSamplingRate(time: number[]): number | null {
  if (time.length < 2) return null;

  const diffs: number[] = [];
  for (let i = 1; i < time.length; i++) {
    diffs.push(time[i] - time[i - 1]);
  }

  const dt = median(diffs);
  if (!(dt > 0)) return null;
  return 1 / dt;
}

/**
 * Fill NaNs: linear interpolation between valid neighbours, leading and
 * trailing gaps held at the nearest valid value. All-NaN input is returned
 * unchanged.
 */
export function interpolateMissing(values: number[]): number[] {
  const result = [...values];
  const valid: number[] = [];
  for (let i = 0; i < result.length; i++) {
    if (!Number.isNaN(result[i])) valid.push(i);
  }
  if (valid.length === 0 || valid.length === result.length) return result;

  const first = valid[0];
  const last = valid[valid.length - 1];
  for (let i = 0; i < first; i++) result[i] = result[first];
  for (let i = last + 1; i < result.length; i++) result[i] = result[last];

  for (let k = 0; k < valid.length - 1; k++) {
    const lo = valid[k];
    const hi = valid[k + 1];
    if (hi - lo < 2) continue;
    const span = hi - lo;
    for (let i = lo + 1; i < hi; i++) {
      const frac = (i - lo) / span;
      result[i] = result[lo] + frac * (result[hi] - result[lo]);
    }
  }

  return result;
}

/**
 * First derivative against a (possibly non-uniform) time axis.
 * Second-order central differences inside, first-order differences at the edges.
 */
export function gradient(values: number[], time: number[]): number[] {
  const n = values.length;
  if (time.length !== n) {
    throw new LengthMismatchError([n, time.length], {
      reason: "values and time axis differ in length",
    });
  }
  if (n < 2) {
    throw new InvalidSignalError(
      `At least 2 samples are required to differentiate, got ${n}`,
      { samples: n },
    );
  }

  const out = new Array<number>(n);
  out[0] = (values[1] - values[0]) / (time[1] - time[0]);
  out[n - 1] = (values[n - 1] - values[n - 2]) / (time[n - 1] - time[n - 2]);

  for (let i = 1; i < n - 1; i++) {
    const hs = time[i] - time[i - 1];
    const hd = time[i + 1] - time[i];
    out[i] =
      (hs * hs * values[i + 1] +
        (hd * hd - hs * hs) * values[i] -
        hd * hd * values[i - 1]) /
      (hs * hd * (hd + hs));
  }

  return out;
}

/**
 * Derivative of the given order (1 = velocity, 2 = acceleration).
 */
export function computeDerivative(
  time: number[],
  values: number[],
  order = 1,
): number[] {
  if (!Number.isInteger(order) || order < 1) {
    throw new InvalidSignalError(
      `Derivative order must be a positive integer, got ${order}`,
      { order },
    );
  }

  let result = values;
  for (let i = 0; i < order; i++) {
    result = gradient(result, time);
  }
  return result;
}

/**
 * Elementwise mean over equal-length arrays, ignoring NaN.
 * Positions where every input is NaN stay NaN.
 */
export function nanMeanElementwise(arrays: number[][]): number[] {
  const lengths = arrays.map((arr) => arr.length);
  if (new Set(lengths).size > 1) {
    throw new LengthMismatchError(lengths);
  }

  const n = lengths[0] ?? 0;
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    let sum = 0;
    let count = 0;
    for (const arr of arrays) {
      const v = arr[i];
      if (!Number.isNaN(v)) {
        sum += v;
        count++;
      }
    }
    out[i] = count > 0 ? sum / count : NaN;
  }
  return out;
}

// ============================================================================
// NaN-aware descriptive statistics
// ============================================================================

export function finiteValues(values: number[]): number[] {
  return values.filter((v) => Number.isFinite(v));
}

export function nanMean(values: number[]): number {
  const valid = values.filter((v) => !Number.isNaN(v));
  if (valid.length === 0) return NaN;
  let sum = 0;
  for (const v of valid) sum += v;
  return sum / valid.length;
}

/** Population standard deviation */
export function nanStd(values: number[]): number {
  const valid = values.filter((v) => !Number.isNaN(v));
  if (valid.length === 0) return NaN;
  const m = nanMean(valid);
  let sumSq = 0;
  for (const v of valid) sumSq += (v - m) * (v - m);
  return Math.sqrt(sumSq / valid.length);
}

/**
 * Percentile (0-100) with linear interpolation between closest ranks.
 */
export function nanPercentile(values: number[], p: number): number {
  const sorted = values
    .filter((v) => !Number.isNaN(v))
    .sort((a, b) => a - b);
  const n = sorted.length;
  if (n === 0) return NaN;
  if (n === 1) return sorted[0];

  const idx = (p / 100) * (n - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const frac = idx - lo;
  return sorted[lo] * (1 - frac) + sorted[hi] * frac;
}
