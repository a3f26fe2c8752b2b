/**
 * Time series filters used by the built-in processors.
 * All functions return a new array and keep the input length.
 */

import { InvalidSignalError } from "@/lib/errors";

// ============================================================================
// Butterworth low-pass
// ============================================================================

/** Second-order section; first-order sections have b2 = a2 = 0 */
interface Section {
  b0: number;
  b1: number;
  b2: number;
  a1: number;
  a2: number;
}

/**
 * Design a digital Butterworth low-pass as cascaded sections
 * (bilinear transform with frequency prewarping).
 * @param normalCutoff Cutoff as a fraction of Nyquist, in (0, 1)
 */
export function designButterworthLowpass(
  order: number,
  normalCutoff: number,
): Section[] {
  const k = Math.tan((Math.PI * normalCutoff) / 2);
  const k2 = k * k;
  const sections: Section[] = [];

  const pairs = Math.floor(order / 2);
  for (let i = 0; i < pairs; i++) {
    const angle =
      order % 2 === 0
        ? (Math.PI * (2 * i + 1)) / (2 * order)
        : (Math.PI * (i + 1)) / order;
    const q = 1 / (2 * Math.cos(angle));
    const norm = 1 / (1 + k / q + k2);
    const b0 = k2 * norm;
    sections.push({
      b0,
      b1: 2 * b0,
      b2: b0,
      a1: 2 * (k2 - 1) * norm,
      a2: (1 - k / q + k2) * norm,
    });
  }

  if (order % 2 === 1) {
    const norm = 1 / (1 + k);
    sections.push({ b0: k * norm, b1: k * norm, b2: 0, a1: (k - 1) * norm, a2: 0 });
  }

  return sections;
}

/**
 * Run one section forward, starting from the steady state of the first sample
 */
function runSection(data: number[], s: Section): number[] {
  const out = new Array<number>(data.length);
  const x0 = data[0] ?? 0;
  let z2 = (s.b2 - s.a2) * x0;
  let z1 = (s.b1 - s.a1) * x0 + z2;

  for (let i = 0; i < data.length; i++) {
    const x = data[i];
    const y = s.b0 * x + z1;
    z1 = s.b1 * x - s.a1 * y + z2;
    z2 = s.b2 * x - s.a2 * y;
    out[i] = y;
  }
  return out;
}

function cascade(data: number[], sections: Section[]): number[] {
  return sections.reduce((acc, section) => runSection(acc, section), data);
}

/**
 * Odd extension at both ends, limiting edge transients of forward-backward filtering
 */
function oddExtend(data: number[], padlen: number): number[] {
  const n = data.length;
  const head: number[] = [];
  const tail: number[] = [];
  for (let i = padlen; i >= 1; i--) head.push(2 * data[0] - data[i]);
  for (let i = 1; i <= padlen; i++) tail.push(2 * data[n - 1] - data[n - 1 - i]);
  return [...head, ...data, ...tail];
}

/**
 * Zero-phase Butterworth low-pass (forward-backward)
 */
export function butterworthLowpass(
  data: number[],
  sampleRate: number,
  cutoff: number,
  order = 4,
): number[] {
  const nyq = 0.5 * sampleRate;
  if (!(nyq > 0) || data.length === 0) return [...data];

  let normalCutoff = cutoff / nyq;
  if (normalCutoff >= 1.0) normalCutoff = 0.99;
  if (normalCutoff <= 0.0) normalCutoff = 0.01;

  const sections = designButterworthLowpass(
    Math.max(1, Math.round(order)),
    normalCutoff,
  );
  const padlen = Math.min(3 * (2 * sections.length + 1), data.length - 1);
  const extended = padlen > 0 ? oddExtend(data, padlen) : [...data];

  const forward = cascade(extended, sections);
  const backward = cascade(forward.reverse(), sections).reverse();

  return backward.slice(padlen, padlen + data.length);
}

// ============================================================================
// Savitzky-Golay
// ============================================================================

/**
 * Solve a small dense linear system by Gaussian elimination with partial pivoting
 */
function solveLinear(matrix: number[][], rhs: number[]): number[] {
  const n = rhs.length;
  const a = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    [a[col], a[pivot]] = [a[pivot], a[col]];

    const p = a[col][col];
    if (p === 0) {
      throw new InvalidSignalError("Singular system in polynomial fit");
    }
    for (let row = col + 1; row < n; row++) {
      const factor = a[row][col] / p;
      for (let c = col; c <= n; c++) a[row][c] -= factor * a[col][c];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = a[row][n];
    for (let c = row + 1; c < n; c++) sum -= a[row][c] * x[c];
    x[row] = sum / a[row][row];
  }
  return x;
}

/**
 * Least-squares polynomial coefficients (ascending powers)
 */
function polyfit(xs: number[], ys: number[], degree: number): number[] {
  const m = degree + 1;
  const ata = Array.from({ length: m }, () => new Array<number>(m).fill(0));
  const aty = new Array<number>(m).fill(0);

  for (let i = 0; i < xs.length; i++) {
    const powers = [1];
    for (let p = 1; p < 2 * m; p++) powers.push(powers[p - 1] * xs[i]);
    for (let r = 0; r < m; r++) {
      aty[r] += powers[r] * ys[i];
      for (let c = 0; c < m; c++) ata[r][c] += powers[r + c];
    }
  }
  return solveLinear(ata, aty);
}

function polyval(coeffs: number[], x: number): number {
  let result = 0;
  for (let i = coeffs.length - 1; i >= 0; i--) result = result * x + coeffs[i];
  return result;
}

/**
 * Savitzky-Golay smoothing. Edge windows are fitted with a polynomial of the
 * same order and evaluated at the edge positions.
 */
export function savitzkyGolay(
  data: number[],
  windowLength: number,
  polyorder: number,
): number[] {
  let window = Math.round(windowLength);
  if (window % 2 === 0) window += 1;
  let order = Math.round(polyorder);
  if (order >= window) order = window - 1;

  const n = data.length;
  if (n < window) {
    throw new InvalidSignalError(
      `Savitzky-Golay window (${window}) is longer than the signal (${n})`,
      { window, samples: n },
    );
  }

  const half = (window - 1) / 2;
  const offsets = Array.from({ length: window }, (_, i) => i - half);

  // Convolution weights: value of the fitted polynomial at the window center
  const weights = offsets.map((_, j) => {
    const unit = offsets.map((__, i) => (i === j ? 1 : 0));
    return polyfit(offsets, unit, order)[0];
  });

  const out = new Array<number>(n);
  for (let i = half; i < n - half; i++) {
    let sum = 0;
    for (let j = 0; j < window; j++) sum += weights[j] * data[i - half + j];
    out[i] = sum;
  }

  const positions = Array.from({ length: window }, (_, i) => i);
  const headFit = polyfit(positions, data.slice(0, window), order);
  const tailFit = polyfit(positions, data.slice(n - window), order);
  for (let i = 0; i < half; i++) {
    out[i] = polyval(headFit, i);
    out[n - half + i] = polyval(tailFit, window - half + i);
  }

  return out;
}

// ============================================================================
// Rolling mean & detrend
// ============================================================================

/**
 * Moving average as a centered "same"-length convolution; samples outside
 * the signal count as zero.
 */
export function rollingMean(data: number[], windowSize: number): number[] {
  const m = Math.max(1, Math.round(windowSize));
  const offset = Math.floor((m - 1) / 2);
  const out = new Array<number>(data.length);

  for (let i = 0; i < data.length; i++) {
    let sum = 0;
    const start = i + offset - m + 1;
    for (let j = start; j <= i + offset; j++) {
      if (j >= 0 && j < data.length) sum += data[j];
    }
    out[i] = sum / m;
  }
  return out;
}

/**
 * Remove the least-squares linear trend
 */
export function detrendLinear(data: number[]): number[] {
  const n = data.length;
  if (n < 2) return data.map(() => 0);

  const xMean = (n - 1) / 2;
  const yMean = data.reduce((sum, val) => sum + val, 0) / n;

  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i++) {
    numerator += (i - xMean) * (data[i] - yMean);
    denominator += (i - xMean) ** 2;
  }

  const slope = numerator / denominator;
  const intercept = yMean - slope * xMean;

  return data.map((val, i) => val - (slope * i + intercept));
}
