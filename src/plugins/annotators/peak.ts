/**
 * PeakAnnotator - local maxima (or valleys) as timepoint events.
 *
 * Candidate selection follows the usual find-peaks order: local maxima
 * (plateaus resolved to their middle sample), then minimum height, then
 * minimum distance (higher peaks win), then prominence.
 */

import type { AnnotatorPlugin } from "@/types/plugins";
import { createEvent } from "@/utils/events";
import { booleanParam, numberParam } from "@/utils/params";

const NAME = "PeakAnnotator";

export interface PeakOptions {
  /** Minimum peak value; ignored unless > 0 */
  height?: number;
  /** Minimum spacing in samples */
  distance?: number;
  /** Minimum prominence; ignored unless > 0 */
  prominence?: number;
}

/**
 * Indices of local maxima. A flat top counts once, at its middle sample
 * (rounded down); flat tops touching either edge do not count.
 */
export function localMaxima(values: number[]): number[] {
  const peaks: number[] = [];
  const last = values.length - 1;

  let i = 1;
  while (i < last) {
    if (values[i - 1] < values[i]) {
      let ahead = i + 1;
      while (ahead < last && values[ahead] === values[i]) ahead++;
      if (values[ahead] < values[i]) {
        peaks.push(Math.floor((i + ahead - 1) / 2));
        i = ahead;
      }
    }
    i++;
  }
  return peaks;
}

/**
 * Height of a peak above the higher of the two lowest points reachable
 * before the signal rises above the peak on either side.
 */
export function peakProminence(values: number[], peak: number): number {
  const top = values[peak];

  let leftMin = top;
  for (let i = peak; i >= 0 && values[i] <= top; i--) {
    if (values[i] < leftMin) leftMin = values[i];
  }

  let rightMin = top;
  for (let i = peak; i < values.length && values[i] <= top; i++) {
    if (values[i] < rightMin) rightMin = values[i];
  }

  return top - Math.max(leftMin, rightMin);
}

function enforceDistance(
  values: number[],
  peaks: number[],
  distance: number,
): number[] {
  if (distance <= 1 || peaks.length < 2) return peaks;

  const keep = peaks.map(() => true);
  const priority = peaks
    .map((_, idx) => idx)
    .sort((a, b) => values[peaks[a]] - values[peaks[b]] || a - b);

  for (let p = priority.length - 1; p >= 0; p--) {
    const j = priority[p];
    if (!keep[j]) continue;
    for (let k = j - 1; k >= 0 && peaks[j] - peaks[k] < distance; k--) {
      keep[k] = false;
    }
    for (let k = j + 1; k < peaks.length && peaks[k] - peaks[j] < distance; k++) {
      keep[k] = false;
    }
  }

  return peaks.filter((_, idx) => keep[idx]);
}

export function findPeaks(values: number[], options: PeakOptions = {}): number[] {
  const { height = 0, distance = 1, prominence = 0 } = options;

  let peaks = localMaxima(values);
  if (height > 0) {
    peaks = peaks.filter((idx) => values[idx] >= height);
  }
  peaks = enforceDistance(values, peaks, distance);
  if (prominence > 0) {
    peaks = peaks.filter((idx) => peakProminence(values, idx) >= prominence);
  }
  return peaks;
}

export const peakAnnotator: AnnotatorPlugin = {
  kind: "annotator",
  name: NAME,
  version: "1.0.0",
  produces: "timepoint",
  requiredChannels: {
    signal: { semanticRole: "signal", allowDerived: false },
  },

  getParameters: () => [
    {
      name: "height",
      label: "Minimum Height",
      type: "float",
      default: 0.0,
      step: 0.1,
    },
    {
      name: "distance",
      label: "Minimum Distance",
      type: "int",
      default: 1,
      min: 1,
      max: 1000,
      suffix: "samples",
    },
    {
      name: "prominence",
      label: "Prominence",
      type: "float",
      default: 0.0,
      min: 0.0,
      step: 0.1,
    },
    {
      name: "detect_valleys",
      label: "Detect Valleys (Minima)",
      type: "bool",
      default: false,
    },
  ],

  annotate(inputs, params) {
    const { time, values } = inputs.channels.signal;
    const detectValleys = booleanParam(params, "detect_valleys", false);
    const searched = detectValleys ? values.map((v) => -v) : values;

    const peaks = findPeaks(searched, {
      height: numberParam(params, "height", 0),
      distance: numberParam(params, "distance", 1),
      prominence: numberParam(params, "prominence", 0),
    });

    return peaks.map((idx) =>
      createEvent({
        annotator: NAME,
        name: detectValleys ? "valley" : "peak",
        eventType: "timepoint",
        onset: time[idx],
        confidence: 1.0,
        metadata: { value: values[idx], index: idx },
      }),
    );
  },
};
