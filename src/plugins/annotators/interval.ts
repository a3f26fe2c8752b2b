import { ValidationError } from "@/lib/errors";
import type { AnnotatorPlugin } from "@/types/plugins";
import type { Event } from "@/types/signals";
import { createEvent } from "@/utils/events";
import { numberParam, stringParam } from "@/utils/params";

const NAME = "IntervalAnnotator";

export type IntervalMode = "above" | "below" | "between" | "outside" | "abs_below";

const MODES: IntervalMode[] = ["above", "below", "between", "outside", "abs_below"];

function isIntervalMode(value: string): value is IntervalMode {
  return MODES.some((mode) => mode === value);
}

interface Condition {
  test: (value: number) => boolean;
  eventName: string;
}

function buildCondition(
  mode: IntervalMode,
  threshold: number,
  lower: number,
  upper: number,
): Condition {
  switch (mode) {
    case "above":
      return { test: (v) => v > threshold, eventName: `above_${threshold}` };
    case "below":
      return { test: (v) => v < threshold, eventName: `below_${threshold}` };
    case "between":
      return {
        test: (v) => v > lower && v < upper,
        eventName: `between_${lower}_${upper}`,
      };
    case "outside":
      return {
        test: (v) => v < lower || v > upper,
        eventName: `outside_${lower}_${upper}`,
      };
    case "abs_below":
      return {
        test: (v) => Math.abs(v) < threshold,
        eventName: `abs_below_${threshold}`,
      };
  }
}

/**
 * Interval events over contiguous runs of samples meeting a condition.
 * Each interval spans the first to the last matching sample.
 */
export const intervalAnnotator: AnnotatorPlugin = {
  kind: "annotator",
  name: NAME,
  version: "1.0.0",
  produces: "interval",
  requiredChannels: {
    signal: { semanticRole: "signal", allowDerived: false },
  },

  getParameters: () => [
    {
      name: "mode",
      label: "Condition Mode",
      type: "enum",
      options: MODES,
      default: "above",
    },
    {
      name: "threshold",
      label: "Threshold",
      type: "float",
      default: 0.0,
      step: 0.1,
    },
    {
      name: "lower_threshold",
      label: "Lower Threshold (for between/outside)",
      type: "float",
      default: -1.0,
      step: 0.1,
    },
    {
      name: "upper_threshold",
      label: "Upper Threshold (for between/outside)",
      type: "float",
      default: 1.0,
      step: 0.1,
    },
    {
      name: "min_duration",
      label: "Minimum Duration",
      type: "float",
      default: 0.0,
      min: 0.0,
      step: 0.01,
      suffix: "s",
    },
  ],

  annotate(inputs, params) {
    const { time, values } = inputs.channels.signal;
    const mode = stringParam(params, "mode", "above");
    if (!isIntervalMode(mode)) {
      throw new ValidationError(`Unknown interval mode '${mode}'`, { mode });
    }

    const { test, eventName } = buildCondition(
      mode,
      numberParam(params, "threshold", 0.0),
      numberParam(params, "lower_threshold", -1.0),
      numberParam(params, "upper_threshold", 1.0),
    );
    const minDuration = numberParam(params, "min_duration", 0.0);

    const events: Event[] = [];
    const close = (start: number, end: number) => {
      const onset = time[start];
      const offset = time[end];
      const duration = offset - onset;
      if (duration < minDuration) return;
      events.push(
        createEvent({
          annotator: NAME,
          name: eventName,
          eventType: "interval",
          onset,
          offset,
          confidence: 1.0,
          metadata: { mode, duration },
        }),
      );
    };

    let start: number | null = null;
    for (let i = 0; i < values.length; i++) {
      const active = test(values[i]);
      if (active && start === null) {
        start = i;
      } else if (!active && start !== null) {
        close(start, i - 1);
        start = null;
      }
    }
    if (start !== null) close(start, values.length - 1);

    return events;
  },
};
