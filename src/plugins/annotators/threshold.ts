import { ValidationError } from "@/lib/errors";
import type { AnnotatorPlugin } from "@/types/plugins";
import type { Event } from "@/types/signals";
import { createEvent, sortByOnset } from "@/utils/events";
import { numberParam, stringParam } from "@/utils/params";

const NAME = "ThresholdAnnotator";
const DIRECTIONS = ["rising", "falling", "both"];

/**
 * Timepoint events where a signal crosses a threshold. The event sits on the
 * first sample past the crossing.
 */
export const thresholdAnnotator: AnnotatorPlugin = {
  kind: "annotator",
  name: NAME,
  version: "1.0.0",
  produces: "timepoint",
  requiredChannels: {
    signal: { semanticRole: "signal", allowDerived: false },
  },

  getParameters: () => [
    {
      name: "threshold",
      label: "Threshold",
      type: "float",
      default: 0.0,
      step: 0.1,
    },
    {
      name: "direction",
      label: "Direction",
      type: "enum",
      options: DIRECTIONS,
      default: "rising",
    },
  ],

  annotate(inputs, params) {
    const { time, values } = inputs.channels.signal;
    const threshold = numberParam(params, "threshold", 0.0);
    const direction = stringParam(params, "direction", "rising");
    if (!DIRECTIONS.includes(direction)) {
      throw new ValidationError(`Unknown crossing direction '${direction}'`, {
        direction,
      });
    }

    const events: Event[] = [];
    const crossing = (idx: number, kind: "rising" | "falling") =>
      createEvent({
        annotator: NAME,
        name: `threshold_${kind}`,
        eventType: "timepoint",
        onset: time[idx],
        confidence: 1.0,
        metadata: { threshold, direction: kind },
      });

    for (let i = 1; i < values.length; i++) {
      const wasAbove = values[i - 1] > threshold;
      const isAbove = values[i] > threshold;
      if (!wasAbove && isAbove && direction !== "falling") {
        events.push(crossing(i, "rising"));
      }
      if (wasAbove && !isAbove && direction !== "rising") {
        events.push(crossing(i, "falling"));
      }
    }

    return sortByOnset(events);
  },
};
