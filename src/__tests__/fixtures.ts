import type { ResolvedChannel, PluginInputs } from "@/types/plugins";
import type { RunData } from "@/types/signals";
import {
  channelFromParts,
  createRunData,
  createSignalGroup,
} from "@/utils/channelUtils";

// ---------------------------------------------------------------------------
// Shared test fixtures
// ---------------------------------------------------------------------------

export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");

export const fixedClock = () => FIXED_NOW;

/** 100 samples at 100 Hz */
export function motionGroup() {
  const time = Array.from({ length: 100 }, (_, i) => i / 100);
  return createSignalGroup({
    name: "motion",
    time,
    columns: {
      X: time.map(
        (t) => Math.sin(2 * Math.PI * 2 * t) + 0.1 * Math.sin(2 * Math.PI * 30 * t),
      ),
      Y: time.map((t) => Math.cos(2 * Math.PI * 3 * t)),
    },
  });
}

export function makeRun(run = "001", subject = "s01"): RunData {
  return createRunData(
    { subject, session: "ses1", task: "draw", condition: "fast", run },
    [motionGroup()],
  );
}

/**
 * Plugin inputs with one "signal" channel over the given samples
 */
export function signalInputs(time: number[], values: number[]): PluginInputs {
  const run = createRunData(
    { subject: "s01", session: "ses1", task: "draw", condition: "fast", run: "001" },
    [createSignalGroup({ name: "g", time, columns: { signal: values } })],
  );
  const signal: ResolvedChannel = {
    channel: channelFromParts("g", "signal"),
    time,
    values,
  };
  return { run, channels: { signal }, events: {} };
}
