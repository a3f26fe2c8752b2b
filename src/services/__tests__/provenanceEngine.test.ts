import { describe, it, expect, beforeEach } from "vitest";
import {
  ProvenanceEngine,
  getDerivedName,
  topologicalOrder,
  transitiveParents,
  validateProvenance,
} from "../provenanceEngine";
import { PluginRegistry } from "../pluginRegistry";
import {
  ChannelNotFoundError,
  InsufficientSourcesError,
  InvalidSignalError,
  LengthMismatchError,
  ProvenanceCycleError,
  UnknownOperationError,
  ValidationError,
} from "@/lib/errors";
import { FIXED_NOW, fixedClock, makeRun } from "@/__tests__/fixtures";
import { builtinProcessors } from "@/plugins/processors";
import type { ProcessorPlugin } from "@/types/plugins";
import type {
  ChannelProvenance,
  OperationParams,
  RunData,
} from "@/types/signals";
import { createRunData, createSignalGroup } from "@/utils/channelUtils";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function processorRegistry(...extra: ProcessorPlugin[]) {
  return new PluginRegistry<ProcessorPlugin>("Processor")
    .registerMany(builtinProcessors)
    .registerMany(extra);
}

function createEngine(...extra: ProcessorPlugin[]) {
  return new ProvenanceEngine(processorRegistry(...extra), {
    now: fixedClock,
    defaultSamplingRate: 100,
  });
}

function provenance(
  parents: string[],
  operation = "detrend",
  parameters: OperationParams = {},
): ChannelProvenance {
  return { parents, operation, parameters, timestamp: FIXED_NOW.toISOString() };
}

function columnsOf(run: RunData, group: string): Map<string, number[]> {
  const signalGroup = run.signals.get(group);
  if (!signalGroup) throw new Error(`test run has no group '${group}'`);
  return signalGroup.columns;
}

function smallRun(columns: Record<string, number[]>, length = 3): RunData {
  return createRunData(
    { subject: "s01", session: "ses1", task: "draw", condition: "fast", run: "001" },
    [
      createSignalGroup({
        name: "g",
        time: Array.from({ length }, (_, i) => i),
        columns,
      }),
    ],
  );
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

describe("getDerivedName", () => {
  const cases: Array<[string, OperationParams, string]> = [
    ["butter", { cutoff: 10 }, "X_bf10"],
    ["butter", { cutoff: 7.9 }, "X_bf7"],
    ["butter", {}, "X_bf10"],
    ["savitzky_golay", { window_length: 11 }, "X_sg"],
    ["rolling_mean", { window_size: 5 }, "X_rm5"],
    ["derivative", { order: 2 }, "X_d2"],
    ["detrend", {}, "X_dt"],
    ["resample", { target_hz: 50 }, "X_rs50"],
    ["clip", { lower: 0 }, "X_clip"],
  ];

  it.each(cases)("names %s %o as %s", (operation, params, expected) => {
    expect(getDerivedName("X", operation, params)).toBe(expected);
  });
});

// ---------------------------------------------------------------------------
// Creation and replay
// ---------------------------------------------------------------------------

describe("ProvenanceEngine chains", () => {
  let run: RunData;
  let engine: ProvenanceEngine;

  beforeEach(() => {
    run = makeRun();
    engine = createEngine();
  });

  it("records a provenance entry per step of a chain", () => {
    const channel = engine.applyProcessingChain(run, "motion", "X", [
      { op: "butter", params: { cutoff: 10 } },
      { op: "derivative", params: { order: 1 } },
    ]);

    expect(channel).toEqual({
      id: "motion:X_bf10_d1",
      group: "motion",
      name: "X_bf10_d1",
    });
    expect(run.channelProvenance.get("motion:X_bf10")).toEqual({
      parents: ["motion:X"],
      operation: "butter",
      parameters: { cutoff: 10 },
      timestamp: "2026-01-01T00:00:00.000Z",
    });
    expect(run.channelProvenance.get("motion:X_bf10_d1")).toEqual({
      parents: ["motion:X_bf10"],
      operation: "derivative",
      parameters: { order: 1 },
      timestamp: "2026-01-01T00:00:00.000Z",
    });
    expect(run.signals.get("motion")?.columns.get("X_bf10_d1")).toHaveLength(100);
  });

  it("copies parameters into the record", () => {
    const params: OperationParams = { cutoff: 10 };
    engine.createFilterChannel(run, "motion", "X", "butter", params);
    params.cutoff = 99;
    expect(run.channelProvenance.get("motion:X_bf10")?.parameters).toEqual({
      cutoff: 10,
    });
  });

  it("rejects an empty chain", () => {
    expect(() => engine.applyProcessingChain(run, "motion", "X", [])).toThrow(
      ValidationError,
    );
  });

  it("uses a custom suffix when given", () => {
    const channel = engine.createDerivedChannel(
      run,
      "motion",
      "Y",
      "butter",
      { cutoff: 5 },
      "smooth",
    );
    expect(channel.name).toBe("Y_smooth");
  });

  it("rebuilds identical values from provenance in any record order", () => {
    engine.applyProcessingChain(run, "motion", "X", [
      { op: "butter", params: { cutoff: 10 } },
      { op: "derivative", params: { order: 1 } },
    ]);
    const columns = run.signals.get("motion")?.columns;
    const filtered = columns?.get("X_bf10");
    const velocity = columns?.get("X_bf10_d1");

    const reloaded = makeRun();
    for (const id of ["motion:X_bf10_d1", "motion:X_bf10"]) {
      const prov = run.channelProvenance.get(id);
      if (prov) reloaded.channelProvenance.set(id, prov);
    }

    const summary = createEngine().recomputeDerivedChannels(reloaded);

    expect(summary).toEqual({
      recomputed: ["motion:X_bf10", "motion:X_bf10_d1"],
      skipped: [],
      failed: [],
    });
    const rebuilt = reloaded.signals.get("motion")?.columns;
    expect(rebuilt?.get("X_bf10")).toEqual(filtered);
    expect(rebuilt?.get("X_bf10_d1")).toEqual(velocity);
  });

  it("discards stale derived values and is idempotent", () => {
    engine.createDerivativeChannel(run, "motion", "Y", 1);
    const expected = run.signals.get("motion")?.columns.get("Y_d1");

    run.signals.get("motion")?.columns.set("Y_d1", new Array(100).fill(42));
    engine.recomputeDerivedChannels(run);
    const first = run.signals.get("motion")?.columns.get("Y_d1");
    engine.recomputeDerivedChannels(run);
    const second = run.signals.get("motion")?.columns.get("Y_d1");

    expect(first).toEqual(expected);
    expect(second).toEqual(expected);
  });

  it("does nothing for a run without provenance", () => {
    expect(engine.recomputeDerivedChannels(run)).toEqual({
      recomputed: [],
      skipped: [],
      failed: [],
    });
  });
});

describe("ProvenanceEngine errors", () => {
  let run: RunData;

  beforeEach(() => {
    run = makeRun();
  });

  it("fails for a missing group or source channel", () => {
    const engine = createEngine();
    expect(() =>
      engine.createDerivedChannel(run, "force", "X", "detrend"),
    ).toThrow("SignalGroup 'force' not found in run");
    expect(() =>
      engine.createDerivedChannel(run, "motion", "Z", "detrend"),
    ).toThrow(ChannelNotFoundError);
  });

  it("fails for an unregistered operation", () => {
    expect(() =>
      createEngine().createDerivedChannel(run, "motion", "X", "wavelet"),
    ).toThrow(UnknownOperationError);
    expect(run.signals.get("motion")?.columns.has("X_wavelet")).toBe(false);
  });

  it("rejects a processor that changes the length", () => {
    const truncate: ProcessorPlugin = {
      name: "truncate",
      description: "Drops the first sample",
      getParameters: () => [],
      process: (values) => values.slice(1),
    };
    expect(() =>
      createEngine(truncate).createDerivedChannel(run, "motion", "X", "truncate"),
    ).toThrow(LengthMismatchError);
    expect(run.channelProvenance.size).toBe(0);
  });

  it("refuses to make a channel its own ancestor", () => {
    const columns = columnsOf(run, "motion");
    columns.set("Y_z", [...(columns.get("Y") ?? [])]);
    run.channelProvenance.set("motion:Y_z", provenance(["motion:Y_z_clip"], "clip"));

    expect(() =>
      createEngine().createDerivedChannel(run, "motion", "Y_z", "clip"),
    ).toThrow(ProvenanceCycleError);
    expect(columns.has("Y_z_clip")).toBe(false);
    expect(run.channelProvenance.size).toBe(1);
  });

  it("passes operation parameters without the interpolation flag", () => {
    const seen: Array<{ rate: number; params: OperationParams }> = [];
    const spy: ProcessorPlugin = {
      name: "spy",
      description: "Records its inputs",
      getParameters: () => [],
      process: (values, samplingRate, params) => {
        seen.push({ rate: samplingRate, params });
        return values;
      },
    };
    const engine = new ProvenanceEngine(processorRegistry(spy), {
      now: fixedClock,
      defaultSamplingRate: 250,
    });
    const unrated = createRunData(
      { subject: "s01", session: "ses1", task: "draw", condition: "fast", run: "001" },
      [
        createSignalGroup({
          name: "g",
          time: [0, 1, 2],
          columns: { V: [1, NaN, 3] },
          samplingRate: null,
        }),
      ],
    );

    engine.createDerivedChannel(unrated, "g", "V", "spy", {
      gain: 2,
      interpolate_missing: true,
    });

    expect(seen).toEqual([{ rate: 250, params: { gain: 2 } }]);
    expect(unrated.signals.get("g")?.columns.get("V_spy")).toEqual([1, 2, 3]);
    expect(unrated.channelProvenance.get("g:V_spy")?.parameters).toEqual({
      gain: 2,
      interpolate_missing: true,
    });
  });

  it("needs two samples to differentiate", () => {
    const single = smallRun({ V: [1] }, 1);
    expect(() =>
      createEngine().createDerivativeChannel(single, "g", "V"),
    ).toThrow(InvalidSignalError);
    expect(single.channelProvenance.size).toBe(0);
  });

  it("interpolates gaps before differentiating when asked", () => {
    const small = smallRun({ V: [0, NaN, 2, 3] }, 4);
    createEngine().createDerivedChannel(small, "g", "V", "derivative", {
      order: 1,
      interpolate_missing: true,
    });
    expect(small.signals.get("g")?.columns.get("V_d1")).toEqual([1, 1, 1, 1]);
  });
});

// ---------------------------------------------------------------------------
// Averaging
// ---------------------------------------------------------------------------

describe("createAveragedChannel", () => {
  const sources = [
    { group: "g", name: "A" },
    { group: "g", name: "B" },
  ];

  it("averages ignoring NaN", () => {
    const run = smallRun({ A: [1, NaN, 3], B: [3, 5, NaN] });
    const channel = createEngine().createAveragedChannel(
      run,
      sources,
      "g",
      "AB",
      false,
    );
    expect(channel.id).toBe("g:AB");
    expect(run.signals.get("g")?.columns.get("AB")).toEqual([2, 5, 3]);
    expect(run.channelProvenance.get("g:AB")).toEqual({
      parents: ["g:A", "g:B"],
      operation: "average",
      parameters: { interpolate_missing: false },
      timestamp: "2026-01-01T00:00:00.000Z",
    });
  });

  it("fills gaps in each source first by default", () => {
    const run = smallRun({ A: [1, NaN, 3], B: [3, 5, NaN] });
    createEngine().createAveragedChannel(run, sources, "g", "AB");
    expect(run.signals.get("g")?.columns.get("AB")).toEqual([2, 3.5, 4]);
  });

  it("replays an average over every recorded parent", () => {
    const run = smallRun({ A: [1, NaN, 3], B: [3, 5, NaN] });
    const engine = createEngine();
    engine.createAveragedChannel(run, sources, "g", "AB");
    run.signals.get("g")?.columns.set("AB", [0, 0, 0]);

    const summary = engine.recomputeDerivedChannels(run);

    expect(summary.recomputed).toEqual(["g:AB"]);
    expect(run.signals.get("g")?.columns.get("AB")).toEqual([2, 3.5, 4]);
  });

  it("needs at least two sources", () => {
    const run = smallRun({ A: [1, 2, 3] });
    expect(() =>
      createEngine().createAveragedChannel(run, [sources[0]], "g", "AB"),
    ).toThrow(InsufficientSourcesError);
  });

  it("rejects sources of different lengths", () => {
    const run = smallRun({ A: [1, 2, 3] });
    run.signals.set(
      "h",
      createSignalGroup({ name: "h", time: [0, 1], columns: { B: [1, 2] } }),
    );
    expect(() =>
      createEngine().createAveragedChannel(
        run,
        [
          { group: "g", name: "A" },
          { group: "h", name: "B" },
        ],
        "g",
        "AB",
      ),
    ).toThrow(LengthMismatchError);
  });

  it("fails for a missing source or target group", () => {
    const run = smallRun({ A: [1, 2, 3] });
    const engine = createEngine();
    expect(() => engine.createAveragedChannel(run, sources, "g", "AB")).toThrow(
      "Channel 'g:B' not found",
    );
    expect(() =>
      engine.createAveragedChannel(run, sources, "missing", "AB"),
    ).toThrow(ChannelNotFoundError);
  });
});

// ---------------------------------------------------------------------------
// Recompute edge cases
// ---------------------------------------------------------------------------

describe("recomputeDerivedChannels", () => {
  it("skips and fails channels individually", () => {
    const run = makeRun();
    run.signals.set(
      "other",
      createSignalGroup({ name: "other", time: [0, 1], columns: {} }),
    );
    run.channelProvenance.set("other:Z", provenance(["motion:X"]));
    run.channelProvenance.set("motion:Q_dt", provenance(["motion:Q"]));
    run.channelProvenance.set("ghost:A_dt", provenance(["ghost:A"]));
    run.channelProvenance.set("motion:X_dt", provenance(["motion:X"]));

    const summary = createEngine().recomputeDerivedChannels(run);

    expect(summary.recomputed).toEqual(["motion:X_dt"]);
    expect(summary.skipped).toEqual([
      { channelId: "other:Z", reason: "cross-group parent" },
      { channelId: "ghost:A_dt", reason: "group 'ghost' not in run" },
    ]);
    expect(summary.failed).toEqual([
      {
        channelId: "motion:Q_dt",
        error: "Parent channel 'motion:Q' not available",
      },
    ]);
  });

  it("skips channels on a cycle", () => {
    const run = makeRun();
    run.channelProvenance.set("motion:C1", provenance(["motion:C2"]));
    run.channelProvenance.set("motion:C2", provenance(["motion:C1"]));

    const summary = createEngine().recomputeDerivedChannels(run);

    expect(summary.recomputed).toEqual([]);
    expect(summary.skipped).toEqual([
      { channelId: "motion:C1", reason: "provenance cycle" },
      { channelId: "motion:C2", reason: "provenance cycle" },
    ]);
  });

  it("reports an unknown operation as a failure", () => {
    const run = makeRun();
    run.channelProvenance.set("motion:X_fft", provenance(["motion:X"], "fft"));

    const summary = createEngine().recomputeDerivedChannels(run);

    expect(summary.failed).toEqual([
      { channelId: "motion:X_fft", error: "Unknown operation: fft" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Graph helpers
// ---------------------------------------------------------------------------

describe("provenance graph helpers", () => {
  const graph = new Map<string, ChannelProvenance>([
    ["motion:X_bf10_d1", provenance(["motion:X_bf10"], "derivative")],
    ["motion:X_bf10", provenance(["motion:X"], "butter")],
  ]);

  it("orders parents before children", () => {
    expect(topologicalOrder(graph)).toEqual([
      "motion:X_bf10",
      "motion:X_bf10_d1",
    ]);
  });

  it("collects every ancestor", () => {
    expect(transitiveParents(graph, "motion:X_bf10_d1")).toEqual(
      new Set(["motion:X_bf10", "motion:X"]),
    );
    expect(transitiveParents(graph, "motion:X").size).toBe(0);
  });

  it("reports malformed ids, dangling parents and cycles", () => {
    const run = makeRun();
    run.channelProvenance.set("bad", provenance(["motion:X"]));
    run.channelProvenance.set("motion:A", provenance(["motion:missing"]));
    run.channelProvenance.set("motion:C1", provenance(["motion:C2"]));
    run.channelProvenance.set("motion:C2", provenance(["motion:C1"]));

    expect(validateProvenance(run)).toEqual([
      { kind: "malformed_id", channelId: "bad" },
      { kind: "dangling_parent", channelId: "motion:A", parent: "motion:missing" },
      { kind: "cycle", channelId: "motion:C1" },
      { kind: "cycle", channelId: "motion:C2" },
    ]);
  });
});
