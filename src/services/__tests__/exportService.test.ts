import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  computeSummaryStats,
  exportResults,
  metricsToCSV,
  metricsToJSON,
  saveComputeExport,
  saveComputeProvenance,
  tableColumns,
} from "../exportService";
import { PipelineReport } from "../pipelineRunner";
import { fixedClock, makeRun } from "@/__tests__/fixtures";
import type { RunResult } from "@/types/pipeline";
import type { MetricsTable } from "@/types/plugins";

const BASE = "sub-s01_ses-ses1_task-draw_condition-fast_run-001";

function createRunResult(
  run: string,
  table: MetricsTable,
  overrides: Partial<RunResult> = {},
): RunResult {
  return {
    runId: `s01_ses1_${run}`,
    label: `run-${run}`,
    subject: "s01",
    session: "ses1",
    run,
    status: "succeeded",
    stepResults: [
      {
        stepName: "Stats",
        stepType: "compute",
        status: "succeeded",
        message: `Computed ${table.length} rows`,
        output: { kind: "metrics", table },
        durationSeconds: 0,
      },
    ],
    durationSeconds: 0,
    ...overrides,
  };
}

function createReport(): PipelineReport {
  return new PipelineReport(
    "motion_metrics",
    [
      createRunResult("001", [{ mean: 1.5, label: "a,b" }]),
      createRunResult("002", [{ mean: 2.5, label: "plain" }]),
      createRunResult("003", [{ mean: 99 }], { status: "failed", error: "boom" }),
    ],
    1.25,
  );
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

describe("table serialization", () => {
  it("collects columns in first-seen order", () => {
    expect(tableColumns([{ b: 1 }, { a: 2, b: 3 }, { c: 4 }])).toEqual([
      "b",
      "a",
      "c",
    ]);
  });

  it("writes empty cells for missing and non-finite values", () => {
    expect(metricsToCSV([{ a: 1, b: NaN }, { a: null, c: 'say "hi"' }])).toBe(
      'a,b,c\n1,,\n,,"say ""hi"""\n',
    );
  });

  it("writes NaN as null in JSON", () => {
    expect(JSON.parse(metricsToJSON([{ a: NaN, b: 1, c: "x" }]))).toEqual([
      { a: null, b: 1, c: "x" },
    ]);
  });
});

describe("computeSummaryStats", () => {
  it("summarises numeric columns with the sample standard deviation", () => {
    expect(computeSummaryStats([{ a: 1 }, { a: 3 }])).toEqual([
      { column: "a", mean: 2, std: Math.SQRT2, min: 1, max: 3, median: 2, count: 2 },
    ]);
  });

  it("skips metadata and non-numeric columns", () => {
    const stats = computeSummaryStats([
      { a: 1, label: "x", __run__: "001" },
      { a: NaN, label: "y", __run__: "002" },
    ]);
    expect(stats.map((row) => row.column)).toEqual(["a"]);
    expect(stats[0].count).toBe(1);
    expect(stats[0].std).toBeNaN();
  });
});

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

describe("exportResults", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "export-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes per-run tables and the report by default", async () => {
    const exported = await exportResults(createReport(), dir);

    expect(exported).toEqual({
      run_s01_ses1_001: join(dir, "s01_ses1_001_metrics.csv"),
      run_s01_ses1_002: join(dir, "s01_ses1_002_metrics.csv"),
      report: join(dir, "pipeline_report.json"),
    });
    expect(await readFile(join(dir, "s01_ses1_001_metrics.csv"), "utf-8")).toBe(
      'mean,label,__run__,__subject__,__session__,__step__\n1.5,"a,b",001,s01,ses1,Stats\n',
    );
  });

  it("writes the aggregate and summary statistics when configured", async () => {
    const exported = await exportResults(createReport(), dir, {
      aggregate: "results/aggregate.csv",
      format: "csv",
      perRun: false,
      summaryStats: true,
    });

    expect(Object.keys(exported)).toEqual(["summary", "aggregate", "report"]);
    expect(exported.aggregate).toBe(join(dir, "aggregate.csv"));
    expect(await readFile(exported.aggregate, "utf-8")).toBe(
      "mean,label,__run__,__subject__,__session__,__step__\n" +
        '1.5,"a,b",001,s01,ses1,Stats\n' +
        "2.5,plain,002,s01,ses1,Stats\n",
    );
    expect(await readFile(exported.summary, "utf-8")).toBe(
      "column,mean,std,min,max,median,count\nmean,2,0.7071067811865476,1.5,2.5,2,2\n",
    );
  });

  it("writes JSON tables when asked", async () => {
    const exported = await exportResults(createReport(), dir, {
      format: "json",
      perRun: true,
      summaryStats: false,
    });

    const table: unknown = JSON.parse(
      await readFile(exported.run_s01_ses1_002, "utf-8"),
    );
    expect(exported.run_s01_ses1_002).toBe(join(dir, "s01_ses1_002_metrics.json"));
    expect(table).toEqual([
      {
        mean: 2.5,
        label: "plain",
        __run__: "002",
        __subject__: "s01",
        __session__: "ses1",
        __step__: "Stats",
      },
    ]);
  });

  it("reports every run, failed ones included", async () => {
    const exported = await exportResults(createReport(), dir);

    const report: unknown = JSON.parse(await readFile(exported.report, "utf-8"));
    expect(report).toMatchObject({
      pipeline_name: "motion_metrics",
      total_runs: 3,
      successful_runs: 2,
      failed_runs: 1,
      duration_seconds: 1.25,
    });
    expect(report).toHaveProperty("runs.2.error", "boom");
    expect(report).toHaveProperty("runs.0.error", null);
    expect(report).toHaveProperty("runs.0.steps", [
      {
        name: "Stats",
        type: "compute",
        status: "succeeded",
        message: "Computed 1 rows",
        duration_seconds: 0,
      },
    ]);
  });
});

describe("compute instance exports", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "exports-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names the metrics file after the run and instance", async () => {
    const written = await saveComputeExport(dir, makeRun(), "Stats X:1", [{ mean: 1 }]);

    expect(written).toBe(join(dir, `${BASE}_Stats_X_1_metrics.csv`));
    expect(await readFile(written, "utf-8")).toBe("mean\n1\n");
  });

  it("records which bindings and parameters produced the metrics", async () => {
    const run = makeRun();
    run.runConfig.channelBindings.Stats_X = { signal: "motion:X" };

    const written = await saveComputeProvenance(dir, run, {
      instanceName: "Stats_X",
      runConfig: run.runConfig,
      parameters: { percentiles: "25,75" },
      pluginName: "SummaryStats",
      pluginVersion: "1.0.0",
      now: fixedClock,
    });

    expect(written).toBe(join(dir, `${BASE}_Stats_X_provenance.json`));
    expect(JSON.parse(await readFile(written, "utf-8"))).toEqual({
      compute_instance: "Stats_X",
      plugin_name: "SummaryStats",
      plugin_version: "1.0.0",
      run_id: BASE,
      timestamp: "2026-01-01T00:00:00.000Z",
      channel_bindings: { signal: "motion:X" },
      event_bindings: {},
      parameters: { percentiles: "25,75" },
      run_config_path: `../derived/${BASE}_run_config.json`,
    });
  });
});
