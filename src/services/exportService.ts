/**
 * Result Export
 *
 * Writes the metrics produced by compute steps (per run and aggregated),
 * column summary statistics and a JSON execution report.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { ValidationError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type { PipelineReport } from "@/services/pipelineRunner";
import type { ExportConfig, ExportFormat } from "@/types/pipeline";
import type { MetricValue, MetricsRow, MetricsTable } from "@/types/plugins";
import type { OperationParams, RunConfig, RunIdentity } from "@/types/signals";
import { derivedFileBase } from "@/utils/channelUtils";
import { nanPercentile } from "@/utils/signalMath";

const logger = loggers.export;

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  format: "csv",
  perRun: true,
  summaryStats: true,
};

/** Metadata columns added to every exported metrics row */
const META_PREFIX = "__";

// ============================================================================
// Serialization
// ============================================================================

function csvCell(value: MetricValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : "";
  }
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Columns in first-seen order across all rows
 */
export function tableColumns(table: MetricsTable): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of table) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

export function metricsToCSV(table: MetricsTable): string {
  const columns = tableColumns(table);
  const lines = [columns.map((c) => csvCell(c)).join(",")];
  for (const row of table) {
    lines.push(columns.map((c) => csvCell(row[c])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/** Non-finite numbers become null, as JSON has no NaN */
export function metricsToJSON(table: MetricsTable): string {
  const records = table.map((row) => {
    const record: MetricsRow = {};
    for (const [key, value] of Object.entries(row)) {
      record[key] =
        typeof value === "number" && !Number.isFinite(value) ? null : value;
    }
    return record;
  });
  return `${JSON.stringify(records, null, 2)}\n`;
}

function assertFormat(format: string): ExportFormat {
  if (format === "csv" || format === "json") return format;
  throw new ValidationError(`Unknown export format: ${format}`, { format });
}

async function saveTable(
  table: MetricsTable,
  filePath: string,
  format: ExportFormat,
): Promise<string> {
  const content = format === "csv" ? metricsToCSV(table) : metricsToJSON(table);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
  logger.debug("Wrote table", { path: filePath, rows: table.length });
  return filePath;
}

// ============================================================================
// Summary statistics
// ============================================================================

/**
 * One row per numeric metric column (metadata columns excluded), with the
 * sample standard deviation.
 */
export function computeSummaryStats(table: MetricsTable): MetricsTable {
  const numericColumns = tableColumns(table).filter(
    (column) =>
      !column.startsWith(META_PREFIX) &&
      table.some((row) => typeof row[column] === "number"),
  );

  return numericColumns.map((column) => {
    const values: number[] = [];
    for (const row of table) {
      const value = row[column];
      if (typeof value === "number" && !Number.isNaN(value)) values.push(value);
    }

    const n = values.length;
    const mean = n > 0 ? values.reduce((sum, v) => sum + v, 0) / n : NaN;
    const variance =
      n > 1
        ? values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / (n - 1)
        : NaN;

    return {
      column,
      mean,
      std: Math.sqrt(variance),
      min: n > 0 ? Math.min(...values) : NaN,
      max: n > 0 ? Math.max(...values) : NaN,
      median: nanPercentile(values, 50),
      count: n,
    };
  });
}

// ============================================================================
// Pipeline export
// ============================================================================

export interface ExportedFiles {
  /** Keyed "run_{runId}", "aggregate", "summary" and "report" */
  [kind: string]: string;
}

/**
 * Export the metrics of every successful run.
 *
 * Files: `{runId}_metrics.{format}` per run, the aggregate table under the
 * basename of `aggregate`, `summary_stats.{format}` and `pipeline_report.json`.
 */
export async function exportResults(
  report: PipelineReport,
  outputDir: string,
  exportConfig: ExportConfig = DEFAULT_EXPORT_CONFIG,
): Promise<ExportedFiles> {
  const format = assertFormat(exportConfig.format);
  await mkdir(outputDir, { recursive: true });

  const exported: ExportedFiles = {};
  const allMetrics: MetricsTable = [];

  for (const runResult of report.runResults) {
    if (runResult.status !== "succeeded") continue;

    const runMetrics: MetricsTable = [];
    for (const step of runResult.stepResults) {
      if (step.output?.kind !== "metrics") continue;
      for (const row of step.output.table) {
        runMetrics.push({
          ...row,
          __run__: runResult.run,
          __subject__: runResult.subject,
          __session__: runResult.session,
          __step__: step.stepName,
        });
      }
    }

    if (exportConfig.perRun && runMetrics.length > 0) {
      exported[`run_${runResult.runId}`] = await saveTable(
        runMetrics,
        path.join(outputDir, `${runResult.runId}_metrics.${format}`),
        format,
      );
    }
    allMetrics.push(...runMetrics);
  }

  if (exportConfig.aggregate && allMetrics.length > 0) {
    if (exportConfig.summaryStats) {
      exported.summary = await saveTable(
        computeSummaryStats(allMetrics),
        path.join(outputDir, `summary_stats.${format}`),
        format,
      );
    }
    exported.aggregate = await saveTable(
      allMetrics,
      path.join(outputDir, path.basename(exportConfig.aggregate)),
      format,
    );
  }

  const reportPath = path.join(outputDir, "pipeline_report.json");
  await writeFile(
    reportPath,
    `${JSON.stringify(reportToJSON(report), null, 2)}\n`,
    "utf-8",
  );
  exported.report = reportPath;

  logger.info("Exported pipeline results", {
    outputDir,
    files: Object.keys(exported).length,
  });
  return exported;
}

export function reportToJSON(report: PipelineReport) {
  return {
    pipeline_name: report.pipelineName,
    total_runs: report.totalRuns,
    successful_runs: report.successfulRuns,
    failed_runs: report.failedRuns,
    success_rate: report.successRate,
    duration_seconds: report.durationSeconds,
    runs: report.runResults.map((run) => ({
      run_id: run.runId,
      subject: run.subject,
      session: run.session,
      run: run.run,
      status: run.status,
      error: run.error ?? null,
      duration_seconds: run.durationSeconds,
      steps: run.stepResults.map((step) => ({
        name: step.stepName,
        type: step.stepType,
        status: step.status,
        message: step.message,
        duration_seconds: step.durationSeconds,
      })),
    })),
  };
}

// ============================================================================
// Single compute instance
// ============================================================================

function safeInstanceName(instanceName: string): string {
  return instanceName.replace(/[ :]/g, "_");
}

/**
 * `{base}_{instance}_metrics.csv` in the exports directory
 */
export async function saveComputeExport(
  exportsDir: string,
  run: RunIdentity,
  instanceName: string,
  table: MetricsTable,
): Promise<string> {
  const fileName = `${derivedFileBase(run)}_${safeInstanceName(instanceName)}_metrics.csv`;
  return saveTable(table, path.join(exportsDir, fileName), "csv");
}

export interface ComputeProvenanceInit {
  instanceName: string;
  runConfig?: RunConfig;
  parameters: OperationParams;
  pluginName: string;
  pluginVersion: string;
  now?: () => Date;
}

/**
 * `{base}_{instance}_provenance.json`: which plugin, bindings and parameters
 * produced an exported metrics file.
 */
export async function saveComputeProvenance(
  exportsDir: string,
  run: RunIdentity,
  init: ComputeProvenanceInit,
): Promise<string> {
  const base = derivedFileBase(run);
  const filePath = path.join(
    exportsDir,
    `${base}_${safeInstanceName(init.instanceName)}_provenance.json`,
  );
  const now = init.now ?? (() => new Date());

  const provenance = {
    compute_instance: init.instanceName,
    plugin_name: init.pluginName,
    plugin_version: init.pluginVersion,
    run_id: base,
    timestamp: now().toISOString(),
    channel_bindings: init.runConfig?.channelBindings[init.instanceName] ?? {},
    event_bindings: init.runConfig?.eventBindings[init.instanceName] ?? {},
    parameters: init.parameters,
    run_config_path: `../derived/${base}_run_config.json`,
  };

  await mkdir(exportsDir, { recursive: true });
  await writeFile(filePath, `${JSON.stringify(provenance, null, 2)}\n`, "utf-8");
  return filePath;
}
