/**
 * Pipeline configuration loading.
 *
 * ```yaml
 * name: motion_metrics
 * preprocessing:
 *   - channel: tablet_motion:X
 *     operations:
 *       - { op: butter, cutoff: 10, order: 4 }
 *       - { op: derivative, order: 1 }
 * annotators:
 *   - name: Peaks_X
 *     plugin: PeakAnnotator
 *     channel_bindings: { signal: tablet_motion:X_bf10_d1 }
 * compute:
 *   - name: Stats_X
 *     plugin: SummaryStats
 *     depends_on: [Peaks_X]
 *     channel_bindings: { signal: tablet_motion:X_bf10 }
 * export:
 *   aggregate: aggregate_metrics.csv
 *   format: csv
 * ```
 */

import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import type { ZodError } from "zod";
import { ConfigurationError, extractErrorMessage } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import { PipelineConfigSchema } from "@/lib/schemas";
import type { PipelineConfig } from "@/types/pipeline";

const logger = loggers.pipeline.child("config");

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Validate an already-decoded pipeline document.
 * @throws ConfigurationError listing every schema violation
 */
export function parsePipelineConfig(data: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid pipeline configuration: ${formatIssues(result.error)}`,
      { issues: result.error.issues },
    );
  }
  return result.data;
}

export function parsePipelineYaml(source: string): PipelineConfig {
  let data: unknown;
  try {
    data = yaml.load(source);
  } catch (error) {
    throw new ConfigurationError(
      `Pipeline file is not valid YAML: ${extractErrorMessage(error)}`,
    );
  }
  return parsePipelineConfig(data);
}

export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read pipeline file ${path}: ${extractErrorMessage(error)}`,
      { path },
    );
  }

  const config = parsePipelineYaml(source);
  logger.info("Loaded pipeline", {
    path,
    name: config.name,
    preprocessing: config.preprocessing.length,
    annotators: config.annotators.length,
    compute: config.compute.length,
  });
  return config;
}
