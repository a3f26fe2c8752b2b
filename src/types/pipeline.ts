/**
 * Pipeline Types
 *
 * Raw → Preprocessing → Annotators → Compute, executed per run over a batch.
 */

import type { Event, OperationParams } from "@/types/signals";
import type { MetricsTable } from "@/types/plugins";

// ============================================================================
// Configuration
// ============================================================================

export interface OperationConfig {
  op: string;
  params: OperationParams;
}

export interface PreprocessingStepConfig {
  /** "group:channel" */
  channel: string;
  operations: OperationConfig[];
}

export interface AnnotatorStepConfig {
  /** Instance name; also the annotation group the events are stored under */
  name: string;
  /** Registered plugin name, defaults to `name` */
  plugin?: string;
  channelBindings?: Record<string, string>;
  parameters?: OperationParams;
  enabled: boolean;
}

export interface ComputeStepConfig {
  name: string;
  plugin?: string;
  dependsOn: string[];
  channelBindings?: Record<string, string>;
  eventBindings?: Record<string, string>;
  parameters?: OperationParams;
  enabled: boolean;
}

export type ExportFormat = "csv" | "json";

export interface ExportConfig {
  /** File name for the aggregated metrics table; omitted = no aggregate */
  aggregate?: string;
  format: ExportFormat;
  perRun: boolean;
  summaryStats: boolean;
}

export interface PipelineConfig {
  name: string;
  description: string;
  preprocessing: PreprocessingStepConfig[];
  annotators: AnnotatorStepConfig[];
  compute: ComputeStepConfig[];
  export?: ExportConfig;
}

// ============================================================================
// Results
// ============================================================================

export type StepType = "preprocessing" | "annotator" | "compute";

export type StepStatus = "succeeded" | "failed" | "dependency_unmet";

export type RunStatus = "pending" | "running" | "succeeded" | "failed";

export type StepOutput =
  | { kind: "channel"; channelId: string }
  | { kind: "events"; events: Event[] }
  | { kind: "metrics"; table: MetricsTable };

export interface StepResult {
  stepName: string;
  stepType: StepType;
  status: StepStatus;
  message: string;
  output?: StepOutput;
  durationSeconds: number;
}

export interface RunResult {
  runId: string;
  label: string;
  subject: string;
  session: string;
  run: string;
  status: RunStatus;
  stepResults: StepResult[];
  error?: string;
  durationSeconds: number;
}

export interface PlannedStep {
  index: number;
  stepType: StepType;
  name: string;
  enabled: boolean;
  detail: string;
}

export interface ExecutionPlan {
  pipelineName: string;
  runLabels: string[];
  steps: PlannedStep[];
  export?: ExportConfig;
}

export interface RunOptions {
  /** Glob matched against each run's label, e.g. "run-00*" */
  filter?: string;
  dryRun?: boolean;
  stopOnError?: boolean;
}

export type ProgressCallback = (
  message: string,
  index: number,
  total: number,
) => void;
