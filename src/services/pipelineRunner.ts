/**
 * Pipeline Runner
 *
 * Executes preprocessing → annotators → compute on a batch of runs.
 * Runs are processed sequentially and isolated from each other: a step that
 * throws fails its own run and the batch moves on.
 *
 * @example
 * const pipeline = await loadPipelineConfig("pipelines/default.yaml");
 * const runner = new PipelineRunner(pipeline, createBuiltinRegistries());
 * const report = runner.run(runs, { filter: "run-00*" });
 * console.log(report.summary());
 */

import { minimatch } from "minimatch";
import {
  StepExecutionError,
  ValidationError,
  extractErrorMessage,
} from "@/lib/errors";
import { loggers } from "@/lib/logger";
import { runAnnotator, runCompute } from "@/services/pluginHost";
import type { PluginRegistries } from "@/services/pluginRegistry";
import { ProvenanceEngine } from "@/services/provenanceEngine";
import type {
  AnnotatorStepConfig,
  ComputeStepConfig,
  ExecutionPlan,
  OperationConfig,
  PipelineConfig,
  PlannedStep,
  PreprocessingStepConfig,
  ProgressCallback,
  RunOptions,
  RunResult,
  StepOutput,
  StepResult,
  StepType,
} from "@/types/pipeline";
import type { RunData } from "@/types/signals";
import { parseChannelId, runId, runLabel } from "@/utils/channelUtils";

const logger = loggers.pipeline;

export interface PipelineRunnerOptions {
  progressCallback?: ProgressCallback;
  /** Clock for durations and provenance timestamps */
  now?: () => Date;
}

interface StepOutcome {
  message: string;
  output?: StepOutput;
}

// ============================================================================
// Report
// ============================================================================

export class PipelineReport {
  constructor(
    readonly pipelineName: string,
    readonly runResults: RunResult[],
    readonly durationSeconds: number,
    readonly plan?: ExecutionPlan,
  ) {}

  get totalRuns(): number {
    return this.runResults.length;
  }

  get successfulRuns(): number {
    return this.runResults.filter((r) => r.status === "succeeded").length;
  }

  get failedRuns(): number {
    return this.runResults.filter((r) => r.status === "failed").length;
  }

  get successRate(): number {
    return this.totalRuns === 0 ? 0 : this.successfulRuns / this.totalRuns;
  }

  get dryRun(): boolean {
    return this.plan !== undefined;
  }

  failures(): Array<{ runId: string; error: string }> {
    return this.runResults
      .filter((r) => r.status === "failed")
      .map((r) => ({ runId: r.runId, error: r.error ?? "unknown error" }));
  }

  summary(): string {
    const pct = (this.successRate * 100).toFixed(1);
    return (
      `Pipeline '${this.pipelineName}': ` +
      `${this.successfulRuns}/${this.totalRuns} runs succeeded ` +
      `(${pct}%) in ${this.durationSeconds.toFixed(1)}s`
    );
  }
}

// ============================================================================
// Execution plan
// ============================================================================

function describeOperations(operations: OperationConfig[]): string {
  return operations
    .map(({ op, params }) => {
      const args = Object.entries(params)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(", ");
      return `${op}(${args})`;
    })
    .join(" -> ");
}

function describeBindings(bindings?: Record<string, string>): string {
  if (!bindings || Object.keys(bindings).length === 0) return "";
  const pairs = Object.entries(bindings).map(([role, id]) => `${role}=${id}`);
  return ` [${pairs.join(", ")}]`;
}

/**
 * Ordered, 1-based list of the steps a run would go through
 */
export function buildExecutionPlan(
  pipeline: PipelineConfig,
  runLabels: string[],
): ExecutionPlan {
  const steps: PlannedStep[] = [];
  const add = (
    stepType: StepType,
    name: string,
    enabled: boolean,
    detail: string,
  ) => steps.push({ index: steps.length + 1, stepType, name, enabled, detail });

  for (const step of pipeline.preprocessing) {
    add(
      "preprocessing",
      `preprocess:${step.channel}`,
      true,
      describeOperations(step.operations),
    );
  }
  for (const step of pipeline.annotators) {
    add(
      "annotator",
      step.name,
      step.enabled,
      `plugin ${step.plugin ?? step.name}${describeBindings(step.channelBindings)}`,
    );
  }
  for (const step of pipeline.compute) {
    const deps =
      step.dependsOn.length > 0 ? ` depends on ${step.dependsOn.join(", ")}` : "";
    add(
      "compute",
      step.name,
      step.enabled,
      `plugin ${step.plugin ?? step.name}${describeBindings(step.channelBindings)}${deps}`,
    );
  }

  return { pipelineName: pipeline.name, runLabels, steps, export: pipeline.export };
}

// ============================================================================
// Runner
// ============================================================================

export class PipelineRunner {
  private readonly engine: ProvenanceEngine;
  private readonly now: () => Date;
  private readonly progressCallback?: ProgressCallback;

  constructor(
    private readonly pipeline: PipelineConfig,
    private readonly registries: PluginRegistries,
    options: PipelineRunnerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.progressCallback = options.progressCallback;
    this.engine = new ProvenanceEngine(registries.processors, { now: this.now });
  }

  /**
   * Execute the pipeline on every run whose label matches the filter.
   */
  run(runs: RunData[], options: RunOptions = {}): PipelineReport {
    const { filter = "*", dryRun = false, stopOnError = false } = options;
    if (filter.trim() === "") {
      throw new ValidationError("Run filter must not be empty");
    }

    const start = this.now().getTime();
    const selected = runs.filter((run) => minimatch(runLabel(run), filter));
    logger.info("Starting pipeline", {
      pipeline: this.pipeline.name,
      filter,
      selected: selected.length,
      total: runs.length,
      dryRun,
    });

    if (dryRun) {
      return this.dryRun(selected);
    }

    const results: RunResult[] = [];
    for (const [i, run] of selected.entries()) {
      this.progressCallback?.(
        `Processing ${runLabel(run)}...`,
        i + 1,
        selected.length,
      );

      const result = this.runSingle(run);
      results.push(result);

      if (stopOnError && result.status === "failed") {
        logger.warn("Stopping after failed run", { runId: result.runId });
        break;
      }
    }

    const report = new PipelineReport(
      this.pipeline.name,
      results,
      this.elapsedSince(start),
    );
    logger.info(report.summary());
    return report;
  }

  /**
   * Execute the pipeline on one run, mutating it in place.
   */
  runSingle(run: RunData): RunResult {
    const start = this.now().getTime();
    const stepResults: StepResult[] = [];
    const base = {
      runId: runId(run),
      label: runLabel(run),
      subject: run.subject,
      session: run.session,
      run: run.run,
    };
    logger.debug("Run started", { runId: base.runId });

    try {
      for (const step of this.pipeline.preprocessing) {
        this.executeStep(stepResults, `preprocess:${step.channel}`, "preprocessing", () =>
          this.preprocess(run, step),
        );
      }

      for (const step of this.pipeline.annotators) {
        if (!step.enabled) continue;
        this.executeStep(stepResults, step.name, "annotator", () =>
          this.annotate(run, step),
        );
      }

      for (const step of this.pipeline.compute) {
        if (!step.enabled) continue;

        const unmet = step.dependsOn.filter(
          (dep) =>
            !stepResults.some(
              (r) => r.stepName === dep && r.status === "succeeded",
            ),
        );
        if (unmet.length > 0) {
          logger.warn("Skipping compute step with unmet dependencies", {
            runId: base.runId,
            step: step.name,
            unmet,
          });
          stepResults.push({
            stepName: step.name,
            stepType: "compute",
            status: "dependency_unmet",
            message: `dependency unmet: ${unmet.join(", ")}`,
            durationSeconds: 0,
          });
          continue;
        }

        this.executeStep(stepResults, step.name, "compute", () =>
          this.compute(run, step),
        );
      }

      logger.debug("Run succeeded", { runId: base.runId });
      return {
        ...base,
        status: "succeeded",
        stepResults,
        durationSeconds: this.elapsedSince(start),
      };
    } catch (error) {
      const message = extractErrorMessage(error);
      logger.error("Run failed", { runId: base.runId, error: message });
      return {
        ...base,
        status: "failed",
        stepResults,
        error: message,
        durationSeconds: this.elapsedSince(start),
      };
    }
  }

  // --------------------------------------------------------------------------

  /**
   * Record the step outcome; a thrown error is recorded as a failed step and
   * rethrown to abort the run.
   */
  private executeStep(
    results: StepResult[],
    stepName: string,
    stepType: StepType,
    action: () => StepOutcome,
  ): void {
    const start = this.now().getTime();
    try {
      const { message, output } = action();
      results.push({
        stepName,
        stepType,
        status: "succeeded",
        message,
        output,
        durationSeconds: this.elapsedSince(start),
      });
    } catch (error) {
      results.push({
        stepName,
        stepType,
        status: "failed",
        message: extractErrorMessage(error),
        durationSeconds: this.elapsedSince(start),
      });
      throw new StepExecutionError(stepName, stepType, error);
    }
  }

  private preprocess(run: RunData, step: PreprocessingStepConfig): StepOutcome {
    const parts = parseChannelId(step.channel);
    if (!parts) {
      throw new ValidationError(`Invalid channel format: ${step.channel}`);
    }

    const channel = this.engine.applyProcessingChain(
      run,
      parts.group,
      parts.name,
      step.operations,
    );
    return {
      message: `Applied ${step.operations.length} operations`,
      output: { kind: "channel", channelId: channel.id },
    };
  }

  private annotate(run: RunData, step: AnnotatorStepConfig): StepOutcome {
    const plugin = this.registries.annotators.require(step.plugin ?? step.name);
    if (step.channelBindings) {
      run.runConfig.channelBindings[step.name] = {
        ...run.runConfig.channelBindings[step.name],
        ...step.channelBindings,
      };
    }

    const events = runAnnotator(run, plugin, step.name, step.parameters);
    run.annotations.set(step.name, events);

    return {
      message: `Detected ${events.length} events`,
      output: { kind: "events", events },
    };
  }

  private compute(run: RunData, step: ComputeStepConfig): StepOutcome {
    const plugin = this.registries.computes.require(step.plugin ?? step.name);
    if (step.channelBindings) {
      run.runConfig.channelBindings[step.name] = {
        ...run.runConfig.channelBindings[step.name],
        ...step.channelBindings,
      };
    }
    if (step.eventBindings) {
      run.runConfig.eventBindings[step.name] = {
        ...run.runConfig.eventBindings[step.name],
        ...step.eventBindings,
      };
    }

    const table = runCompute(run, plugin, step.name, step.parameters);
    return {
      message: `Computed ${table.length} rows`,
      output: { kind: "metrics", table },
    };
  }

  private dryRun(runs: RunData[]): PipelineReport {
    const plan = buildExecutionPlan(this.pipeline, runs.map(runLabel));

    for (const step of plan.steps) {
      logger.info(`${step.index}. [${step.stepType.toUpperCase()}] ${step.name}`, {
        enabled: step.enabled,
        detail: step.detail,
      });
    }

    const results = runs.map((run): RunResult => ({
      runId: runId(run),
      label: runLabel(run),
      subject: run.subject,
      session: run.session,
      run: run.run,
      status: "succeeded",
      stepResults: [],
      durationSeconds: 0,
    }));

    return new PipelineReport(this.pipeline.name, results, 0, plan);
  }

  private elapsedSince(startMs: number): number {
    return (this.now().getTime() - startMs) / 1000;
  }
}
