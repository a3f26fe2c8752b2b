// Types
export type * from "@/types/signals";
export type * from "@/types/plugins";
export type * from "@/types/pipeline";

// Ambient
export { getConfig, loadConfig, type LineageConfig } from "@/lib/config";
export * from "@/lib/errors";
export { createLogger, loggers, type Logger } from "@/lib/logger";

// Data model helpers
export * from "@/utils/channelUtils";
export { createEvent, eventDuration, sortByOnset, type EventInit } from "@/utils/events";
export {
  computeDerivative,
  estimateSamplingRate,
  interpolateMissing,
  nanMeanElementwise,
} from "@/utils/signalMath";

// Core
export { resolveAll, resolveChannel, resolveEvents, type ResolvedEvents } from "@/services/resolver";
export {
  ProvenanceEngine,
  getDerivedName,
  topologicalOrder,
  transitiveParents,
  validateProvenance,
  type ProvenanceEngineOptions,
  type ProvenanceIssue,
  type RecomputeSummary,
} from "@/services/provenanceEngine";
export {
  PluginRegistry,
  createRegistries,
  type PluginLookup,
  type PluginRegistries,
} from "@/services/pluginRegistry";
export { buildPluginInputs, resolveParameters, runAnnotator, runCompute } from "@/services/pluginHost";
export {
  PipelineReport,
  PipelineRunner,
  buildExecutionPlan,
  type PipelineRunnerOptions,
} from "@/services/pipelineRunner";
export { loadPipelineConfig, parsePipelineConfig, parsePipelineYaml } from "@/services/pipelineConfig";

// Persistence & export
export * from "@/services/persistence";
export {
  exportResults,
  metricsToCSV,
  metricsToJSON,
  saveComputeExport,
  saveComputeProvenance,
  type ExportedFiles,
} from "@/services/exportService";

// Built-in plugins
export * from "@/plugins";
