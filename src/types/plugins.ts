/**
 * Plugin capability interfaces.
 *
 * Plugins are plain objects implementing one of these shapes and are looked up
 * by name through an injected registry; there is no base class.
 */

import type {
  Channel,
  ChannelSpec,
  Event,
  EventSpec,
  EventType,
  OperationParams,
  ParamValue,
  RunData,
} from "@/types/signals";

export type ParameterType = "int" | "float" | "bool" | "enum" | "str";

export interface ParameterDescriptor {
  /** Internal name passed to the plugin */
  name: string;
  /** Display name */
  label: string;
  type: ParameterType;
  default: ParamValue;
  min?: number;
  max?: number;
  step?: number;
  /** Choices for "enum" */
  options?: string[];
  /** Unit label, e.g. " Hz" */
  suffix?: string;
}

// ============================================================================
// Processors
// ============================================================================

export interface ProcessorPlugin {
  name: string;
  description: string;
  getParameters(): ParameterDescriptor[];
  process(
    values: number[],
    samplingRate: number,
    params: OperationParams,
  ): number[];
}

// ============================================================================
// Annotators & compute modules
// ============================================================================

export interface ResolvedChannel {
  channel: Channel;
  time: number[];
  values: number[];
}

export interface PluginInputs {
  run: RunData;
  channels: Record<string, ResolvedChannel>;
  events: Record<string, Event[]>;
}

export type MetricValue = number | string | boolean | null;
export type MetricsRow = Record<string, MetricValue>;
/** Row-oriented metrics table */
export type MetricsTable = MetricsRow[];

export interface AnnotatorPlugin {
  kind: "annotator";
  name: string;
  version: string;
  produces: EventType;
  requiredChannels: Record<string, ChannelSpec>;
  getParameters(): ParameterDescriptor[];
  annotate(inputs: PluginInputs, params: OperationParams): Event[];
}

export interface ComputePlugin {
  kind: "compute";
  name: string;
  version: string;
  requiredChannels: Record<string, ChannelSpec>;
  requiredEvents: Record<string, EventSpec>;
  getParameters(): ParameterDescriptor[];
  compute(inputs: PluginInputs, params: OperationParams): MetricsTable;
}

export type AnalysisPlugin = AnnotatorPlugin | ComputePlugin;
