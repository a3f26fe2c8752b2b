/**
 * Channel & Run Utilities
 *
 * Centralized helpers for channel ids, signal groups and run identity.
 */

import type {
  Channel,
  ChannelSeries,
  RunConfig,
  RunData,
  RunIdentity,
  SignalGroup,
} from "@/types/signals";
import { estimateSamplingRate } from "@/utils/signalMath";

const TIME_COLUMNS = new Set(["utc", "time", "timestamp"]);

export function formatChannelId(group: string, name: string): string {
  return `${group}:${name}`;
}

export function channelFromParts(group: string, name: string): Channel {
  return { id: formatChannelId(group, name), group, name };
}

/**
 * Split "group:name" at the first colon.
 * @returns null when the id carries no group separator
 */
export function parseChannelId(
  channelId: string,
): { group: string; name: string } | null {
  const idx = channelId.indexOf(":");
  if (idx <= 0 || idx === channelId.length - 1) return null;
  return { group: channelId.slice(0, idx), name: channelId.slice(idx + 1) };
}

/**
 * List channel (non-time) column names in insertion order.
 */
export function listChannels(group: SignalGroup): string[] {
  return Array.from(group.columns.keys()).filter(
    (name) => !TIME_COLUMNS.has(name.toLowerCase()),
  );
}

export function hasChannel(run: RunData, group: string, name: string): boolean {
  return run.signals.get(group)?.columns.has(name) ?? false;
}

/**
 * Get time and values for a channel. Unknown channels give empty arrays.
 */
export function getChannelData(run: RunData, channel: Channel): ChannelSeries {
  const group = run.signals.get(channel.group);
  const values = group?.columns.get(channel.name);
  if (!group || !values) {
    return { time: [], values: [] };
  }
  return { time: [...group.time], values: [...values] };
}

/**
 * Channel names per group, for browsing and binding UIs.
 */
export function getModalityChannels(run: RunData): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const [name, group] of run.signals) {
    result[name] = listChannels(group);
  }
  return result;
}

// ============================================================================
// Construction
// ============================================================================

export function createSignalGroup(init: {
  name: string;
  modality?: string;
  time: number[];
  columns: Record<string, number[]> | Map<string, number[]>;
  samplingRate?: number | null;
}): SignalGroup {
  const columns =
    init.columns instanceof Map
      ? new Map(init.columns)
      : new Map(Object.entries(init.columns));

  return {
    name: init.name,
    modality: init.modality ?? init.name,
    time: [...init.time],
    columns,
    samplingRate:
      init.samplingRate === undefined
        ? estimateSamplingRate(init.time)
        : init.samplingRate,
  };
}

export function emptyRunConfig(): RunConfig {
  return { channelBindings: {}, eventBindings: {}, parameters: {} };
}

export function createRunData(
  identity: RunIdentity,
  groups: SignalGroup[],
  extras: Partial<
    Pick<
      RunData,
      "metadata" | "annotations" | "channelProvenance" | "runConfig"
    >
  > = {},
): RunData {
  return {
    ...identity,
    metadata: extras.metadata ?? {},
    signals: new Map(groups.map((group) => [group.name, group])),
    annotations: extras.annotations ?? new Map(),
    channelProvenance: extras.channelProvenance ?? new Map(),
    runConfig: extras.runConfig ?? emptyRunConfig(),
  };
}

// ============================================================================
// Identity
// ============================================================================

/** Label matched by pipeline run filters, e.g. "run-001" */
export function runLabel(run: RunIdentity): string {
  return `run-${run.run}`;
}

export function runId(run: RunIdentity): string {
  return `${run.subject}_${run.session}_${run.run}`;
}

/** Base name shared by a run's derived files */
export function derivedFileBase(run: RunIdentity): string {
  return `sub-${run.subject}_ses-${run.session}_task-${run.task}_condition-${run.condition}_run-${run.run}`;
}
