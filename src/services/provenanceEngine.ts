/**
 * Derived-Channel Provenance Engine
 *
 * Every transformation that annotators or compute modules consume produces a
 * persistent derived channel plus a provenance record. Only the record is
 * trusted: on load, derived columns are rebuilt from raw data by replaying the
 * recorded operations in dependency order.
 *
 * Naming convention, format {base}_{op1}_{op2}...
 * | Operation       | Suffix      | Example  |
 * |-----------------|-------------|----------|
 * | butter          | _bf{cutoff} | X_bf10   |
 * | savitzky_golay  | _sg         | X_sg     |
 * | rolling_mean    | _rm{window} | X_rm5    |
 * | derivative      | _d{order}   | X_d1     |
 * | detrend         | _dt         | X_dt     |
 * | resample        | _rs{hz}     | X_rs100  |
 * | anything else   | _{op}       | X_clip   |
 */

import { getConfig } from "@/lib/config";
import {
  ChannelNotFoundError,
  InsufficientSourcesError,
  LengthMismatchError,
  ProvenanceCycleError,
  UnknownOperationError,
  ValidationError,
  extractErrorMessage,
} from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type { PluginLookup } from "@/services/pluginRegistry";
import type { OperationConfig } from "@/types/pipeline";
import type { ProcessorPlugin } from "@/types/plugins";
import type {
  Channel,
  ChannelProvenance,
  OperationParams,
  RunData,
  SignalGroup,
} from "@/types/signals";
import {
  channelFromParts,
  formatChannelId,
  parseChannelId,
} from "@/utils/channelUtils";
import { booleanParam, numberParam, withoutParams } from "@/utils/params";
import {
  computeDerivative,
  interpolateMissing,
  nanMeanElementwise,
} from "@/utils/signalMath";

const logger = loggers.provenance;

export const AVERAGE_OPERATION = "average";
export const DERIVATIVE_OPERATION = "derivative";
const INTERPOLATE_PARAM = "interpolate_missing";

export interface ProvenanceEngineOptions {
  /** Clock for provenance timestamps */
  now?: () => Date;
  /** Hz, used when a group has no estimated sampling rate */
  defaultSamplingRate?: number;
}

export interface RecomputeSummary {
  recomputed: string[];
  skipped: Array<{ channelId: string; reason: string }>;
  failed: Array<{ channelId: string; error: string }>;
}

export type ProvenanceIssue =
  | { kind: "malformed_id"; channelId: string }
  | { kind: "dangling_parent"; channelId: string; parent: string }
  | { kind: "cycle"; channelId: string };

// ============================================================================
// Naming
// ============================================================================

/**
 * Derived channel name for an operation applied to `baseName`
 */
export function getDerivedName(
  baseName: string,
  operation: string,
  params: OperationParams,
): string {
  const intParam = (name: string, fallback: number) =>
    Math.trunc(numberParam(params, name, fallback));

  switch (operation) {
    case "butter":
      return `${baseName}_bf${intParam("cutoff", 10)}`;
    case "savitzky_golay":
      return `${baseName}_sg`;
    case "rolling_mean":
      return `${baseName}_rm${intParam("window_size", 5)}`;
    case DERIVATIVE_OPERATION:
      return `${baseName}_d${intParam("order", 1)}`;
    case "detrend":
      return `${baseName}_dt`;
    case "resample":
      return `${baseName}_rs${intParam("target_hz", 100)}`;
    default:
      return `${baseName}_${operation}`;
  }
}

// ============================================================================
// Graph helpers
// ============================================================================

/**
 * Order tracked channel ids so parents come before children (Kahn's algorithm).
 * Parents that are not tracked are raw inputs and are not part of the output.
 * Ids on a cycle never reach in-degree zero and are left out.
 */
export function topologicalOrder(
  provenance: Map<string, ChannelProvenance>,
): string[] {
  const children = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  for (const id of provenance.keys()) {
    children.set(id, []);
    inDegree.set(id, 0);
  }

  for (const [id, prov] of provenance) {
    for (const parent of prov.parents) {
      const list = children.get(parent);
      if (list) {
        list.push(id);
        inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
      }
    }
  }

  const queue = Array.from(inDegree.entries())
    .filter(([, degree]) => degree === 0)
    .map(([id]) => id);
  const result: string[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    result.push(id);
    for (const child of children.get(id) ?? []) {
      const degree = (inDegree.get(child) ?? 0) - 1;
      inDegree.set(child, degree);
      if (degree === 0) queue.push(child);
    }
  }

  return result;
}

/**
 * All ancestors of a channel reachable through provenance records
 */
export function transitiveParents(
  provenance: Map<string, ChannelProvenance>,
  channelId: string,
): Set<string> {
  const seen = new Set<string>();
  const stack = [...(provenance.get(channelId)?.parents ?? [])];

  while (stack.length > 0) {
    const parent = stack.pop();
    if (parent === undefined || seen.has(parent)) continue;
    seen.add(parent);
    stack.push(...(provenance.get(parent)?.parents ?? []));
  }

  return seen;
}

/**
 * Check the provenance graph of a run: ids must be "group:name", every parent
 * must be a raw column or another tracked channel, and there are no cycles.
 */
export function validateProvenance(run: RunData): ProvenanceIssue[] {
  const issues: ProvenanceIssue[] = [];
  const provenance = run.channelProvenance;

  for (const [channelId, prov] of provenance) {
    if (!parseChannelId(channelId)) {
      issues.push({ kind: "malformed_id", channelId });
    }
    for (const parent of prov.parents) {
      if (provenance.has(parent)) continue;
      const parts = parseChannelId(parent);
      const exists =
        parts !== null &&
        (run.signals.get(parts.group)?.columns.has(parts.name) ?? false);
      if (!exists) {
        issues.push({ kind: "dangling_parent", channelId, parent });
      }
    }
  }

  const ordered = new Set(topologicalOrder(provenance));
  for (const channelId of provenance.keys()) {
    if (!ordered.has(channelId)) {
      issues.push({ kind: "cycle", channelId });
    }
  }

  return issues;
}

function wouldCycle(
  provenance: Map<string, ChannelProvenance>,
  channelId: string,
  parents: string[],
): boolean {
  return parents.some(
    (parent) =>
      parent === channelId ||
      transitiveParents(provenance, parent).has(channelId),
  );
}

// ============================================================================
// Engine
// ============================================================================

type ReplayOutcome = { status: "recomputed" } | { status: "skipped"; reason: string };

export class ProvenanceEngine {
  private readonly now: () => Date;
  private readonly defaultSamplingRate: number;

  constructor(
    private readonly processors: PluginLookup<ProcessorPlugin>,
    options: ProvenanceEngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.defaultSamplingRate =
      options.defaultSamplingRate ?? getConfig().defaultSamplingRate;
  }

  /**
   * Create a derived channel and record its provenance in the run.
   *
   * @param params Operation parameters; `interpolate_missing: true` fills NaNs
   *   before the operation runs
   * @param customSuffix Used instead of the naming convention when given
   * @throws ChannelNotFoundError, UnknownOperationError, LengthMismatchError,
   *   ProvenanceCycleError
   */
  createDerivedChannel(
    run: RunData,
    groupName: string,
    sourceChannel: string,
    operation: string,
    params: OperationParams = {},
    customSuffix?: string,
  ): Channel {
    const group = this.requireGroup(run, groupName);
    const sourceValues = group.columns.get(sourceChannel);
    if (!sourceValues) {
      throw new ChannelNotFoundError(
        `Channel '${sourceChannel}' not found in group '${groupName}'`,
        { group: groupName, channel: sourceChannel },
      );
    }

    const derivedName = customSuffix
      ? `${sourceChannel}_${customSuffix}`
      : getDerivedName(sourceChannel, operation, params);
    const channel = channelFromParts(groupName, derivedName);
    const parentId = formatChannelId(groupName, sourceChannel);

    if (wouldCycle(run.channelProvenance, channel.id, [parentId])) {
      throw new ProvenanceCycleError(channel.id);
    }

    const result = this.applyOperation(group, sourceValues, operation, params);

    group.columns.set(derivedName, result);
    run.channelProvenance.set(channel.id, {
      parents: [parentId],
      operation,
      parameters: { ...params },
      timestamp: this.now().toISOString(),
    });

    logger.debug("Created derived channel", {
      channel: channel.id,
      parent: parentId,
      operation,
    });
    return channel;
  }

  createFilterChannel(
    run: RunData,
    groupName: string,
    sourceChannel: string,
    filterType: string,
    filterParams: OperationParams = {},
  ): Channel {
    return this.createDerivedChannel(
      run,
      groupName,
      sourceChannel,
      filterType,
      filterParams,
    );
  }

  createDerivativeChannel(
    run: RunData,
    groupName: string,
    sourceChannel: string,
    order = 1,
  ): Channel {
    return this.createDerivedChannel(
      run,
      groupName,
      sourceChannel,
      DERIVATIVE_OPERATION,
      { order },
    );
  }

  /**
   * Average two or more channels into `targetGroup[outputName]`.
   * Arrays must have equal lengths; nothing is resampled, padded or truncated.
   */
  createAveragedChannel(
    run: RunData,
    sources: Array<Pick<Channel, "group" | "name">>,
    targetGroup: string,
    outputName: string,
    interpolate = true,
  ): Channel {
    if (sources.length < 2) {
      throw new InsufficientSourcesError(sources.length);
    }

    const parentIds = sources.map((s) => formatChannelId(s.group, s.name));
    const target = this.requireGroup(run, targetGroup);
    const channel = channelFromParts(targetGroup, outputName);

    const averaged = this.averageChannels(run, parentIds, interpolate);

    if (wouldCycle(run.channelProvenance, channel.id, parentIds)) {
      throw new ProvenanceCycleError(channel.id);
    }
    if (averaged.length !== target.time.length) {
      throw new LengthMismatchError([target.time.length, averaged.length], {
        targetGroup,
      });
    }

    target.columns.set(outputName, averaged);
    run.channelProvenance.set(channel.id, {
      parents: parentIds,
      operation: AVERAGE_OPERATION,
      parameters: { [INTERPOLATE_PARAM]: interpolate },
      timestamp: this.now().toISOString(),
    });

    logger.debug("Created averaged channel", {
      channel: channel.id,
      parents: parentIds,
    });
    return channel;
  }

  /**
   * Apply operations in sequence, each output feeding the next.
   * @example
   * // X → X_bf10 → X_bf10_d1
   * engine.applyProcessingChain(run, "tablet_motion", "X", [
   *   { op: "butter", params: { cutoff: 10 } },
   *   { op: "derivative", params: { order: 1 } },
   * ]);
   */
  applyProcessingChain(
    run: RunData,
    groupName: string,
    sourceChannel: string,
    operations: OperationConfig[],
  ): Channel {
    if (operations.length === 0) {
      throw new ValidationError(
        `Processing chain for '${groupName}:${sourceChannel}' has no operations`,
      );
    }

    let current = sourceChannel;
    let channel: Channel | null = null;
    for (const { op, params } of operations) {
      channel = this.createDerivedChannel(run, groupName, current, op, params);
      current = channel.name;
    }

    // operations is non-empty, so the loop assigned a channel
    return channel ?? channelFromParts(groupName, current);
  }

  /**
   * Rebuild every derived column of a run from raw data and recorded lineage.
   *
   * Columns of tracked channels are discarded first so no previously saved
   * derived value survives. Failures are contained per channel: the error is
   * logged and the remaining channels are still recomputed.
   */
  recomputeDerivedChannels(run: RunData): RecomputeSummary {
    const summary: RecomputeSummary = { recomputed: [], skipped: [], failed: [] };
    if (run.channelProvenance.size === 0) return summary;

    for (const channelId of run.channelProvenance.keys()) {
      const parts = parseChannelId(channelId);
      if (parts) run.signals.get(parts.group)?.columns.delete(parts.name);
    }

    const order = topologicalOrder(run.channelProvenance);
    const ordered = new Set(order);
    for (const channelId of run.channelProvenance.keys()) {
      if (!ordered.has(channelId)) {
        logger.warn("Channel is part of a provenance cycle, not recomputed", {
          channel: channelId,
        });
        summary.skipped.push({ channelId, reason: "provenance cycle" });
      }
    }

    for (const channelId of order) {
      const prov = run.channelProvenance.get(channelId);
      if (!prov) continue;

      try {
        const outcome = this.replay(run, channelId, prov);
        if (outcome.status === "recomputed") {
          summary.recomputed.push(channelId);
        } else {
          logger.debug("Skipped derived channel", {
            channel: channelId,
            reason: outcome.reason,
          });
          summary.skipped.push({ channelId, reason: outcome.reason });
        }
      } catch (error) {
        const message = extractErrorMessage(error);
        logger.error("Error recomputing derived channel", {
          channel: channelId,
          error: message,
        });
        summary.failed.push({ channelId, error: message });
      }
    }

    logger.info("Recomputed derived channels", {
      recomputed: summary.recomputed.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
    });
    return summary;
  }

  // --------------------------------------------------------------------------

  private replay(
    run: RunData,
    channelId: string,
    prov: ChannelProvenance,
  ): ReplayOutcome {
    const parts = parseChannelId(channelId);
    if (!parts) return { status: "skipped", reason: "malformed channel id" };

    const group = run.signals.get(parts.group);
    if (!group) {
      return { status: "skipped", reason: `group '${parts.group}' not in run` };
    }

    if (prov.operation === AVERAGE_OPERATION) {
      const averaged = this.averageChannels(
        run,
        prov.parents,
        booleanParam(prov.parameters, INTERPOLATE_PARAM, true),
      );
      if (averaged.length !== group.time.length) {
        throw new LengthMismatchError([group.time.length, averaged.length], {
          channel: channelId,
        });
      }
      group.columns.set(parts.name, averaged);
      return { status: "recomputed" };
    }

    const parentId = prov.parents[0];
    if (parentId === undefined) {
      return { status: "skipped", reason: "no parent recorded" };
    }
    const parent = parseChannelId(parentId);
    if (!parent) {
      return { status: "skipped", reason: `malformed parent id '${parentId}'` };
    }
    if (parent.group !== parts.group) {
      return { status: "skipped", reason: "cross-group parent" };
    }

    const parentValues = group.columns.get(parent.name);
    if (!parentValues) {
      throw new ChannelNotFoundError(
        `Parent channel '${parentId}' not available`,
        { channel: channelId, parent: parentId },
      );
    }

    const result = this.applyOperation(
      group,
      parentValues,
      prov.operation,
      prov.parameters,
    );
    group.columns.set(parts.name, result);
    return { status: "recomputed" };
  }

  /**
   * Shared by creation and replay so both produce identical values
   */
  private applyOperation(
    group: SignalGroup,
    sourceValues: number[],
    operation: string,
    params: OperationParams,
  ): number[] {
    const source = booleanParam(params, INTERPOLATE_PARAM, false)
      ? interpolateMissing(sourceValues)
      : [...sourceValues];

    if (operation === DERIVATIVE_OPERATION) {
      return computeDerivative(
        group.time,
        source,
        numberParam(params, "order", 1),
      );
    }

    const processor = this.processors.lookup(operation);
    if (!processor) {
      throw new UnknownOperationError(operation);
    }

    const samplingRate = group.samplingRate ?? this.defaultSamplingRate;
    const result = processor.process(
      source,
      samplingRate,
      withoutParams(params, [INTERPOLATE_PARAM]),
    );

    if (result.length !== source.length) {
      throw new LengthMismatchError([source.length, result.length], {
        operation,
      });
    }
    return result;
  }

  private averageChannels(
    run: RunData,
    channelIds: string[],
    interpolate: boolean,
  ): number[] {
    const arrays = channelIds.map((channelId) => {
      const parts = parseChannelId(channelId);
      const values = parts
        ? run.signals.get(parts.group)?.columns.get(parts.name)
        : undefined;
      if (!values) {
        throw new ChannelNotFoundError(`Channel '${channelId}' not found`, {
          channel: channelId,
        });
      }
      return interpolate ? interpolateMissing(values) : [...values];
    });

    return nanMeanElementwise(arrays);
  }

  private requireGroup(run: RunData, groupName: string): SignalGroup {
    const group = run.signals.get(groupName);
    if (!group) {
      throw new ChannelNotFoundError(
        `SignalGroup '${groupName}' not found in run`,
        { group: groupName },
      );
    }
    return group;
  }
}
