/**
 * Plugin Host
 *
 * Invokes annotators and compute modules for one plugin instance: resolves the
 * declared channel and event requirements through the instance's bindings,
 * layers parameters and validates what the plugin returns.
 */

import { ValidationError } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import { resolveAll, resolveEvents } from "@/services/resolver";
import type {
  AnalysisPlugin,
  AnnotatorPlugin,
  ComputePlugin,
  MetricsTable,
  PluginInputs,
  ResolvedChannel,
} from "@/types/plugins";
import type {
  ChannelSpec,
  Event,
  EventSpec,
  OperationParams,
  RunData,
} from "@/types/signals";
import { getChannelData } from "@/utils/channelUtils";
import { createEvent } from "@/utils/events";
import { mergeParameters } from "@/utils/params";

const logger = loggers.plugins.child("host");

/**
 * Descriptor defaults < run-level instance parameters < explicit parameters
 */
export function resolveParameters(
  plugin: AnalysisPlugin,
  run: RunData,
  instanceName: string,
  explicit?: OperationParams,
): OperationParams {
  return mergeParameters(
    plugin.getParameters(),
    run.runConfig.parameters[instanceName],
    explicit,
  );
}

/**
 * Resolve channels and events into the payload handed to a plugin.
 */
export function buildPluginInputs(
  run: RunData,
  requiredChannels: Record<string, ChannelSpec>,
  requiredEvents: Record<string, EventSpec>,
  instanceName: string,
): PluginInputs {
  const channels: Record<string, ResolvedChannel> = {};
  for (const [role, channel] of Object.entries(
    resolveAll(run, requiredChannels, undefined, instanceName),
  )) {
    channels[role] = { channel, ...getChannelData(run, channel) };
  }

  const events: Record<string, Event[]> = {};
  for (const [role, resolved] of Object.entries(
    resolveEvents(run, requiredEvents, undefined, instanceName),
  )) {
    events[role] = resolved.events;
  }

  return { run, channels, events };
}

export function runAnnotator(
  run: RunData,
  plugin: AnnotatorPlugin,
  instanceName: string,
  params?: OperationParams,
): Event[] {
  const inputs = buildPluginInputs(
    run,
    plugin.requiredChannels,
    {},
    instanceName,
  );
  const merged = resolveParameters(plugin, run, instanceName, params);

  const events = plugin.annotate(inputs, merged).map((event) => {
    if (event.eventType !== plugin.produces) {
      throw new ValidationError(
        `${plugin.name} produced a ${event.eventType} event, expected ${plugin.produces}`,
        { annotator: plugin.name, event: event.name },
      );
    }
    return createEvent(event);
  });

  logger.debug("Annotator finished", {
    plugin: plugin.name,
    instance: instanceName,
    events: events.length,
  });
  return events;
}

export function runCompute(
  run: RunData,
  plugin: ComputePlugin,
  instanceName: string,
  params?: OperationParams,
): MetricsTable {
  const inputs = buildPluginInputs(
    run,
    plugin.requiredChannels,
    plugin.requiredEvents,
    instanceName,
  );
  const merged = resolveParameters(plugin, run, instanceName, params);
  const table = plugin.compute(inputs, merged);

  logger.debug("Compute module finished", {
    plugin: plugin.name,
    instance: instanceName,
    rows: table.length,
  });
  return table;
}
