/**
 * Channel & Event Resolution
 *
 * Maps a plugin's declared requirements to concrete channels and event groups
 * using instance-scoped bindings. Channel resolution is exact-match only and
 * fails fast; there is no silent fallback.
 */

import {
  ChannelNotBoundError,
  ChannelNotFoundError,
  EventsNotFoundError,
} from "@/lib/errors";
import { loggers } from "@/lib/logger";
import type {
  Channel,
  ChannelSpec,
  Event,
  EventSpec,
  RunConfig,
  RunData,
} from "@/types/signals";
import { channelFromParts, parseChannelId } from "@/utils/channelUtils";

const logger = loggers.resolver;

export interface ResolvedEvents {
  /** Annotation group the events came from */
  group: string;
  /** "binding" when the instance config named the group, "type_match" otherwise */
  source: "binding" | "type_match";
  events: Event[];
}

/**
 * Resolve one ChannelSpec to the channel bound for this instance.
 *
 * @throws ChannelNotBoundError when no binding exists for the instance/role
 * @throws ChannelNotFoundError when the bound id names no existing column
 */
export function resolveChannel(
  run: RunData,
  spec: ChannelSpec,
  config: RunConfig,
  instanceName: string,
): Channel {
  const channelId = config.channelBindings[instanceName]?.[spec.semanticRole];
  if (channelId === undefined) {
    throw new ChannelNotBoundError(spec.semanticRole, instanceName);
  }

  const parts = parseChannelId(channelId);
  if (!parts) {
    throw new ChannelNotFoundError(
      `Bound channel '${channelId}' is not a "group:name" id (role='${spec.semanticRole}', instance='${instanceName}')`,
      { channelId, semanticRole: spec.semanticRole, instanceName },
    );
  }

  const group = run.signals.get(parts.group);
  if (!group) {
    throw new ChannelNotFoundError(
      `SignalGroup '${parts.group}' not found for bound channel '${channelId}' (instance='${instanceName}')`,
      { channelId, semanticRole: spec.semanticRole, instanceName },
    );
  }

  if (!group.columns.has(parts.name)) {
    throw new ChannelNotFoundError(
      `Channel '${parts.name}' not found in group '${parts.group}' (instance='${instanceName}')`,
      { channelId, semanticRole: spec.semanticRole, instanceName },
    );
  }

  return channelFromParts(parts.group, parts.name);
}

/**
 * Resolve every role of a plugin. Fails on the first unresolved role.
 */
export function resolveAll(
  run: RunData,
  specs: Record<string, ChannelSpec>,
  config: RunConfig | undefined,
  instanceName: string,
): Record<string, Channel> {
  const useConfig = config ?? run.runConfig;
  const resolved: Record<string, Channel> = {};

  for (const [role, spec] of Object.entries(specs)) {
    resolved[role] = resolveChannel(run, spec, useConfig, instanceName);
  }

  return resolved;
}

/**
 * Resolve EventSpecs to annotation groups.
 *
 * Per role: an instance binding naming an existing group wins; otherwise the
 * first non-empty group (insertion order) whose first event has the spec's
 * event type.
 */
export function resolveEvents(
  run: RunData,
  specs: Record<string, EventSpec>,
  config: RunConfig | undefined,
  instanceName: string,
): Record<string, ResolvedEvents> {
  const useConfig = config ?? run.runConfig;
  const resolved: Record<string, ResolvedEvents> = {};

  for (const [role, spec] of Object.entries(specs)) {
    const boundGroup = useConfig.eventBindings[instanceName]?.[role];
    if (boundGroup !== undefined) {
      const events = run.annotations.get(boundGroup);
      if (events) {
        resolved[role] = { group: boundGroup, source: "binding", events };
        continue;
      }
      logger.warn("Bound event group not found, falling back to type match", {
        group: boundGroup,
        role,
        instance: instanceName,
      });
    }

    const match = findGroupByEventType(run, spec.eventType);
    if (!match) {
      throw new EventsNotFoundError(role, spec.eventType, instanceName);
    }

    logger.debug("Auto-resolved event group by type", {
      group: match.group,
      role,
      instance: instanceName,
    });
    resolved[role] = { ...match, source: "type_match" };
  }

  return resolved;
}

function findGroupByEventType(
  run: RunData,
  eventType: string,
): { group: string; events: Event[] } | null {
  for (const [group, events] of run.annotations) {
    if (events.length > 0 && events[0].eventType === eventType) {
      return { group, events };
    }
  }
  return null;
}
