/**
 * Derived-State Persistence
 *
 * Per run, three JSON files live in the derived directory:
 *   {base}_channels.json     channel provenance (never the derived values)
 *   {base}_run_config.json   instance-scoped bindings and parameters
 *   {base}_annotations.json  events per annotation group
 * where base = sub-{s}_ses-{ses}_task-{t}_condition-{c}_run-{r}.
 *
 * Loaders return null (or an empty result) when the file does not exist and
 * throw ValidationError when it exists but does not match its schema.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ValidationError, extractErrorMessage } from "@/lib/errors";
import { loggers } from "@/lib/logger";
import {
  AnnotationEventSchema,
  AnnotationFileSchema,
  ChannelProvenanceFileSchema,
  RunConfigFileSchema,
} from "@/lib/schemas";
import type {
  ProvenanceEngine,
  RecomputeSummary,
} from "@/services/provenanceEngine";
import type {
  ChannelProvenance,
  Event,
  RunConfig,
  RunData,
  RunIdentity,
} from "@/types/signals";
import { derivedFileBase } from "@/utils/channelUtils";
import { createEvent } from "@/utils/events";

const logger = loggers.persistence;

export const RUN_START_METADATA_KEY = "run_start_utc";

export function derivedFilePath(
  derivedDir: string,
  run: RunIdentity,
  suffix: "channels" | "run_config" | "annotations",
): string {
  return path.join(derivedDir, `${derivedFileBase(run)}_${suffix}.json`);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readJsonIfExists(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }

  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch (error) {
    throw new ValidationError(
      `${filePath} is not valid JSON: ${extractErrorMessage(error)}`,
      { path: filePath },
    );
  }
}

async function writeJson(filePath: string, data: unknown): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  logger.debug("Wrote file", { path: filePath });
  return filePath;
}

// ============================================================================
// Channel provenance
// ============================================================================

export async function saveChannelProvenance(
  run: RunData,
  derivedDir: string,
): Promise<string> {
  const data: Record<string, ChannelProvenance> = {};
  for (const [channelId, prov] of run.channelProvenance) {
    data[channelId] = {
      parents: prov.parents,
      operation: prov.operation,
      parameters: prov.parameters,
      timestamp: prov.timestamp,
    };
  }
  return writeJson(derivedFilePath(derivedDir, run, "channels"), data);
}

export async function loadChannelProvenance(
  run: RunIdentity,
  derivedDir: string,
): Promise<Map<string, ChannelProvenance> | null> {
  const filePath = derivedFilePath(derivedDir, run, "channels");
  const data = await readJsonIfExists(filePath);
  if (data === undefined) return null;

  const parsed = ChannelProvenanceFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid channel provenance file ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues,
    });
  }
  return new Map(Object.entries(parsed.data));
}

// ============================================================================
// Run config
// ============================================================================

export async function saveRunConfig(
  run: RunData,
  derivedDir: string,
): Promise<string> {
  const { channelBindings, parameters, eventBindings } = run.runConfig;
  return writeJson(derivedFilePath(derivedDir, run, "run_config"), {
    channel_bindings: channelBindings,
    parameters,
    event_bindings: eventBindings,
  });
}

export async function loadRunConfig(
  run: RunIdentity,
  derivedDir: string,
): Promise<RunConfig | null> {
  const filePath = derivedFilePath(derivedDir, run, "run_config");
  const data = await readJsonIfExists(filePath);
  if (data === undefined) return null;

  const parsed = RunConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid run config file ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues,
    });
  }
  return {
    channelBindings: parsed.data.channel_bindings,
    parameters: parsed.data.parameters,
    eventBindings: parsed.data.event_bindings,
  };
}

// ============================================================================
// Annotations
// ============================================================================

export interface LoadedAnnotations {
  runStartUtc: string | null;
  annotations: Map<string, Event[]>;
  /** Events that failed validation and were left out */
  skipped: number;
}

export async function saveAnnotations(
  run: RunData,
  derivedDir: string,
): Promise<string> {
  const annotations: Record<string, unknown[]> = {};
  for (const [group, events] of run.annotations) {
    annotations[group] = events.map((event) => ({
      annotator: event.annotator,
      name: event.name,
      event_type: event.eventType,
      onset: event.onset,
      ...(event.offset !== undefined ? { offset: event.offset } : {}),
      ...(event.confidence !== undefined
        ? { confidence: event.confidence }
        : {}),
      metadata: event.metadata,
    }));
  }

  return writeJson(derivedFilePath(derivedDir, run, "annotations"), {
    run_start_utc: run.metadata[RUN_START_METADATA_KEY] ?? null,
    annotations,
  });
}

function parseStoredEvent(raw: unknown): Event {
  const parsed = AnnotationEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "invalid event");
  }
  const ev = parsed.data;
  const hasOffset = ev.offset !== undefined && ev.offset !== null;
  return createEvent({
    annotator: ev.annotator ?? "Unknown",
    name: ev.name,
    eventType: ev.event_type ?? (hasOffset ? "interval" : "timepoint"),
    onset: ev.onset,
    offset: ev.offset,
    confidence: ev.confidence,
    metadata: ev.metadata,
  });
}

/**
 * Events that fail validation are skipped with a warning; groups left empty
 * are dropped.
 */
export async function loadAnnotations(
  run: RunIdentity,
  derivedDir: string,
): Promise<LoadedAnnotations> {
  const filePath = derivedFilePath(derivedDir, run, "annotations");
  const data = await readJsonIfExists(filePath);
  if (data === undefined) {
    return { runStartUtc: null, annotations: new Map(), skipped: 0 };
  }

  const parsed = AnnotationFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(`Invalid annotation file ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues,
    });
  }

  const annotations = new Map<string, Event[]>();
  let skipped = 0;
  for (const [group, rawEvents] of Object.entries(parsed.data.annotations)) {
    const events: Event[] = [];
    for (const [index, raw] of rawEvents.entries()) {
      try {
        events.push(parseStoredEvent(raw));
      } catch (error) {
        skipped++;
        logger.warn("Skipping invalid event", {
          path: filePath,
          group,
          index,
          error: extractErrorMessage(error),
        });
      }
    }
    if (events.length > 0) annotations.set(group, events);
  }

  return {
    runStartUtc: parsed.data.run_start_utc ?? null,
    annotations,
    skipped,
  };
}

// ============================================================================
// Restore
// ============================================================================

export async function saveDerivedState(
  run: RunData,
  derivedDir: string,
): Promise<string[]> {
  return Promise.all([
    saveChannelProvenance(run, derivedDir),
    saveRunConfig(run, derivedDir),
    saveAnnotations(run, derivedDir),
  ]);
}

/**
 * Load provenance, run config and annotations for a run holding raw signals,
 * then rebuild its derived channels from the recorded lineage.
 */
export async function restoreDerivedState(
  run: RunData,
  derivedDir: string,
  engine: ProvenanceEngine,
): Promise<RecomputeSummary> {
  const [provenance, runConfig, loaded] = await Promise.all([
    loadChannelProvenance(run, derivedDir),
    loadRunConfig(run, derivedDir),
    loadAnnotations(run, derivedDir),
  ]);

  if (provenance) run.channelProvenance = provenance;
  if (runConfig) run.runConfig = runConfig;
  for (const [group, events] of loaded.annotations) {
    run.annotations.set(group, events);
  }
  if (loaded.runStartUtc !== null) {
    run.metadata[RUN_START_METADATA_KEY] = loaded.runStartUtc;
  }

  logger.info("Restored derived state", {
    run: derivedFileBase(run),
    provenance: provenance?.size ?? 0,
    annotationGroups: loaded.annotations.size,
  });
  return engine.recomputeDerivedChannels(run);
}
