/**
 * Zod schemas for persisted run state and pipeline configuration.
 * Wire formats use snake_case keys; pipeline configs are transformed into the
 * camelCase types of `@/types/pipeline`.
 */

import { z } from "zod";
import type { PipelineConfig } from "@/types/pipeline";
import { parseChannelId } from "@/utils/channelUtils";

export const ParamValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export const ParamsSchema = z.record(ParamValueSchema);

// ============================================================================
// Persisted Run State Schemas
// ============================================================================

export const ChannelProvenanceEntrySchema = z.object({
  parents: z.array(z.string()),
  operation: z.string().min(1),
  parameters: ParamsSchema.default({}),
  timestamp: z.string(),
});

/** `{derivedFileBase}_channels.json` */
export const ChannelProvenanceFileSchema = z.record(
  ChannelProvenanceEntrySchema,
);

/** `{derivedFileBase}_run_config.json` */
export const RunConfigFileSchema = z.object({
  channel_bindings: z.record(z.record(z.string())).default({}),
  parameters: z.record(ParamsSchema).default({}),
  event_bindings: z.record(z.record(z.string())).default({}),
});

export const EventTypeSchema = z.enum(["timepoint", "interval"]);

export const AnnotationEventSchema = z.object({
  name: z.string(),
  onset: z.number(),
  offset: z.number().nullable().optional(),
  confidence: z.number().nullable().optional(),
  metadata: ParamsSchema.default({}),
  annotator: z.string().optional(),
  event_type: EventTypeSchema.optional(),
});

/**
 * `{derivedFileBase}_annotations.json`. Events stay unparsed here so one bad
 * event can be skipped without rejecting the file.
 */
export const AnnotationFileSchema = z.object({
  run_start_utc: z.string().nullable().optional(),
  annotations: z.record(z.array(z.unknown())).default({}),
});

// ============================================================================
// Pipeline Configuration Schemas
// ============================================================================

const ChannelIdSchema = z
  .string()
  .refine((value) => parseChannelId(value) !== null, {
    message: 'Channel must be written as "group:name"',
  });

/** `{ op: "butter", cutoff: 10, order: 4 }` → `{ op, params }` */
export const OperationWireSchema = z
  .object({ op: z.string().min(1) })
  .catchall(ParamValueSchema)
  .transform(({ op, ...params }) => ({ op, params }));

export const PreprocessingWireSchema = z.object({
  channel: ChannelIdSchema,
  operations: z.array(OperationWireSchema).min(1),
});

export const AnnotatorStepWireSchema = z.object({
  name: z.string().min(1),
  plugin: z.string().min(1).optional(),
  channel_bindings: z.record(ChannelIdSchema).optional(),
  parameters: ParamsSchema.optional(),
  enabled: z.boolean().default(true),
});

export const ComputeStepWireSchema = AnnotatorStepWireSchema.extend({
  depends_on: z.array(z.string()).default([]),
  event_bindings: z.record(z.string()).optional(),
});

export const ExportFormatSchema = z.enum(["csv", "json"]);

export const ExportWireSchema = z.object({
  aggregate: z.string().min(1).nullable().optional(),
  format: ExportFormatSchema.default("csv"),
  per_run: z.boolean().default(true),
  summary_stats: z.boolean().default(true),
});

export const PipelineWireSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    preprocessing: z.array(PreprocessingWireSchema).default([]),
    annotators: z.array(AnnotatorStepWireSchema).default([]),
    compute: z.array(ComputeStepWireSchema).default([]),
    export: ExportWireSchema.optional(),
  })
  .superRefine((pipeline, ctx) => {
    const seen = new Set<string>();
    const steps = [
      ...pipeline.annotators.map((s) => ({ name: s.name, list: "annotators" })),
      ...pipeline.compute.map((s) => ({ name: s.name, list: "compute" })),
    ];
    for (const { name, list } of steps) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate step name '${name}'`,
          path: [list],
        });
      }
      seen.add(name);
    }
  });

export const PipelineConfigSchema = PipelineWireSchema.transform(
  (wire): PipelineConfig => ({
    name: wire.name,
    description: wire.description,
    preprocessing: wire.preprocessing,
    annotators: wire.annotators.map((step) => ({
      name: step.name,
      plugin: step.plugin,
      channelBindings: step.channel_bindings,
      parameters: step.parameters,
      enabled: step.enabled,
    })),
    compute: wire.compute.map((step) => ({
      name: step.name,
      plugin: step.plugin,
      dependsOn: step.depends_on,
      channelBindings: step.channel_bindings,
      eventBindings: step.event_bindings,
      parameters: step.parameters,
      enabled: step.enabled,
    })),
    export: wire.export && {
      aggregate: wire.export.aggregate ?? undefined,
      format: wire.export.format,
      perRun: wire.export.per_run,
      summaryStats: wire.export.summary_stats,
    },
  }),
);

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type ChannelProvenanceFileSchemaType = z.infer<
  typeof ChannelProvenanceFileSchema
>;
export type RunConfigFileSchemaType = z.infer<typeof RunConfigFileSchema>;
export type AnnotationEventSchemaType = z.infer<typeof AnnotationEventSchema>;
export type AnnotationFileSchemaType = z.infer<typeof AnnotationFileSchema>;
export type PipelineWireSchemaType = z.input<typeof PipelineWireSchema>;
