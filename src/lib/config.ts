/**
 * Runtime configuration read from the environment.
 */

import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SIGNAL_LINEAGE_DEFAULT_SAMPLING_RATE: z.coerce
    .number()
    .positive()
    .default(100),
});

export interface LineageConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  /** Hz, used when a signal group has no estimated sampling rate */
  defaultSamplingRate: number;
}

export function loadConfig(
  env: Record<string, string | undefined>,
): LineageConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Invalid environment configuration: ${issues}`,
    );
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    defaultSamplingRate: parsed.data.SIGNAL_LINEAGE_DEFAULT_SAMPLING_RATE,
  };
}

let cached: LineageConfig | null = null;

export function getConfig(): LineageConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}
