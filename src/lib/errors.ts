/**
 * Error taxonomy for resolution, derived-channel creation and pipeline execution.
 *
 * Resolution and creation errors propagate to their caller. The pipeline
 * runner converts anything thrown inside a step into a failed run result.
 */

export type LineageErrorCode =
  | "channel_not_bound"
  | "channel_not_found"
  | "events_not_found"
  | "unknown_operation"
  | "length_mismatch"
  | "insufficient_sources"
  | "provenance_cycle"
  | "invalid_signal"
  | "plugin_not_found"
  | "step_execution"
  | "configuration"
  | "validation";

export class LineageError extends Error {
  readonly code: LineageErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: LineageErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ChannelNotBoundError extends LineageError {
  constructor(semanticRole: string, instanceName: string) {
    super(
      "channel_not_bound",
      `No channel bound for role '${semanticRole}' (instance='${instanceName}')`,
      { semanticRole, instanceName },
    );
  }
}

export class ChannelNotFoundError extends LineageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("channel_not_found", message, details);
  }
}

export class EventsNotFoundError extends LineageError {
  constructor(role: string, eventType: string, instanceName: string) {
    super(
      "events_not_found",
      `No events found for role '${role}' (event_type='${eventType}', instance='${instanceName}')`,
      { role, eventType, instanceName },
    );
  }
}

export class UnknownOperationError extends LineageError {
  constructor(operation: string) {
    super("unknown_operation", `Unknown operation: ${operation}`, {
      operation,
    });
  }
}

export class LengthMismatchError extends LineageError {
  constructor(lengths: number[], details?: Record<string, unknown>) {
    super(
      "length_mismatch",
      `Channel lengths differ: [${lengths.join(", ")}]`,
      { lengths, ...details },
    );
  }
}

export class InsufficientSourcesError extends LineageError {
  constructor(count: number) {
    super(
      "insufficient_sources",
      `Need at least 2 channels to average, got ${count}`,
      { count },
    );
  }
}

export class ProvenanceCycleError extends LineageError {
  constructor(channelId: string) {
    super(
      "provenance_cycle",
      `Channel '${channelId}' would become its own ancestor`,
      { channelId },
    );
  }
}

export class InvalidSignalError extends LineageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("invalid_signal", message, details);
  }
}

export class PluginNotFoundError extends LineageError {
  constructor(kind: string, name: string) {
    super("plugin_not_found", `${kind} not found: ${name}`, { kind, name });
  }
}

export class StepExecutionError extends LineageError {
  readonly stepName: string;

  constructor(stepName: string, stepType: string, cause: unknown) {
    super(
      "step_execution",
      `${stepType} step '${stepName}' failed: ${extractErrorMessage(cause)}`,
      { stepName, stepType },
    );
    this.stepName = stepName;
  }
}

export class ConfigurationError extends LineageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("configuration", message, details);
  }
}

export class ValidationError extends LineageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("validation", message, details);
  }
}

/**
 * Extract a readable message from any thrown value
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return "An unexpected error occurred";
}

export function isLineageError(error: unknown): error is LineageError {
  return error instanceof LineageError;
}
