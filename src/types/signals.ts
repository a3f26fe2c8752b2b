/**
 * Signal Data Model
 *
 * Runs own signal groups (time-indexed tables of same-modality channels),
 * annotation groups, channel provenance and instance-scoped configuration.
 *
 * Channels never hold data: a Channel is a reference to one column of one
 * group, always resolved against the owning run.
 */

// ============================================================================
// Plugin requirement specs
// ============================================================================

export type EventType = "timepoint" | "interval";

/**
 * Declares what channel a plugin requires.
 */
export interface ChannelSpec {
  /** e.g. "trunk_angular_velocity", "stylus_x" */
  semanticRole: string;
  /**
   * Vestigial: resolution is exact-match only, whatever the value.
   */
  allowDerived: boolean;
}

/**
 * Declares what kind of event group a plugin requires.
 */
export interface EventSpec {
  /** Matched against the first event's `eventType` during fallback resolution */
  eventType: string;
  kind: EventType;
}

// ============================================================================
// Channels
// ============================================================================

/**
 * Reference to a column in a SignalGroup.
 * ID format: "group:name" (e.g. "tablet_motion:X_bf10_d1")
 */
export interface Channel {
  readonly id: string;
  readonly group: string;
  readonly name: string;
}

export interface ChannelSeries {
  /** Seconds relative to run start */
  time: number[];
  values: number[];
}

/**
 * Records how a derived channel was created.
 * Stored in RunData.channelProvenance, keyed by channel ID.
 */
export interface ChannelProvenance {
  parents: string[];
  /** "butter", "derivative", "average", ... */
  operation: string;
  parameters: OperationParams;
  /** ISO-8601 */
  timestamp: string;
}

export type ParamValue = string | number | boolean | null;
export type OperationParams = Record<string, ParamValue>;

// ============================================================================
// Signal groups
// ============================================================================

export interface SignalGroup {
  name: string;
  modality: string;
  /** Seconds relative to run start, one entry per row */
  time: number[];
  /** Column name -> values; NaN marks a missing sample */
  columns: Map<string, number[]>;
  /** Hz, null when it could not be estimated */
  samplingRate: number | null;
}

// ============================================================================
// Events
// ============================================================================

export interface Event {
  annotator: string;
  name: string;
  eventType: EventType;
  /** Seconds relative to run start */
  onset: number;
  /** Present exactly when eventType is "interval" */
  offset?: number;
  confidence?: number;
  metadata: Record<string, ParamValue>;
}

// ============================================================================
// Run configuration & data
// ============================================================================

/**
 * Per-run bindings and parameters, scoped by plugin instance name so two uses
 * of the same plugin bind independently.
 *
 * @example
 * channelBindings = {
 *   "Peaks_X": { signal: "tablet_motion:X" },
 *   "Stats_vel": { signal: "optotrak_motion:velocity" },
 * }
 */
export interface RunConfig {
  channelBindings: Record<string, Record<string, string>>;
  eventBindings: Record<string, Record<string, string>>;
  parameters: Record<string, Record<string, ParamValue>>;
}

export interface RunIdentity {
  subject: string;
  session: string;
  task: string;
  condition: string;
  run: string;
}

export interface RunData extends RunIdentity {
  metadata: Record<string, string>;
  signals: Map<string, SignalGroup>;
  /** Insertion order is significant for event fallback resolution */
  annotations: Map<string, Event[]>;
  channelProvenance: Map<string, ChannelProvenance>;
  runConfig: RunConfig;
}
