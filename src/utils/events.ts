import { ValidationError } from "@/lib/errors";
import type { Event, EventType, ParamValue } from "@/types/signals";

export interface EventInit {
  annotator: string;
  name: string;
  eventType: EventType;
  onset: number;
  offset?: number | null;
  confidence?: number | null;
  metadata?: Record<string, ParamValue>;
}

/**
 * Build an Event, enforcing: timepoints carry no offset, intervals carry one,
 * and an interval's offset is not before its onset.
 */
export function createEvent(init: EventInit): Event {
  const offset = init.offset ?? undefined;

  if (!Number.isFinite(init.onset)) {
    throw new ValidationError(`Event '${init.name}' has a non-finite onset`, {
      onset: init.onset,
    });
  }

  if (init.eventType === "timepoint" && offset !== undefined) {
    throw new ValidationError(
      `Timepoint event '${init.name}' must not carry an offset`,
      { onset: init.onset, offset },
    );
  }

  if (init.eventType === "interval") {
    if (offset === undefined) {
      throw new ValidationError(
        `Interval event '${init.name}' requires an offset`,
        { onset: init.onset },
      );
    }
    if (offset < init.onset) {
      throw new ValidationError(
        `Interval event '${init.name}' ends before it starts`,
        { onset: init.onset, offset },
      );
    }
  }

  const event: Event = {
    annotator: init.annotator,
    name: init.name,
    eventType: init.eventType,
    onset: init.onset,
    metadata: { ...init.metadata },
  };
  if (offset !== undefined) event.offset = offset;
  if (init.confidence !== undefined && init.confidence !== null) {
    event.confidence = init.confidence;
  }
  return event;
}

export function sortByOnset(events: Event[]): Event[] {
  return [...events].sort((a, b) => a.onset - b.onset);
}

export function eventDuration(event: Event): number {
  return event.offset === undefined ? 0 : event.offset - event.onset;
}
