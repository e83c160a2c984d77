import type {
  EventInput,
  TraversalEvent,
  VerifiedOutcome,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

/**
 * Append an event stamped with `turn`, evicting the oldest entries past
 * the cap. Returns the new log; the input array is not modified.
 */
export function appendEvent(
  events: readonly TraversalEvent[],
  event: EventInput,
  turn: number,
  capacity: number = LIMITS.MAX_EVENTS,
): TraversalEvent[] {
  const stamped: TraversalEvent = { ...event, turn };
  const next = [...events, stamped];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

/** Outcome of the most recent verification, "success" when none is logged. */
export function lastOutcome(events: readonly TraversalEvent[]): VerifiedOutcome {
  for (let i = events.length - 1; i >= 0; i--) {
    const event = events[i];
    if (event?.type === 'node_verified') return event.outcome;
  }
  return 'success';
}

export function eventsOfType<T extends TraversalEvent['type']>(
  events: readonly TraversalEvent[],
  type: T,
): Extract<TraversalEvent, { type: T }>[] {
  return events.filter(
    (e): e is Extract<TraversalEvent, { type: T }> => e.type === type,
  );
}
