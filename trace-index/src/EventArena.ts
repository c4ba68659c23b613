/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { ArenaFrozenError } from './errors.js';
import type { EventId, TraceEvent } from './types.js';

/**
 * Append-only event store. Lanes, threads and mipmap levels hold {@link EventId}s into
 * it rather than event copies.
 */
export class EventArena {
  private readonly events: TraceEvent[] = [];
  private frozen = false;

  public get size(): number {
    return this.events.length;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public push(event: TraceEvent): EventId {
    if (this.frozen) {
      throw new ArenaFrozenError();
    }
    this.events.push(Object.freeze({ ...event, extraData: Object.freeze([...event.extraData]) }));
    return this.events.length - 1;
  }

  public get(id: EventId): TraceEvent {
    const event = this.events[id];
    if (!event) {
      throw new RangeError(`Event #${id} is not in the arena (size ${this.events.length})`);
    }
    return event;
  }

  /** End of the event's interval, `startNs + durationNs`. */
  public endNs(id: EventId): number {
    const event = this.get(id);
    return event.startNs + event.durationNs;
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public *[Symbol.iterator](): IterableIterator<TraceEvent> {
    yield* this.events;
  }

  public toArray(): readonly TraceEvent[] {
    return this.events;
  }
}
