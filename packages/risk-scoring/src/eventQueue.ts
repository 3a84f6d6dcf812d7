import { RiskEvent } from "./types";

export const DEFAULT_EVENT_QUEUE_CAPACITY = 10000;

/**
 * Outbound buffer the host drains. When full, the oldest events are dropped
 * and counted so callers can tell that notifications were lost.
 */
export class RiskEventQueue {
  private events: RiskEvent[] = [];
  private droppedCount = 0;

  public constructor(private readonly capacity = DEFAULT_EVENT_QUEUE_CAPACITY) {}

  public push(...events: RiskEvent[]): void {
    this.events.push(...events);
    const overflow = this.events.length - this.capacity;
    if (overflow > 0) {
      this.events.splice(0, overflow);
      this.droppedCount += overflow;
    }
  }

  public drain(): RiskEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  public get size(): number {
    return this.events.length;
  }

  public get dropped(): number {
    return this.droppedCount;
  }
}
