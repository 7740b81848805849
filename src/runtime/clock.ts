// Clock abstraction so frame timing can be driven deterministically
import { asNumber, createTimestamp, fromNow } from "../types/timestamp";

import type { Timestamp } from "../types/timestamp";

export type Clock = {
  nowMs(): Timestamp;
};

/** Wall-clock monotonic time from `performance.now()`. */
export class MonotonicClock implements Clock {
  nowMs(): Timestamp {
    return fromNow();
  }
}

/** Manually advanced clock for tests and replays. */
export class SimulatedClock implements Clock {
  private t: Timestamp;

  constructor(startMs = 0) {
    this.t = createTimestamp(startMs);
  }

  tick(dtMs: number): void {
    this.t = createTimestamp(asNumber(this.t) + dtMs);
  }

  nowMs(): Timestamp {
    return this.t;
  }
}
