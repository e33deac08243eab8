/**
 * SerialQueue — runs async tasks one at a time, in submission order.
 *
 * Each task starts only after the previous one settled, whether it
 * resolved or rejected. `capacity` bounds how many tasks may be queued or
 * running at once; submissions beyond it are refused, not buffered.
 */

import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export type QueueFullError = { kind: "queue_full"; capacity: number };

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private inFlight = 0;

  constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {}

  /** Tasks queued or running */
  get size(): number {
    return this.inFlight;
  }

  run<T>(task: () => Promise<T>): Result<Promise<T>, QueueFullError> {
    if (this.inFlight >= this.capacity) {
      return err({ kind: "queue_full", capacity: this.capacity });
    }
    this.inFlight++;

    const result = this.tail.then(task).finally(() => {
      this.inFlight--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return ok(result);
  }
}
