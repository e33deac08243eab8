/**
 * Mock DaemonControl for testing.
 *
 * Records every call with the clock reading at the time, and fails the
 * steps it is told to fail.
 */

import type { DaemonControl, DaemonControlError, DaemonStep } from "./daemon-control.js";
import type { Clock } from "./clock.js";
import type { Result } from "./result.js";
import { ok, err } from "./result.js";

export type RecordedCall = { step: DaemonStep; at: number };

export class MockDaemonControl implements DaemonControl {
  readonly service = "MTProxy";
  public calls: RecordedCall[] = [];
  public active = true;
  /** start() succeeds but the daemon exits right away */
  public crashOnStart = false;
  private failing: Set<DaemonStep> = new Set();

  constructor(private clock: Clock) {}

  /** Make `step` fail until healed */
  fail(step: DaemonStep): void {
    this.failing.add(step);
  }

  heal(step: DaemonStep): void {
    this.failing.delete(step);
  }

  /** Steps called, in order */
  steps(): DaemonStep[] {
    return this.calls.map((c) => c.step);
  }

  private record(step: DaemonStep): Result<void, DaemonControlError> {
    this.calls.push({ step, at: this.clock.now() });
    if (this.failing.has(step)) {
      return err({ kind: "command_failed", step, message: `${step} failed` });
    }
    return ok(undefined);
  }

  async stop(): Promise<Result<void, DaemonControlError>> {
    const result = this.record("stop");
    if (result.ok) this.active = false;
    return result;
  }

  async reloadManager(): Promise<Result<void, DaemonControlError>> {
    return this.record("reload");
  }

  async start(): Promise<Result<void, DaemonControlError>> {
    const result = this.record("start");
    if (result.ok) this.active = !this.crashOnStart;
    return result;
  }

  async isActive(): Promise<Result<boolean, DaemonControlError>> {
    const result = this.record("is-active");
    if (!result.ok) return result;
    return ok(this.active);
  }
}
