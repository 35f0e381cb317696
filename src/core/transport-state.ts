import type { ControlEvent } from "./control-event.js";

export const DEFAULT_DEBOUNCE_MS = 250;

export type TransportSnapshot = {
  active: boolean;
  pendingTarget: boolean | null;
  lastChangeAt: number | null;
};

/**
 * Combines the play and record transport flags into one debounced "lights on"
 * value. Lights engage only while both flags are on and release as soon as
 * either drops, but nothing is emitted until the transport has been quiet for
 * the debounce window.
 *
 * The machine is clock-free: callers pass event timestamps to {@link apply} and
 * the current time to {@link settle}.
 */
export class TransportStateMachine {
  private playActive = false;
  private recordActive = false;
  private lastChangeAt: number | null = null;
  private emitted: boolean;

  constructor(
    readonly windowMs = DEFAULT_DEBOUNCE_MS,
    initialActive = false,
  ) {
    if (!Number.isFinite(windowMs) || windowMs < 0) {
      throw new RangeError(`Debounce window must be a non-negative number, got ${windowMs}`);
    }
    this.emitted = initialActive;
  }

  /**
   * Records an event. Returns the new combined value when a settlement happens
   * as part of this call: either a pending change whose window had already
   * elapsed before the event arrived, or (with a zero window) the event itself.
   */
  apply(event: ControlEvent): boolean | null {
    const settled = this.settle(event.receivedAt);

    const on = event.value === "on";
    if (event.signal === "play") {
      this.playActive = on;
    } else {
      this.recordActive = on;
    }
    this.lastChangeAt = Math.max(event.receivedAt, this.lastChangeAt ?? event.receivedAt);

    return settled ?? this.settle(event.receivedAt);
  }

  /** Emits the combined value if the window has elapsed and it differs from the last emission. */
  settle(now: number): boolean | null {
    if (this.lastChangeAt === null) return null;
    if (now - this.lastChangeAt < this.windowMs) return null;
    const candidate = this.candidate();
    if (candidate === this.emitted) return null;
    this.emitted = candidate;
    return candidate;
  }

  /** Milliseconds until the current window closes, 0 once it has. */
  remainingMs(now: number): number {
    if (this.lastChangeAt === null) return 0;
    return Math.max(0, this.lastChangeAt + this.windowMs - now);
  }

  get active(): boolean {
    return this.emitted;
  }

  get pendingTarget(): boolean | null {
    const candidate = this.candidate();
    return candidate === this.emitted ? null : candidate;
  }

  snapshot(): TransportSnapshot {
    return {
      active: this.emitted,
      pendingTarget: this.pendingTarget,
      lastChangeAt: this.lastChangeAt,
    };
  }

  private candidate(): boolean {
    return this.playActive && this.recordActive;
  }
}
