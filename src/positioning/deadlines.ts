/** Cancellation handle returned by DeadlineManager.schedule */
export interface DeadlineHandle {
  readonly id: number;
  /** true once the callback ran */
  readonly fired: boolean;
  /** true once cancel() won */
  readonly cancelled: boolean;
}

interface ArmedDeadline extends DeadlineHandle {
  fired: boolean;
  cancelled: boolean;
  dueAt: number;
  timer: ReturnType<typeof setTimeout> | null;
}

// Largest delay setTimeout honours; longer ones are clamped to 1 ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * One-shot cancellable timers.
 *
 * Each handle resolves to exactly one of fired / cancelled. A timer that
 * fires after cancel() is dropped. Durations beyond the setTimeout limit are
 * armed in steps until the real deadline passes.
 */
export class DeadlineManager {
  private nextId = 1;
  private readonly armed = new Map<number, ArmedDeadline>();

  /** Run onFire once, no sooner than durationMs from now */
  schedule(durationMs: number, onFire: () => void): DeadlineHandle {
    const deadline: ArmedDeadline = {
      id: this.nextId++,
      fired: false,
      cancelled: false,
      dueAt: Date.now() + durationMs,
      timer: null,
    };

    this.armed.set(deadline.id, deadline);
    this.arm(deadline, durationMs, onFire);
    return deadline;
  }

  /** Idempotent; no effect on a handle that already fired or was cancelled */
  cancel(handle: DeadlineHandle): void {
    const deadline = this.armed.get(handle.id);
    if (!deadline || deadline.fired || deadline.cancelled) return;

    deadline.cancelled = true;
    if (deadline.timer !== null) {
      clearTimeout(deadline.timer);
      deadline.timer = null;
    }
    this.armed.delete(deadline.id);
  }

  cancelAll(): void {
    for (const deadline of [...this.armed.values()]) {
      this.cancel(deadline);
    }
  }

  private arm(deadline: ArmedDeadline, remainingMs: number, onFire: () => void): void {
    if (remainingMs > MAX_TIMER_DELAY_MS) {
      deadline.timer = setTimeout(() => {
        if (deadline.cancelled) return;
        this.arm(deadline, deadline.dueAt - Date.now(), onFire);
      }, MAX_TIMER_DELAY_MS);
      return;
    }

    deadline.timer = setTimeout(() => {
      if (deadline.cancelled || deadline.fired) return;
      deadline.fired = true;
      deadline.timer = null;
      this.armed.delete(deadline.id);
      onFire();
    }, Math.max(0, remainingMs));
  }
}
