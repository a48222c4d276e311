export type TimerHandle = ReturnType<typeof setTimeout>;

export interface Scheduler {
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const defaultScheduler: Scheduler = {
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => clearTimeout(handle)
};

/** At most one pending deadline; arming again replaces it. */
export class AutoHideTimer {
  private pending: { handle: TimerHandle; token: number } | undefined;

  constructor(
    private readonly onFire: (token: number) => void,
    private readonly scheduler: Scheduler = defaultScheduler
  ) {}

  arm(durationMs: number, token: number): void {
    this.disarm();
    const handle = this.scheduler.setTimeout(() => {
      this.pending = undefined;
      this.onFire(token);
    }, durationMs);
    this.pending = { handle, token };
  }

  disarm(): void {
    if (this.pending) {
      this.scheduler.clearTimeout(this.pending.handle);
      this.pending = undefined;
    }
  }

  get armedToken(): number | undefined {
    return this.pending?.token;
  }
}
