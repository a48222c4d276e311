import { Logger } from "../types/contracts";

type Lane = "gesture" | "result";

/**
 * Ordered event queue for the orchestrator's control context. Gestures
 * (activate, cancel) are drained ahead of queued results; within a lane
 * events keep arrival order. Handlers never run reentrantly: anything posted
 * during a drain is picked up by the drain already in progress.
 */
export class ControlQueue<E> {
  private readonly gestures: E[] = [];
  private readonly results: E[] = [];
  private draining = false;
  private drainScheduled = false;

  constructor(
    private readonly handle: (event: E) => void,
    private readonly logger?: Logger
  ) {}

  /** Queues a user gesture and drains right away unless a drain is running. */
  postGesture(event: E): void {
    this.gestures.push(event);
    this.drain();
  }

  /** Queues a worker result or timer fire for the next microtask. */
  postResult(event: E): void {
    this.results.push(event);
    this.scheduleDrain();
  }

  get pending(): number {
    return this.gestures.length + this.results.length;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    void Promise.resolve().then(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.take();
      while (next) {
        try {
          this.handle(next.event);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger?.error(`control handler failed on ${next.lane} event: ${message}`);
        }
        next = this.take();
      }
    } finally {
      this.draining = false;
    }
  }

  private take(): { lane: Lane; event: E } | undefined {
    const gesture = this.gestures.shift();
    if (gesture !== undefined) {
      return { lane: "gesture", event: gesture };
    }
    const result = this.results.shift();
    if (result !== undefined) {
      return { lane: "result", event: result };
    }
    return undefined;
  }
}
