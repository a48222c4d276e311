import {
  Capturer,
  Disposable,
  ErrorKind,
  Inferencer,
  IPresentationSurface,
  Logger,
  SessionState,
  Speaker,
  Stage,
  SurfaceUpdate
} from "../types/contracts";
import { AutoHideTimer, Scheduler } from "./autoHideTimer";
import { ControlQueue } from "./controlQueue";
import { StatusMessages } from "./messages";
import { CaptureError, InferenceError, PlaybackError, StageError } from "./stageErrors";

export interface SessionFailure {
  stage: Stage;
  kind: ErrorKind;
  message: string;
}

export interface Session {
  id: number;
  state: SessionState;
  transcript?: string;
  reply?: string;
  error?: SessionFailure;
}

interface ActiveSession extends Session {
  controller: AbortController;
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: StageError };

type ControlEvent =
  | { type: "activate" }
  | { type: "cancel" }
  | { type: "captured"; token: number; outcome: Outcome<string> }
  | { type: "inferred"; token: number; outcome: Outcome<string> }
  | { type: "spoken"; token: number; outcome: Outcome<void> }
  | { type: "autoHide"; token: number };

interface Dependencies {
  capturer: Capturer;
  inferencer: Inferencer;
  speaker: Speaker;
  surface: IPresentationSurface;
  messages: StatusMessages;
  autoHideDelayMs: number;
  logger?: Logger;
  scheduler?: Scheduler;
}

const REST_STATES: ReadonlySet<SessionState> = new Set<SessionState>([
  "Idle",
  "Capture_Failed",
  "Inference_Failed",
  "Playback_Failed",
  "Done"
]);

export function isRestState(state: SessionState): boolean {
  return REST_STATES.has(state);
}

/**
 * Drives one activation through capture, inference and playback. All state
 * lives here and is only touched from the control queue's handler; stage
 * workers report back by posting results tagged with the generation token
 * they were dispatched under, and anything tagged with an older token is
 * dropped.
 */
export class SessionOrchestrator implements Disposable {
  private generation = 0;
  private current: ActiveSession | undefined;
  private readonly queue: ControlQueue<ControlEvent>;
  private readonly timer: AutoHideTimer;

  constructor(private readonly deps: Dependencies) {
    this.queue = new ControlQueue((event) => this.handle(event), deps.logger);
    this.timer = new AutoHideTimer(
      (token) => this.queue.postResult({ type: "autoHide", token }),
      deps.scheduler
    );
  }

  get state(): SessionState {
    return this.current?.state ?? "Idle";
  }

  get currentToken(): number {
    return this.generation;
  }

  get session(): Readonly<Session> | undefined {
    if (!this.current) {
      return undefined;
    }
    const { controller: _controller, ...view } = this.current;
    return Object.freeze(view);
  }

  activate(): void {
    this.queue.postGesture({ type: "activate" });
  }

  cancel(): void {
    this.queue.postGesture({ type: "cancel" });
  }

  dispose(): void {
    this.timer.disarm();
    this.discardSession();
  }

  private handle(event: ControlEvent): void {
    switch (event.type) {
      case "activate":
        if (isRestState(this.state)) {
          this.startSession();
        } else {
          this.deps.logger?.info("activation during an active session; treating as cancel");
          this.cancelSession();
        }
        return;
      case "cancel":
        this.cancelSession();
        return;
      case "autoHide":
        this.onAutoHide(event.token);
        return;
      case "captured":
        if (this.isCurrent(event.token, "Capturing", event.type)) {
          this.onCaptured(event.outcome);
        }
        return;
      case "inferred":
        if (this.isCurrent(event.token, "Thinking", event.type)) {
          this.onInferred(event.outcome);
        }
        return;
      case "spoken":
        if (this.isCurrent(event.token, "Speaking", event.type)) {
          this.onSpoken(event.outcome);
        }
        return;
    }
  }

  private isCurrent(token: number, expected: SessionState, label: string): boolean {
    const current = this.current;
    if (token === this.generation && current && current.id === token && current.state === expected) {
      return true;
    }
    this.deps.logger?.info(`discarded stale ${label} result (token=${token}, current=${this.generation})`);
    return false;
  }

  private startSession(): void {
    this.timer.disarm();
    const session: ActiveSession = {
      id: ++this.generation,
      state: "Capturing",
      controller: new AbortController()
    };
    this.current = session;
    this.deps.logger?.info(`session #${session.id} started`);
    this.publish({ state: "Capturing", status: this.deps.messages.listening });

    const { id: token, controller } = session;
    this.dispatch(
      () => this.deps.capturer.capture(token, controller.signal),
      (error) => CaptureError.from(error),
      (outcome) => ({ type: "captured", token, outcome })
    );
  }

  private cancelSession(): void {
    if (!this.current) {
      return;
    }
    const id = this.current.id;
    this.timer.disarm();
    this.discardSession();
    this.deps.surface.hide();
    this.deps.logger?.info(`session #${id} cancelled`);
  }

  private discardSession(): void {
    if (!this.current) {
      return;
    }
    this.current.controller.abort();
    this.current = undefined;
    // Moves past every token handed out so far; late results all miss.
    this.generation++;
  }

  private onCaptured(outcome: Outcome<string>): void {
    if (!outcome.ok) {
      this.fail("Capture_Failed", outcome.error);
      return;
    }
    const transcript = outcome.value.trim();
    if (!transcript) {
      this.fail("Capture_Failed", new CaptureError("unintelligible", "Empty transcript."));
      return;
    }

    const session = this.requireCurrent();
    session.transcript = transcript;
    this.transition("Thinking");
    this.publish({ state: "Thinking", status: this.deps.messages.thinking, text: transcript });

    const { id: token, controller } = session;
    this.dispatch(
      () => this.deps.inferencer.query(transcript, token, controller.signal),
      (error) => InferenceError.from(error),
      (result) => ({ type: "inferred", token, outcome: result })
    );
  }

  private onInferred(outcome: Outcome<string>): void {
    if (!outcome.ok) {
      this.fail("Inference_Failed", outcome.error);
      return;
    }

    const session = this.requireCurrent();
    const reply = outcome.value;
    session.reply = reply;
    this.transition("Speaking");
    this.publish({ state: "Speaking", status: this.deps.messages.answer, text: reply });

    const { id: token, controller } = session;
    this.dispatch(
      () => this.deps.speaker.speak(reply, token, controller.signal),
      (error) => PlaybackError.from(error),
      (result) => ({ type: "spoken", token, outcome: result })
    );
  }

  private onSpoken(outcome: Outcome<void>): void {
    if (!outcome.ok) {
      this.fail("Playback_Failed", outcome.error);
      return;
    }

    const session = this.requireCurrent();
    this.transition("Done");
    this.publish({ state: "Done", status: this.deps.messages.done, text: session.reply });
    this.timer.arm(this.deps.autoHideDelayMs, session.id);
  }

  private onAutoHide(token: number): void {
    const current = this.current;
    if (!current || current.id !== token || token !== this.generation || !isRestState(current.state)) {
      this.deps.logger?.info(`ignored stale auto-hide (token=${token}, current=${this.generation})`);
      return;
    }
    this.current = undefined;
    this.deps.surface.hide();
    this.deps.logger?.info(`session #${token} auto-hidden`);
  }

  private fail(state: "Capture_Failed" | "Inference_Failed" | "Playback_Failed", error: StageError): void {
    const session = this.requireCurrent();
    session.error = { stage: error.stage, kind: error.kind, message: error.message };
    this.transition(state);
    this.deps.logger?.warn(`session #${session.id} ${error.stage} failed (${error.kind}): ${error.message}`);
    this.publish({
      state,
      status: this.deps.messages.errors[error.kind],
      // Playback failure keeps the reply on screen.
      text: state === "Playback_Failed" ? session.reply : undefined,
      errorKind: error.kind
    });
    this.timer.arm(this.deps.autoHideDelayMs, session.id);
  }

  private transition(state: SessionState): void {
    const session = this.requireCurrent();
    this.deps.logger?.info(`session #${session.id}: ${session.state} -> ${state}`);
    session.state = state;
  }

  private publish(update: SurfaceUpdate): void {
    this.deps.surface.update(update);
  }

  private requireCurrent(): ActiveSession {
    if (!this.current) {
      throw new Error("No active session.");
    }
    return this.current;
  }

  private dispatch<T>(
    work: () => Promise<T>,
    toError: (error: unknown) => StageError,
    deliver: (outcome: Outcome<T>) => ControlEvent
  ): void {
    void settle(work, toError).then((outcome) => this.queue.postResult(deliver(outcome)));
  }
}

async function settle<T>(
  work: () => Promise<T>,
  toError: (error: unknown) => StageError
): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
