import { EventEmitter } from "node:events";
import { emitKeypressEvents, Key } from "node:readline";
import { Disposable, Logger } from "../types/contracts";

export type ActivationEvent = "activate" | "cancel" | "quit";

const ACTIVATE_SIGNAL = "SIGUSR2";

export function activationForKey(key: Key | undefined): ActivationEvent | undefined {
  if (!key) {
    return undefined;
  }
  if (key.ctrl && key.name === "c") {
    return "quit";
  }
  switch (key.name) {
    case "space":
    case "return":
    case "enter":
      return "activate";
    case "escape":
      return "cancel";
    case "q":
      return "quit";
    default:
      return undefined;
  }
}

/**
 * Turns keypresses on a raw-mode TTY, and SIGUSR2 from an external hotkey
 * daemon, into activation events.
 */
export class KeyboardActivationSource implements Disposable {
  private readonly events = new EventEmitter();
  private started = false;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly logger?: Logger
  ) {}

  on(event: ActivationEvent, listener: () => void): Disposable {
    this.events.on(event, listener);
    return { dispose: () => this.events.off(event, listener) };
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode(true);
    }
    this.input.on("keypress", this.onKeypress);
    this.input.resume();

    if (process.platform !== "win32") {
      process.on(ACTIVATE_SIGNAL, this.onSignal);
    }
  }

  dispose(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    process.off(ACTIVATE_SIGNAL, this.onSignal);
    this.events.removeAllListeners();
  }

  private readonly onKeypress = (_text: string | undefined, key: Key | undefined): void => {
    const event = activationForKey(key);
    if (event) {
      this.events.emit(event);
    }
  };

  private readonly onSignal = (): void => {
    this.logger?.info(`${ACTIVATE_SIGNAL} received`);
    this.events.emit("activate");
  };
}
