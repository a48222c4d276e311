import { EventEmitter } from "node:events";
import { clearScreenDown, moveCursor } from "node:readline";
import { Writable } from "node:stream";
import { Disposable, IPresentationSurface, SessionState, SurfaceUpdate } from "../types/contracts";

const ACCENT = "\x1b[38;2;80;160;255m";
const ERROR = "\x1b[38;2;255;90;90m";
const SUBTLE = "\x1b[38;2;140;140;140m";
const RESET = "\x1b[0m";

const IN_PROGRESS: ReadonlySet<SessionState> = new Set<SessionState>(["Capturing", "Thinking", "Speaking"]);

export function renderLines(update: SurfaceUpdate, color: boolean): string[] {
  const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);

  let statusColor = SUBTLE;
  if (update.errorKind) {
    statusColor = ERROR;
  } else if (IN_PROGRESS.has(update.state)) {
    statusColor = ACCENT;
  }

  const marker = IN_PROGRESS.has(update.state) ? "●" : "○";
  const lines = [paint(statusColor, `${marker} ${update.status}`)];
  if (update.text) {
    const body = update.state === "Thinking" ? `🗣 "${update.text}"` : update.text;
    lines.push(...body.split("\n").map((line) => `  ${line}`));
  }
  return lines;
}

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;
const ZERO_WIDTH = /[\p{M}\u200b-\u200f\ufe0e\ufe0f]/u;
const WIDE =
  /[\p{Extended_Pictographic}\u1100-\u115f\u2e80-\u303e\u3041-\u33ff\u3400-\u4dbf\u4e00-\u9fff\ua000-\ua4cf\uac00-\ud7a3\uf900-\ufaff\ufe30-\ufe4f\uff00-\uff60\uffe0-\uffe6\u{20000}-\u{3fffd}]/u;

/** Terminal columns taken by a line; Thai tone marks take none, CJK and emoji take two. */
export function displayWidth(line: string): number {
  let width = 0;
  for (const char of line.replace(ANSI_ESCAPE, "")) {
    if (ZERO_WIDTH.test(char)) {
      continue;
    }
    width += WIDE.test(char) ? 2 : 1;
  }
  return width;
}

export function rowsFor(lines: readonly string[], columns: number | undefined): number {
  if (!columns || columns <= 0) {
    return lines.length;
  }
  return lines.reduce((rows, line) => rows + Math.max(1, Math.ceil(displayWidth(line) / columns)), 0);
}

/** Overlay drawn in place at the bottom of the terminal. */
export class TerminalSurface implements IPresentationSurface {
  private readonly cancelRequests = new EventEmitter();
  private renderedRows = 0;

  constructor(
    private readonly output: Writable & { columns?: number } = process.stdout,
    private readonly color = process.stdout.isTTY === true
  ) {}

  update(update: SurfaceUpdate): void {
    this.clear();
    const lines = renderLines(update, this.color);
    this.output.write(lines.join("\n") + "\n");
    this.renderedRows = rowsFor(lines, this.output.columns);
  }

  hide(): void {
    this.clear();
  }

  onCancelRequested(listener: () => void): Disposable {
    this.cancelRequests.on("cancel", listener);
    return { dispose: () => this.cancelRequests.off("cancel", listener) };
  }

  /** Raised by the dismiss key. */
  requestCancel(): void {
    this.cancelRequests.emit("cancel");
  }

  private clear(): void {
    if (this.renderedRows === 0) {
      return;
    }
    moveCursor(this.output, 0, -this.renderedRows);
    clearScreenDown(this.output);
    this.renderedRows = 0;
  }
}
