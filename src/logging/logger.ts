import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { Writable } from "node:stream";
import { Logger } from "../types/contracts";

type Level = "info" | "warn" | "error";

export class OutputChannel {
  constructor(
    readonly name: string,
    private readonly sinks: Writable[],
    private readonly now: () => Date = () => new Date()
  ) {}

  appendLine(line: string): void {
    for (const sink of this.sinks) {
      if (!sink.writableEnded) {
        sink.write(line + "\n");
      }
    }
  }

  createLogger(scope: string): Logger {
    const write = (level: Level, message: string) =>
      this.appendLine(`${this.now().toISOString()} [${level}] ${scope}: ${message}`);
    return {
      info: (message) => write("info", message),
      warn: (message) => write("warn", message),
      error: (message) => write("error", message)
    };
  }

  /** Ends file sinks once their buffered lines are written. */
  async close(): Promise<void> {
    const owned = this.sinks.filter((sink) => sink !== process.stderr && sink !== process.stdout);
    await Promise.all(
      owned.map((sink) => new Promise<void>((resolve) => sink.end(() => resolve())))
    );
  }
}

/** Appends to the given file, or writes to stderr when no path is configured. */
export async function openLogChannel(name: string, filePath: string): Promise<OutputChannel> {
  if (!filePath) {
    return new OutputChannel(name, [process.stderr]);
  }
  const absolute = resolve(filePath);
  await mkdir(dirname(absolute), { recursive: true });
  return new OutputChannel(name, [createWriteStream(absolute, { flags: "a", encoding: "utf-8" })]);
}
