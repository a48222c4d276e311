import { spawn } from "node:child_process";
import { basename } from "node:path";
import { binaryExists } from "../audio/audioCaptureService";
import { abortError, PlaybackError } from "../orchestration/stageErrors";
import { Logger } from "../types/contracts";

export interface PlayerProcess {
  on(event: "close", listener: (code: number | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(): boolean;
}

export type ProcessLauncher = (command: string, args: string[]) => PlayerProcess;

export interface IAudioPlayer {
  play(filePath: string, signal: AbortSignal): Promise<void>;
}

interface PlayerCommand {
  command: string;
  args: string[];
}

const defaultLauncher: ProcessLauncher = (command, args) =>
  spawn(command, args, { stdio: "ignore" });

export class AudioPlayer implements IAudioPlayer {
  private resolved?: PlayerCommand;

  constructor(
    private readonly playerPath: string,
    private readonly launch: ProcessLauncher = defaultLauncher,
    private readonly logger?: Logger
  ) {}

  async play(filePath: string, signal: AbortSignal): Promise<void> {
    const player = await this.resolvePlayer();
    if (signal.aborted) {
      throw abortError();
    }

    await new Promise<void>((resolve, reject) => {
      const proc = this.launch(player.command, [...player.args, filePath]);
      const onAbort = (): void => {
        this.logger?.info("stopping playback");
        proc.kill();
      };
      signal.addEventListener("abort", onAbort, { once: true });

      proc.on("error", (error) => {
        signal.removeEventListener("abort", onAbort);
        reject(new PlaybackError("output_failed", `Player failed to start: ${error.message}`, { cause: error }));
      });

      proc.on("close", (code) => {
        signal.removeEventListener("abort", onAbort);
        if (signal.aborted) {
          reject(abortError());
        } else if (code === 0) {
          resolve();
        } else {
          reject(new PlaybackError("output_failed", `${player.command} exited with code ${code}`));
        }
      });
    });
  }

  private async resolvePlayer(): Promise<PlayerCommand> {
    if (this.resolved) {
      return this.resolved;
    }

    if (this.playerPath) {
      this.resolved = { command: this.playerPath, args: argsFor(this.playerPath) };
      return this.resolved;
    }

    for (const name of getPlayerCandidates()) {
      if (await binaryExists(name)) {
        this.logger?.info(`using ${name} for playback`);
        this.resolved = { command: name, args: argsFor(name) };
        return this.resolved;
      }
    }

    throw new PlaybackError(
      "output_failed",
      `No audio player found. Install one of: ${getPlayerCandidates().join(", ")}`
    );
  }
}

function getPlayerCandidates(): string[] {
  switch (process.platform) {
    case "darwin":
      return ["afplay", "ffplay", "mpv"];
    case "linux":
      return ["mpg123", "ffplay", "mpv"];
    default:
      return ["ffplay", "mpv"];
  }
}

export function argsFor(playerPath: string): string[] {
  switch (basename(playerPath).replace(/\.exe$/i, "")) {
    case "mpg123":
      return ["-q"];
    case "ffplay":
      return ["-nodisp", "-autoexit", "-loglevel", "quiet"];
    case "mpv":
      return ["--no-video", "--really-quiet"];
    default:
      return [];
  }
}
