import { spawn, execFile } from "node:child_process";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readFile, unlink } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { AudioChunk, IAudioRecorder, Logger } from "../types/contracts";
import { abortError, CaptureError } from "../orchestration/stageErrors";
import { extractPcm16FromWav, getRecentSamples, rmsAmplitude } from "./wav";

export interface CaptureOptions {
  vadEnabled: boolean;
  vadSilenceMs: number;
  vadMinSpeechMs: number;
  maxRecordingMs: number;
}

export type RecorderBackend = "sox" | "arecord" | "ffmpeg";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

export interface RecorderProcess {
  readonly killed: boolean;
  readonly stderr: { on(event: "data", listener: (chunk: Buffer) => void): unknown } | null;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type RecorderLauncher = (command: string, args: string[]) => RecorderProcess;
export type RecorderDetector = () => Promise<RecorderInfo | undefined>;

interface Recording {
  done: Promise<void>;
  signal?: AbortSignal;
}

const SAMPLE_RATE = 16000;
const BYTES_PER_SAMPLE = 2;
const CHECK_INTERVAL_MS = 100;
const SILENCE_THRESHOLD = 150;
const MIN_RECORDING_MS = 1500;
const NO_SPEECH_LIMIT_MS = 10_000;

const defaultLauncher: RecorderLauncher = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

export class AudioCaptureService implements IAudioRecorder {
  private current?: Recording;
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;

  constructor(
    private readonly options: CaptureOptions,
    private readonly logger?: Logger,
    private readonly launch: RecorderLauncher = defaultLauncher,
    private readonly detect: RecorderDetector = detectRecorder
  ) {}

  async captureOnce(signal?: AbortSignal): Promise<AudioChunk> {
    // A cancelled recording keeps the device until its process exits.
    while (this.current) {
      if (!this.current.signal?.aborted) {
        throw new Error("Already recording.");
      }
      await this.current.done;
    }
    if (signal?.aborted) {
      throw abortError();
    }

    const run = this.record(signal);
    const recording: Recording = { done: run.then(() => undefined, () => undefined), signal };
    this.current = recording;
    try {
      return await run;
    } finally {
      if (this.current === recording) {
        this.current = undefined;
      }
    }
  }

  private async record(signal?: AbortSignal): Promise<AudioChunk> {
    if (!this.detectionDone) {
      this.detectedRecorder = await this.detect();
      this.detectionDone = true;
      this.logger?.info(
        this.detectedRecorder
          ? `using ${this.detectedRecorder.backend} for audio capture`
          : "no audio recorder found on PATH"
      );
    }

    if (!this.detectedRecorder) {
      throw new CaptureError("no_microphone", getInstallInstructions());
    }
    if (signal?.aborted) {
      throw abortError();
    }

    const wavPath = getTempWavPath();
    await this.recordToWav(this.detectedRecorder, wavPath, signal);
    if (signal?.aborted) {
      await cleanupWavFile(wavPath);
      throw abortError();
    }

    const wavData = await readFile(wavPath);
    const pcm16 = extractPcm16FromWav(wavData);

    return { wavPath, pcm16, sampleRateHz: SAMPLE_RATE, channels: 1 };
  }

  private recordToWav(recorder: RecorderInfo, wavPath: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const args = buildRecorderArgs(recorder, wavPath, this.options.maxRecordingMs);
      const proc = this.launch(recorder.binaryPath, args);
      let stopRequested = false;
      const stopRecording = (): void => {
        stopRequested = true;
        killProc(proc);
      };
      const stopWatching = this.options.vadEnabled
        ? this.runVadAutoStop(proc, wavPath, stopRecording)
        : this.runTimedStop(this.options.maxRecordingMs, stopRecording);

      const onAbort = (): void => stopRecording();

      let stderrData = "";

      proc.on("error", (err) => {
        stopWatching();
        signal?.removeEventListener("abort", onAbort);
        reject(new CaptureError("no_microphone", `Recording failed to start: ${err.message}`, { cause: err }));
      });

      proc.stderr?.on("data", (chunk: Buffer) => {
        stderrData += chunk.toString();
      });

      proc.on("close", (code, signalName) => {
        stopWatching();
        signal?.removeEventListener("abort", onAbort);
        if (!isExpectedExit(recorder.backend, stopRequested, code, signalName)) {
          reject(recorderFailure(code, stderrData));
          return;
        }
        resolve();
      });

      if (signal?.aborted) {
        stopRecording();
      } else {
        signal?.addEventListener("abort", onAbort, { once: true });
      }
    });
  }

  private runVadAutoStop(
    proc: RecorderProcess,
    wavPath: string,
    stopRecording: () => void
  ): () => void {
    const { vadSilenceMs, vadMinSpeechMs, maxRecordingMs } = this.options;

    const msToBytes = (ms: number) =>
      Math.floor((ms / 1000) * SAMPLE_RATE * BYTES_PER_SAMPLE);

    const silenceWindowBytes = msToBytes(vadSilenceMs);

    let speechDetected = false;
    let speechDetectedAt = 0;
    let polling = false;

    const stop = (): void => {
      clearInterval(timer);
      clearTimeout(deadline);
    };

    const poll = async (): Promise<void> => {
      let pcmData: Buffer;
      try {
        pcmData = extractPcm16FromWav(await readFile(wavPath));
      } catch {
        // The recorder may not have created the file yet.
        return;
      }

      const totalBytes = pcmData.length;

      if (!speechDetected) {
        if (totalBytes >= msToBytes(vadMinSpeechMs)) {
          const recent = getRecentSamples(pcmData, msToBytes(vadMinSpeechMs));
          if (rmsAmplitude(recent) > SILENCE_THRESHOLD) {
            speechDetected = true;
            speechDetectedAt = Date.now();
            this.logger?.info("speech detected");
          }
        }
        if (totalBytes > msToBytes(NO_SPEECH_LIMIT_MS)) {
          stop();
          stopRecording();
        }
        return;
      }

      const elapsed = Date.now() - speechDetectedAt;
      if (elapsed < MIN_RECORDING_MS || totalBytes < silenceWindowBytes) {
        return;
      }

      const tail = getRecentSamples(pcmData, silenceWindowBytes);
      if (rmsAmplitude(tail) < SILENCE_THRESHOLD) {
        stop();
        stopRecording();
      }
    };

    const timer = setInterval(() => {
      if (proc.killed) {
        stop();
        return;
      }
      if (polling) {
        return;
      }
      polling = true;
      void poll().finally(() => {
        polling = false;
      });
    }, CHECK_INTERVAL_MS);

    const deadline = setTimeout(() => {
      stop();
      stopRecording();
    }, maxRecordingMs);

    return stop;
  }

  private runTimedStop(durationMs: number, stopRecording: () => void): () => void {
    const deadline = setTimeout(() => stopRecording(), durationMs);
    return () => clearTimeout(deadline);
  }
}

function recorderFailure(code: number | null, stderrData: string): CaptureError {
  const msg = stderrData.slice(0, 300).trim();
  const kind = /permission denied|not permitted|not authorized/i.test(msg)
    ? "permission_denied"
    : "no_microphone";
  return new CaptureError(kind, `Recording exited with code ${code}: ${msg}`);
}

function killProc(proc: RecorderProcess): void {
  if (!proc.killed) {
    proc.kill("SIGTERM");
  }
}

function isExpectedExit(
  backend: RecorderBackend,
  stopRequested: boolean,
  code: number | null,
  signal: NodeJS.Signals | null
): boolean {
  if (code === 0 || code === null) {
    return true;
  }
  if (!stopRequested) {
    return false;
  }

  switch (backend) {
    case "arecord":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 1;
    case "ffmpeg":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 255;
    case "sox":
      return signal === "SIGINT" || signal === "SIGTERM";
  }
}

function getTempWavPath(): string {
  const id = randomBytes(8).toString("hex");
  return join(tmpdir(), `voice-assistant-${id}.wav`);
}

function buildRecorderArgs(
  recorder: RecorderInfo,
  wavPath: string,
  maxRecordingMs: number
): string[] {
  switch (recorder.backend) {
    case "sox":
      return ["-d", "-t", "wav", "-r", "16000", "-c", "1", "-b", "16", wavPath];
    case "arecord":
      return ["-f", "S16_LE", "-r", "16000", "-c", "1", "-t", "wav", wavPath];
    case "ffmpeg":
      return [
        "-y", "-f", getFFmpegInputFormat(), "-i", getFFmpegInputDevice(),
        "-ar", "16000", "-ac", "1", "-sample_fmt", "s16",
        "-t", String(Math.ceil(maxRecordingMs / 1000)), wavPath
      ];
  }
}

function getFFmpegInputFormat(): string {
  switch (process.platform) {
    case "win32": return "dshow";
    case "darwin": return "avfoundation";
    default: return "pulse";
  }
}

function getFFmpegInputDevice(): string {
  switch (process.platform) {
    case "win32": return "audio=default";
    case "darwin": return ":default";
    default: return "default";
  }
}

async function detectRecorder(): Promise<RecorderInfo | undefined> {
  for (const c of getCandidates()) {
    if (await binaryExists(c.binary)) {
      return { backend: c.backend, binaryPath: c.binary };
    }
  }
  return undefined;
}

function getCandidates(): Array<{ backend: RecorderBackend; binary: string }> {
  switch (process.platform) {
    case "linux":
      return [
        { backend: "arecord", binary: "arecord" },
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" },
      ];
    case "win32":
      return [
        { backend: "ffmpeg", binary: "ffmpeg" },
        { backend: "sox", binary: "sox" },
      ];
    default:
      return [
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" },
      ];
  }
}

export function binaryExists(name: string): Promise<boolean> {
  const cmd = process.platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}

function getInstallInstructions(): string {
  switch (process.platform) {
    case "darwin":
      return "No audio recorder found. Install SoX: brew install sox";
    case "linux":
      return "No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils";
    case "win32":
      return "No audio recorder found. Install FFmpeg: winget install ffmpeg";
    default:
      return "No audio recorder found. Install SoX or FFmpeg.";
  }
}

export async function cleanupWavFile(wavPath: string): Promise<void> {
  try {
    await unlink(wavPath);
  } catch {
    // Best effort cleanup
  }
}
