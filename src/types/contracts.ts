export interface AudioChunk {
  wavPath: string;
  pcm16: Buffer;
  sampleRateHz: number;
  channels: number;
}

export interface RawTranscript {
  text: string;
  confidence?: number;
}

export interface Disposable {
  dispose(): void;
}

export interface ISttProvider {
  transcribe(audio: AudioChunk, signal?: AbortSignal): Promise<RawTranscript>;
}

export interface IAudioRecorder {
  captureOnce(signal?: AbortSignal): Promise<AudioChunk>;
}

/**
 * Stage capabilities driven by the session orchestrator. Each performs one
 * blocking call and reports its own failures by rejecting. The token is the
 * generation of the session the call belongs to; the signal aborts when that
 * session is cancelled or superseded. Collaborators that cannot stop early
 * may ignore it.
 */
export interface Capturer {
  capture(token: number, signal: AbortSignal): Promise<string>;
}

export interface Inferencer {
  query(transcript: string, token: number, signal: AbortSignal): Promise<string>;
}

export interface Speaker {
  speak(reply: string, token: number, signal: AbortSignal): Promise<void>;
}

export type SessionState =
  | "Idle"
  | "Capturing"
  | "Capture_Failed"
  | "Thinking"
  | "Inference_Failed"
  | "Speaking"
  | "Playback_Failed"
  | "Done";

export type Stage = "capture" | "inference" | "playback";

export type CaptureErrorKind =
  | "no_microphone"
  | "permission_denied"
  | "unintelligible"
  | "timeout"
  | "recognition_failed";

export type InferenceErrorKind = "unreachable" | "backend_error" | "timeout";

export type PlaybackErrorKind = "synthesis_failed" | "output_failed";

export type ErrorKind = CaptureErrorKind | InferenceErrorKind | PlaybackErrorKind;

export interface SurfaceUpdate {
  state: SessionState;
  status: string;
  text?: string;
  errorKind?: ErrorKind;
}

export interface IPresentationSurface {
  update(update: SurfaceUpdate): void;
  hide(): void;
  onCancelRequested(listener: () => void): Disposable;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
