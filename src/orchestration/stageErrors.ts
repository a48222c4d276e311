import OpenAI from "openai";
import { errors as undiciErrors } from "undici";
import {
  CaptureErrorKind,
  ErrorKind,
  InferenceErrorKind,
  PlaybackErrorKind,
  Stage
} from "../types/contracts";

export abstract class StageError extends Error {
  abstract readonly stage: Stage;
  abstract readonly kind: ErrorKind;
}

export class CaptureError extends StageError {
  readonly stage = "capture";

  constructor(readonly kind: CaptureErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CaptureError";
  }

  static from(error: unknown): CaptureError {
    if (error instanceof CaptureError) return error;
    const message = describeError(error);
    if (isTimeout(error)) {
      return new CaptureError("timeout", message, { cause: error });
    }
    return new CaptureError("recognition_failed", message, { cause: error });
  }
}

export class InferenceError extends StageError {
  readonly stage = "inference";

  constructor(readonly kind: InferenceErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InferenceError";
  }

  static from(error: unknown): InferenceError {
    if (error instanceof InferenceError) return error;
    const message = describeError(error);
    if (isTimeout(error)) {
      return new InferenceError("timeout", message, { cause: error });
    }
    if (isUnreachable(error)) {
      return new InferenceError("unreachable", message, { cause: error });
    }
    return new InferenceError("backend_error", message, { cause: error });
  }
}

export class PlaybackError extends StageError {
  readonly stage = "playback";

  constructor(readonly kind: PlaybackErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PlaybackError";
  }

  static from(error: unknown): PlaybackError {
    if (error instanceof PlaybackError) return error;
    return new PlaybackError("output_failed", describeError(error), { cause: error });
  }
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof OpenAI.APIUserAbortError) return true;
  return error instanceof Error && error.name === "AbortError";
}

export function abortError(): Error {
  const error = new Error("The operation was aborted.");
  error.name = "AbortError";
  return error;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof OpenAI.APIConnectionTimeoutError ||
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError ||
    error instanceof undiciErrors.ConnectTimeoutError ||
    errorCode(error) === "ETIMEDOUT"
  );
}

function isUnreachable(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  const code = errorCode(error);
  return code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET";
}

function errorCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object") return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error && error.cause !== error) return errorCode(error.cause);
  return undefined;
}

function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) return error.message;
  return String(error);
}
