import OpenAI from "openai";
import { randomBytes } from "node:crypto";
import { unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { abortError, isAbortError, PlaybackError } from "../orchestration/stageErrors";
import { Logger, Speaker } from "../types/contracts";
import { IAudioPlayer } from "./audioPlayer";

export type TtsVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export type Synthesizer = (text: string, signal: AbortSignal) => Promise<Buffer>;

export interface OpenAiSynthesizerOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  voice: TtsVoice;
  timeoutMs: number;
}

export function createOpenAiSynthesizer(options: OpenAiSynthesizerOptions): Synthesizer {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0
  });

  return async (text, signal) => {
    const response = await client.audio.speech.create(
      {
        model: options.model,
        voice: options.voice,
        input: text,
        response_format: "mp3"
      },
      { signal }
    );
    return Buffer.from(await response.arrayBuffer());
  };
}

interface Dependencies {
  synthesize: Synthesizer;
  player: IAudioPlayer;
  logger?: Logger;
}

/** Speaks a reply: synthesize to a temp mp3, then play it to completion. */
export class SpeechPlayback implements Speaker {
  constructor(private readonly deps: Dependencies) {}

  async speak(reply: string, token: number, signal: AbortSignal): Promise<void> {
    let audio: Buffer;
    try {
      audio = await this.deps.synthesize(reply, signal);
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw abortError();
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PlaybackError("synthesis_failed", `TTS Error: ${message}`, { cause: error });
    }

    if (audio.length === 0) {
      throw new PlaybackError("synthesis_failed", "TTS returned no audio.");
    }

    const mp3Path = join(tmpdir(), `voice-assistant-${randomBytes(8).toString("hex")}.mp3`);
    await writeFile(mp3Path, audio);
    this.deps.logger?.info(`session #${token}: playing ${audio.length} bytes of speech`);

    try {
      await this.deps.player.play(mp3Path, signal);
    } finally {
      await unlink(mp3Path).catch(() => undefined);
    }
  }
}
