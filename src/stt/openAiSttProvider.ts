import OpenAI, { toFile } from "openai";
import { AudioChunk, ISttProvider, RawTranscript } from "../types/contracts";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";

interface OpenAiSttProviderOptions {
  apiKey: string;
  model: string;
  language: string;
  timeoutMs: number;
  baseUrl?: string;
}

export class OpenAiSttProvider implements ISttProvider {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiSttProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
  }

  async transcribe(audio: AudioChunk, signal?: AbortSignal): Promise<RawTranscript> {
    if (audio.pcm16.length === 0) {
      return { text: "" };
    }

    const file = await toFile(await readFile(audio.wavPath), basename(audio.wavPath), {
      type: "audio/wav"
    });
    const transcription = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.options.model,
        // Whisper takes ISO-639-1 codes; "th-TH" style tags are cut down.
        language: this.options.language.split("-")[0] || undefined
      },
      { signal }
    );
    return { text: transcription.text };
  }
}
