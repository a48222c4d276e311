import { AudioChunk, ISttProvider, RawTranscript } from "../types/contracts";
import { request } from "undici";
import { z } from "zod";

interface HttpSttProviderOptions {
  endpoint: string;
  language: string;
  timeoutMs: number;
}

const payloadSchema = z.object({
  text: z.string().optional(),
  confidence: z.number().optional()
});

export class HttpSttProvider implements ISttProvider {
  constructor(private readonly options: HttpSttProviderOptions) {}

  async transcribe(audio: AudioChunk, signal?: AbortSignal): Promise<RawTranscript> {
    if (audio.pcm16.length === 0) {
      return { text: "" };
    }

    const body = {
      audioBase64: audio.pcm16.toString("base64"),
      sampleRateHz: audio.sampleRateHz,
      channels: audio.channels,
      language: this.options.language
    };

    const res = await request(this.options.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json"
      },
      body: JSON.stringify(body),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      signal
    });

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`HTTP STT failed (${res.statusCode})`);
    }

    const payload = payloadSchema.parse(await res.body.json());
    return { text: payload.text ?? "", confidence: payload.confidence };
  }
}
