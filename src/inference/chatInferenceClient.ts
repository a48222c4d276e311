import OpenAI from "openai";
import { InferenceError } from "../orchestration/stageErrors";
import { Inferencer, Logger } from "../types/contracts";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

export type ChatTransport = (
  request: ChatRequest,
  signal: AbortSignal
) => Promise<string | null | undefined>;

interface ChatInferenceClientOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  historyLimit: number;
  systemPrompt: string;
}

export interface OpenAiTransportOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

/** Chat completions against any OpenAI-compatible endpoint. */
export function createOpenAiTransport(options: OpenAiTransportOptions): ChatTransport {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0
  });

  return async (request, signal) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens
      },
      { signal }
    );
    return completion.choices[0]?.message?.content;
  };
}

export class ChatInferenceClient implements Inferencer {
  private history: ChatMessage[] = [];

  constructor(
    private readonly options: ChatInferenceClientOptions,
    private readonly transport: ChatTransport,
    private readonly logger?: Logger
  ) {}

  async query(transcript: string, token: number, signal: AbortSignal): Promise<string> {
    const userMessage: ChatMessage = { role: "user", content: transcript };
    const messages: ChatMessage[] = [
      ...(this.options.systemPrompt
        ? [{ role: "system" as const, content: this.options.systemPrompt }]
        : []),
      ...this.history,
      userMessage
    ];

    this.logger?.info(`session #${token}: sending to ${this.options.model}: ${transcript.slice(0, 80)}`);

    const content = await this.transport(
      {
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens
      },
      signal
    );

    const reply = (content ?? "").trim();
    if (!reply) {
      throw new InferenceError("backend_error", "The backend returned an empty reply.");
    }
    this.logger?.info(`session #${token}: reply received (${reply.length} chars)`);

    if (!signal.aborted) {
      this.remember(userMessage, { role: "assistant", content: reply });
    }
    return reply;
  }

  getHistory(): readonly ChatMessage[] {
    return this.history;
  }

  resetHistory(): void {
    this.history = [];
  }

  private remember(...messages: ChatMessage[]): void {
    const limit = this.options.historyLimit;
    const next = [...this.history, ...messages];
    this.history = limit > 0 ? next.slice(-limit) : [];
  }
}
