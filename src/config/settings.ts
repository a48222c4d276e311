import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { UiLanguage } from "../orchestration/messages";
import { TtsVoice } from "../playback/speechPlayback";

export type SttProvider = "openai" | "http";

export interface VoiceAssistantSettings {
  uiLanguage: UiLanguage;
  autoHideDelayMs: number;
  inferenceBaseUrl: string;
  inferenceModel: string;
  inferenceTimeoutMs: number;
  inferenceTemperature: number;
  inferenceMaxTokens: number;
  inferenceHistoryLimit: number;
  inferenceSystemPrompt: string;
  sttProvider: SttProvider;
  sttModel: string;
  sttLanguage: string;
  sttHttpEndpoint: string;
  sttTimeoutMs: number;
  vadEnabled: boolean;
  vadSilenceMs: number;
  vadMinSpeechMs: number;
  vadMaxRecordingMs: number;
  ttsModel: string;
  ttsVoice: TtsVoice;
  ttsBaseUrl: string;
  ttsTimeoutMs: number;
  ttsPlayerPath: string;
  logFilePath: string;
}

export const CONFIG_ENV_VAR = "VOICE_ASSISTANT_CONFIG";
export const DEFAULT_CONFIG_FILE = "voice-assistant.json";

const positiveInt = z.number().int().positive();

const settingsSchema = z.object({
  "ui.language": z.enum(["th", "en"]).default("th"),
  "ui.autoHideDelayMs": positiveInt.default(5000),
  "inference.baseUrl": z.string().url().default("http://localhost:4000/v1"),
  "inference.model": z.string().min(1).default("openclaw"),
  "inference.timeoutMs": positiveInt.default(60000),
  "inference.temperature": z.number().min(0).max(2).default(0.7),
  "inference.maxTokens": positiveInt.default(1024),
  "inference.historyLimit": z.number().int().min(0).default(40),
  "inference.systemPrompt": z.string().default(""),
  "stt.provider": z.enum(["openai", "http"]).default("openai"),
  "stt.model": z.string().min(1).default("whisper-1"),
  "stt.language": z.string().default("th"),
  "stt.httpEndpoint": z.string().url().default("http://127.0.0.1:8765/transcribe"),
  "stt.timeoutMs": positiveInt.default(30000),
  "vad.enabled": z.boolean().default(true),
  "vad.silenceMs": positiveInt.default(1500),
  "vad.minSpeechMs": positiveInt.default(300),
  "vad.maxRecordingMs": positiveInt.default(30000),
  "tts.model": z.string().min(1).default("tts-1"),
  "tts.voice": z.enum(["alloy", "echo", "fable", "onyx", "nova", "shimmer"]).default("alloy"),
  "tts.baseUrl": z.string().url().default("https://api.openai.com/v1"),
  "tts.timeoutMs": positiveInt.default(30000),
  "tts.playerPath": z.string().default(""),
  "log.filePath": z.string().default("logs/assistant.log")
});

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_FILE);
}

export async function loadSettings(configPath: string): Promise<VoiceAssistantSettings> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return parseSettings({});
    }
    throw new ConfigurationError(`Cannot read ${configPath}.`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${configPath} is not valid JSON.`, { cause: error });
  }
  return parseSettings(raw);
}

export function parseSettings(raw: unknown): VoiceAssistantSettings {
  const parsed = settingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.join(".") || "(root)";
    throw new ConfigurationError(`Invalid setting "${key}": ${issue.message}`);
  }

  const cfg = parsed.data;
  return {
    uiLanguage: cfg["ui.language"],
    autoHideDelayMs: cfg["ui.autoHideDelayMs"],
    inferenceBaseUrl: cfg["inference.baseUrl"],
    inferenceModel: cfg["inference.model"],
    inferenceTimeoutMs: cfg["inference.timeoutMs"],
    inferenceTemperature: cfg["inference.temperature"],
    inferenceMaxTokens: cfg["inference.maxTokens"],
    inferenceHistoryLimit: cfg["inference.historyLimit"],
    inferenceSystemPrompt: cfg["inference.systemPrompt"],
    sttProvider: cfg["stt.provider"],
    sttModel: cfg["stt.model"],
    sttLanguage: cfg["stt.language"],
    sttHttpEndpoint: cfg["stt.httpEndpoint"],
    sttTimeoutMs: cfg["stt.timeoutMs"],
    vadEnabled: cfg["vad.enabled"],
    vadSilenceMs: cfg["vad.silenceMs"],
    vadMinSpeechMs: cfg["vad.minSpeechMs"],
    vadMaxRecordingMs: cfg["vad.maxRecordingMs"],
    ttsModel: cfg["tts.model"],
    ttsVoice: cfg["tts.voice"],
    ttsBaseUrl: cfg["tts.baseUrl"],
    ttsTimeoutMs: cfg["tts.timeoutMs"],
    ttsPlayerPath: cfg["tts.playerPath"],
    logFilePath: cfg["log.filePath"]
  };
}

function isMissingFile(error: unknown): boolean {
  return Boolean(
    error && typeof error === "object" && "code" in error && error.code === "ENOENT"
  );
}
