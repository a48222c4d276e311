#!/usr/bin/env node
import { KeyboardActivationSource } from "./activation/keyboardActivationSource";
import { AudioCaptureService } from "./audio/audioCaptureService";
import { SpeechCapture } from "./capture/speechCapture";
import { SecretsManager } from "./config/secrets";
import {
  ConfigurationError,
  loadSettings,
  resolveConfigPath,
  VoiceAssistantSettings
} from "./config/settings";
import { ChatInferenceClient, createOpenAiTransport } from "./inference/chatInferenceClient";
import { openLogChannel } from "./logging/logger";
import { messagesFor } from "./orchestration/messages";
import { SessionOrchestrator } from "./orchestration/sessionOrchestrator";
import { AudioPlayer } from "./playback/audioPlayer";
import { createOpenAiSynthesizer, SpeechPlayback } from "./playback/speechPlayback";
import { HttpSttProvider } from "./stt/httpSttProvider";
import { OpenAiSttProvider } from "./stt/openAiSttProvider";
import { TerminalSurface } from "./surface/terminalSurface";
import { ISttProvider } from "./types/contracts";

const MISSING_SPEECH_KEY =
  "OPENAI_API_KEY is not set. Speech transcription and synthesis need it.";

function createSttProvider(settings: VoiceAssistantSettings, speechApiKey: string): ISttProvider {
  if (settings.sttProvider === "http") {
    return new HttpSttProvider({
      endpoint: settings.sttHttpEndpoint,
      language: settings.sttLanguage,
      timeoutMs: settings.sttTimeoutMs
    });
  }

  return new OpenAiSttProvider({
    apiKey: speechApiKey,
    model: settings.sttModel,
    language: settings.sttLanguage,
    timeoutMs: settings.sttTimeoutMs
  });
}

export async function main(): Promise<void> {
  const settings = await loadSettings(resolveConfigPath());
  const secrets = new SecretsManager();
  const channel = await openLogChannel("Voice Assistant", settings.logFilePath);
  const logger = channel.createLogger("main");
  logger.info(`starting (stt=${settings.sttProvider}, model=${settings.inferenceModel})`);

  const speechApiKey = secrets.getSpeechApiKey();
  if (!speechApiKey) {
    logger.warn(MISSING_SPEECH_KEY);
  }

  const surface = new TerminalSurface();

  const orchestrator = new SessionOrchestrator({
    capturer: new SpeechCapture({
      recorder: new AudioCaptureService(
        {
          vadEnabled: settings.vadEnabled,
          vadSilenceMs: settings.vadSilenceMs,
          vadMinSpeechMs: settings.vadMinSpeechMs,
          maxRecordingMs: settings.vadMaxRecordingMs
        },
        channel.createLogger("capture")
      ),
      sttProvider: createSttProvider(settings, speechApiKey ?? ""),
      logger: channel.createLogger("capture")
    }),
    inferencer: new ChatInferenceClient(
      {
        model: settings.inferenceModel,
        temperature: settings.inferenceTemperature,
        maxTokens: settings.inferenceMaxTokens,
        historyLimit: settings.inferenceHistoryLimit,
        systemPrompt: settings.inferenceSystemPrompt
      },
      createOpenAiTransport({
        apiKey: secrets.getInferenceApiKey(),
        baseUrl: settings.inferenceBaseUrl,
        timeoutMs: settings.inferenceTimeoutMs
      }),
      channel.createLogger("inference")
    ),
    speaker: new SpeechPlayback({
      synthesize: createOpenAiSynthesizer({
        apiKey: speechApiKey ?? "",
        baseUrl: settings.ttsBaseUrl,
        model: settings.ttsModel,
        voice: settings.ttsVoice,
        timeoutMs: settings.ttsTimeoutMs
      }),
      player: new AudioPlayer(settings.ttsPlayerPath, undefined, channel.createLogger("playback")),
      logger: channel.createLogger("playback")
    }),
    surface,
    messages: messagesFor(settings.uiLanguage),
    autoHideDelayMs: settings.autoHideDelayMs,
    logger: channel.createLogger("orchestrator")
  });

  const activation = new KeyboardActivationSource(process.stdin, channel.createLogger("activation"));
  const subscriptions = [
    activation.on("activate", () => orchestrator.activate()),
    activation.on("cancel", () => surface.requestCancel()),
    surface.onCancelRequested(() => orchestrator.cancel())
  ];

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      resolve();
    };
    subscriptions.push(activation.on("quit", shutdown));
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    activation.start();
    const hotkeyHint = process.platform === "win32" ? "" : `, or kill -USR2 ${process.pid}`;
    process.stdout.write(`Voice Assistant ready. Space to talk${hotkeyHint}. Esc dismisses, q quits.\n`);
  });

  for (const subscription of subscriptions) {
    subscription.dispose();
  }
  orchestrator.dispose();
  activation.dispose();
  surface.hide();
  logger.info("stopped");
  await channel.close();
}

if (require.main === module) {
  main().then(
    () => process.exit(0),
    (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      const prefix = error instanceof ConfigurationError ? "Configuration error" : "Voice Assistant failed";
      process.stderr.write(`${prefix}: ${message}\n`);
      process.exit(1);
    }
  );
}
