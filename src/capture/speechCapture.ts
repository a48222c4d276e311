import { cleanupWavFile } from "../audio/audioCaptureService";
import { abortError, CaptureError, isAbortError } from "../orchestration/stageErrors";
import { Capturer, IAudioRecorder, ISttProvider, Logger, RawTranscript } from "../types/contracts";

interface Dependencies {
  recorder: IAudioRecorder;
  sttProvider: ISttProvider;
  logger?: Logger;
  cleanup?: (wavPath: string) => Promise<void>;
}

/** Records one utterance and turns it into text. */
export class SpeechCapture implements Capturer {
  constructor(private readonly deps: Dependencies) {}

  async capture(token: number, signal: AbortSignal): Promise<string> {
    const audio = await this.deps.recorder.captureOnce(signal);
    const cleanup = this.deps.cleanup ?? cleanupWavFile;

    try {
      if (audio.pcm16.length === 0) {
        this.deps.logger?.warn(`session #${token}: no audio captured`);
        return "";
      }

      const t0 = Date.now();
      let raw: RawTranscript;
      try {
        raw = await this.deps.sttProvider.transcribe(audio, signal);
      } catch (error) {
        if (signal.aborted || isAbortError(error)) {
          throw abortError();
        }
        throw CaptureError.from(error);
      }
      const text = raw.text.trim();
      this.deps.logger?.info(
        `session #${token}: transcribed ${text.length} chars in ${((Date.now() - t0) / 1000).toFixed(1)}s`
      );
      return text;
    } finally {
      await cleanup(audio.wavPath).catch(() => undefined);
    }
  }
}
