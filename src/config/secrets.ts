const SPEECH_API_KEY_VAR = "OPENAI_API_KEY";
const LLM_API_KEY_VAR = "VOICE_ASSISTANT_LLM_API_KEY";

// Local OpenAI-compatible servers accept any bearer token, but the SDK
// refuses to construct a client without one.
const LOCAL_PLACEHOLDER_KEY = "not-needed";

export class SecretsManager {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getSpeechApiKey(): string | undefined {
    return this.read(SPEECH_API_KEY_VAR);
  }

  getInferenceApiKey(): string {
    return this.read(LLM_API_KEY_VAR) ?? this.read(SPEECH_API_KEY_VAR) ?? LOCAL_PLACEHOLDER_KEY;
  }

  private read(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }
}
