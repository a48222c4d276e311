import { EventEmitter } from "node:events";
import { existsSync, readFileSync } from "node:fs";
import { describe, expect, it, vi } from "vitest";
import { PlaybackError } from "../orchestration/stageErrors";
import { argsFor, AudioPlayer, IAudioPlayer, PlayerProcess } from "../playback/audioPlayer";
import { SpeechPlayback } from "../playback/speechPlayback";
import { flushMicrotasks } from "./fakes";

class FakeProcess extends EventEmitter implements PlayerProcess {
  killed = false;

  kill(): boolean {
    this.killed = true;
    this.emit("close", null);
    return true;
  }
}

function launcher() {
  const launched: { command: string; args: string[]; proc: FakeProcess }[] = [];
  const launch = vi.fn((command: string, args: string[]) => {
    const proc = new FakeProcess();
    launched.push({ command, args, proc });
    return proc;
  });
  return { launch, launched };
}

describe("AudioPlayer", () => {
  it("runs the configured player with its quiet flags", async () => {
    const { launch, launched } = launcher();
    const player = new AudioPlayer("/usr/bin/mpg123", launch);

    const playing = player.play("/tmp/reply.mp3", new AbortController().signal);
    await flushMicrotasks();
    expect(launched[0].command).toBe("/usr/bin/mpg123");
    expect(launched[0].args).toEqual(["-q", "/tmp/reply.mp3"]);

    launched[0].proc.emit("close", 0);
    await expect(playing).resolves.toBeUndefined();
  });

  it("fails with output_failed on a non-zero exit", async () => {
    const { launch, launched } = launcher();
    const player = new AudioPlayer("mpv", launch);

    const playing = player.play("/tmp/reply.mp3", new AbortController().signal);
    await flushMicrotasks();
    launched[0].proc.emit("close", 2);

    await expect(playing).rejects.toBeInstanceOf(PlaybackError);
    await expect(playing).rejects.toMatchObject({ kind: "output_failed", message: "mpv exited with code 2" });
  });

  it("fails with output_failed when the player cannot start", async () => {
    const { launch, launched } = launcher();
    const player = new AudioPlayer("ffplay", launch);

    const playing = player.play("/tmp/reply.mp3", new AbortController().signal);
    await flushMicrotasks();
    launched[0].proc.emit("error", new Error("spawn ffplay ENOENT"));

    await expect(playing).rejects.toMatchObject({
      kind: "output_failed",
      message: "Player failed to start: spawn ffplay ENOENT"
    });
  });

  it("kills the player when the session is cancelled", async () => {
    const { launch, launched } = launcher();
    const player = new AudioPlayer("mpv", launch);
    const controller = new AbortController();

    const playing = player.play("/tmp/reply.mp3", controller.signal);
    await flushMicrotasks();
    controller.abort();

    expect(launched[0].proc.killed).toBe(true);
    await expect(playing).rejects.toMatchObject({ name: "AbortError" });
  });

  it("does not start when already cancelled", async () => {
    const { launch } = launcher();
    const controller = new AbortController();
    controller.abort();

    await expect(new AudioPlayer("mpv", launch).play("/tmp/reply.mp3", controller.signal)).rejects.toMatchObject({
      name: "AbortError"
    });
    expect(launch).not.toHaveBeenCalled();
  });
});

describe("argsFor", () => {
  it("knows the common players", () => {
    expect(argsFor("ffplay")).toEqual(["-nodisp", "-autoexit", "-loglevel", "quiet"]);
    expect(argsFor("C:\\tools\\mpv.exe")).toEqual(["--no-video", "--really-quiet"]);
    expect(argsFor("/usr/bin/afplay")).toEqual([]);
  });
});

describe("SpeechPlayback", () => {
  function recordingPlayer() {
    const played: { path: string; existed: boolean; bytes: string }[] = [];
    const player: IAudioPlayer = {
      play: vi.fn(async (path: string) => {
        played.push({ path, existed: existsSync(path), bytes: readFileSync(path, "utf-8") });
      })
    };
    return { player, played };
  }

  it("plays the synthesized audio from a temporary file and removes it", async () => {
    const { player, played } = recordingPlayer();
    const synthesize = vi.fn(async () => Buffer.from("fake-mp3"));
    const playback = new SpeechPlayback({ synthesize, player });

    await playback.speak("Hello there", 1, new AbortController().signal);

    expect(synthesize).toHaveBeenCalledWith("Hello there", expect.any(AbortSignal));
    expect(played).toHaveLength(1);
    expect(played[0].existed).toBe(true);
    expect(played[0].bytes).toBe("fake-mp3");
    expect(played[0].path.endsWith(".mp3")).toBe(true);
    expect(existsSync(played[0].path)).toBe(false);
  });

  it("reports a synthesis failure", async () => {
    const { player } = recordingPlayer();
    const playback = new SpeechPlayback({
      synthesize: async () => {
        throw new Error("401 Unauthorized");
      },
      player
    });

    const speaking = playback.speak("Hi", 1, new AbortController().signal);
    await expect(speaking).rejects.toMatchObject({ kind: "synthesis_failed", message: "TTS Error: 401 Unauthorized" });
    expect(player.play).not.toHaveBeenCalled();
  });

  it("treats empty audio as a synthesis failure", async () => {
    const { player } = recordingPlayer();
    const playback = new SpeechPlayback({ synthesize: async () => Buffer.alloc(0), player });

    await expect(playback.speak("Hi", 1, new AbortController().signal)).rejects.toMatchObject({
      kind: "synthesis_failed",
      message: "TTS returned no audio."
    });
  });

  it("surfaces a cancelled synthesis as an abort", async () => {
    const { player } = recordingPlayer();
    const controller = new AbortController();
    const playback = new SpeechPlayback({
      synthesize: async () => {
        controller.abort();
        throw new Error("Request was aborted.");
      },
      player
    });

    await expect(playback.speak("Hi", 1, controller.signal)).rejects.toMatchObject({ name: "AbortError" });
  });

  it("removes the temporary file when the player fails", async () => {
    const paths: string[] = [];
    const player: IAudioPlayer = {
      play: async (path) => {
        paths.push(path);
        throw new PlaybackError("output_failed", "mpv exited with code 1");
      }
    };
    const playback = new SpeechPlayback({ synthesize: async () => Buffer.from("x"), player });

    await expect(playback.speak("Hi", 1, new AbortController().signal)).rejects.toMatchObject({
      kind: "output_failed"
    });
    expect(existsSync(paths[0])).toBe(false);
  });
});
