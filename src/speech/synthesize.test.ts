import { ServiceUnavailableError } from "../errors.js";
import {
  type SpeechApi,
  formatFromPath,
  formatSize,
  resolveOutputPath,
  synthesize,
  synthesizeChunks
} from "./synthesize.js";

function bytesOf(text: string): ArrayBuffer {
  const encoded = new TextEncoder().encode(text);
  const out = new ArrayBuffer(encoded.byteLength);
  new Uint8Array(out).set(encoded);
  return out;
}

function fakeSpeechApi() {
  const create = vi.fn(async (body: { input: string }) => ({
    arrayBuffer: async () => bytesOf(`<${body.input}>`)
  }));
  const api = { audio: { speech: { create } } } satisfies SpeechApi;
  return { api, create };
}

const options = { model: "tts-1", voice: "nova", format: "mp3" } as const;

describe("resolveOutputPath", () => {
  it.each([
    ["speech.mp3", "speech.mp3"],
    ["speech.FLAC", "speech.FLAC"],
    ["speech.opus", "speech.opus"],
    ["speech", "speech.mp3"],
    ["speech.wav", "speech.wav.mp3"]
  ])("resolves %s to %s", (input, expected) => {
    expect(resolveOutputPath(input)).toBe(expected);
  });
});

describe("formatFromPath", () => {
  it("derives the format from the extension", () => {
    expect(formatFromPath("out/voice.aac")).toBe("aac");
    expect(formatFromPath("out/voice.Flac")).toBe("flac");
    expect(formatFromPath("out/voice")).toBe("mp3");
  });
});

describe("synthesize", () => {
  it("sends model, voice and format", async () => {
    const { api, create } = fakeSpeechApi();

    const audio = await synthesize(api, "Hello", options);

    expect(audio.toString("utf-8")).toBe("<Hello>");
    expect(create).toHaveBeenCalledWith({
      model: "tts-1",
      voice: "nova",
      input: "Hello",
      response_format: "mp3"
    });
  });

  it("classifies server failures", async () => {
    const { api, create } = fakeSpeechApi();
    create.mockRejectedValueOnce(Object.assign(new Error("down"), { status: 502 }));

    await expect(synthesize(api, "Hello", options)).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe("synthesizeChunks", () => {
  it("concatenates audio in chunk order", async () => {
    const { api } = fakeSpeechApi();
    const progress = vi.fn();

    const audio = await synthesizeChunks(api, ["One.", "Two."], options, progress);

    expect(audio.toString("utf-8")).toBe("<One.><Two.>");
    expect(progress.mock.calls).toEqual([
      [1, 2],
      [2, 2]
    ]);
  });
});

describe("formatSize", () => {
  it("uses KB below one megabyte", () => {
    expect(formatSize(2048)).toBe("2.00 KB");
  });

  it("uses MB from one megabyte", () => {
    expect(formatSize(1.5 * 1024 * 1024)).toBe("1.50 MB");
  });
});
