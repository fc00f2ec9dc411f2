import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GoogleGenerativeAIFetchError } from "@google/generative-ai";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiModel, PersonaSynthesizer } from "../src/core/ai-engine.js";
import { ExternalAPIError, MalformedPersonaResponseError } from "../src/core/errors.js";
import type { ModelUsage, PersonaModel } from "../src/types/ai-models.js";
import { silentLogger } from "../src/utils/logger.js";
import { activity, samplePersona, samplePersonaJson } from "./helpers/fixtures.js";

const { generateContent, getGenerativeModel } = vi.hoisted(() => {
  const generateContent = vi.fn();
  const getGenerativeModel = vi.fn(() => ({ generateContent }));
  return { generateContent, getGenerativeModel };
});

vi.mock("@google/generative-ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@google/generative-ai")>();
  return {
    ...actual,
    GoogleGenerativeAI: vi.fn(function () {
      return { getGenerativeModel };
    }),
  };
});

class FakeModel implements PersonaModel {
  readonly name = "fake";
  readonly prompts: string[] = [];

  constructor(private readonly reply: string) {}

  async generateJson(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply;
  }

  getUsage(): ModelUsage {
    return { tokens: 0, requests: this.prompts.length };
  }
}

function textResponse(text: string) {
  return { response: { text: () => text, usageMetadata: { totalTokenCount: 42 } } };
}

describe("GeminiModel", () => {
  beforeEach(() => {
    generateContent.mockReset();
    getGenerativeModel.mockClear();
  });

  it("requests a JSON response from the configured model", async () => {
    generateContent.mockResolvedValueOnce(textResponse(samplePersonaJson));
    const model = new GeminiModel();
    model.initialize({ api_key: "test-key", model_name: "gemini-1.5-pro", temperature: 0.4 });

    const text = await model.generateJson("describe this user");

    expect(text).toBe(samplePersonaJson);
    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: "gemini-1.5-pro",
      generationConfig: { responseMimeType: "application/json", temperature: 0.4 },
    });
    expect(generateContent).toHaveBeenCalledWith("describe this user");
    expect(model.getUsage()).toEqual({ tokens: 42, requests: 1 });
  });

  it("wraps SDK failures with the HTTP status", async () => {
    generateContent.mockRejectedValueOnce(new GoogleGenerativeAIFetchError("quota exceeded", 429, "Too Many Requests"));
    const model = new GeminiModel();
    model.initialize({ api_key: "test-key", model_name: "gemini-1.5-pro" });

    const error = await model.generateJson("prompt").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalAPIError);
    expect(error).toMatchObject({ service: "gemini", status: 429 });
  });

  it("refuses to run before initialization", async () => {
    await expect(new GeminiModel().generateJson("prompt")).rejects.toThrow("Model not initialized");
  });
});

describe("PersonaSynthesizer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "persona-synth-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("sends one prompt containing the activity and returns the persona", async () => {
    const model = new FakeModel(samplePersonaJson);
    const synthesizer = new PersonaSynthesizer(model, silentLogger);

    const persona = await synthesizer.synthesize([
      activity("comment", "I love mechanical keyboards", "2024-05-01T00:00:00.000Z", "c1"),
    ]);

    expect(persona).toEqual(samplePersona);
    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).toContain("Content: I love mechanical keyboards");
  });

  it("proceeds with an empty activity list", async () => {
    const model = new FakeModel(samplePersonaJson);

    await expect(new PersonaSynthesizer(model, silentLogger).synthesize([])).resolves.toEqual(samplePersona);
    expect(model.prompts).toHaveLength(1);
  });

  it("signals MalformedPersonaResponse for non-JSON text", async () => {
    const synthesizer = new PersonaSynthesizer(new FakeModel("Here is your persona!"), silentLogger);

    await expect(synthesizer.synthesize([])).rejects.toBeInstanceOf(MalformedPersonaResponseError);
  });

  it("saves the raw response when asked, even if it does not parse", async () => {
    const rawPath = join(dir, "raw.txt");
    const synthesizer = new PersonaSynthesizer(new FakeModel("not json"), silentLogger);

    await expect(synthesizer.synthesize([], { rawOutputPath: rawPath })).rejects.toBeInstanceOf(
      MalformedPersonaResponseError
    );
    await expect(readFile(rawPath, "utf-8")).resolves.toBe("not json");
  });
});
