import { writeFile } from "node:fs/promises";
import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from "@google/generative-ai";
import type { ModelConfig, ModelUsage, PersonaModel } from "../types/ai-models.js";
import type { ActivityItem, PersonaRecord } from "../types/persona.js";
import type { Logger } from "../utils/logger.js";
import { ExternalAPIError } from "./errors.js";
import { parsePersonaResponse } from "./persona-schema.js";
import { buildPersonaPrompt } from "./prompt.js";

export class GeminiModel implements PersonaModel {
  private client: GoogleGenerativeAI | null = null;
  private config: ModelConfig | null = null;
  private usage: ModelUsage = { tokens: 0, requests: 0 };
  readonly name = "gemini";

  initialize(config: ModelConfig): void {
    if (!config.api_key) {
      throw new Error("No API key provided for Gemini model");
    }
    this.config = config;
    this.client = new GoogleGenerativeAI(config.api_key);
  }

  async generateJson(prompt: string): Promise<string> {
    if (!this.client || !this.config) {
      throw new Error("Model not initialized");
    }

    try {
      const model = this.client.getGenerativeModel({
        model: this.config.model_name,
        generationConfig: {
          responseMimeType: "application/json",
          temperature: this.config.temperature,
        },
      });
      const result = await model.generateContent(prompt);
      const text = result.response.text();

      this.usage.requests++;
      this.usage.tokens += result.response.usageMetadata?.totalTokenCount ?? Math.ceil(text.length / 4);
      return text;
    } catch (error) {
      const status = error instanceof GoogleGenerativeAIFetchError ? error.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalAPIError("gemini", message, status, { cause: error });
    }
  }

  getUsage(): ModelUsage {
    return { ...this.usage };
  }
}

export interface SynthesizeOptions {
  /** Where to save the raw model response before it is parsed. */
  rawOutputPath?: string;
}

/**
 * Turns collected activity into a persona: one prompt, one request, one
 * strictly validated JSON document.
 */
export class PersonaSynthesizer {
  constructor(
    private readonly model: PersonaModel,
    private readonly logger: Logger
  ) {}

  async synthesize(items: readonly ActivityItem[], options: SynthesizeOptions = {}): Promise<PersonaRecord> {
    if (items.length === 0) {
      this.logger.warn("synthesizer", "No activity collected; the persona will be mostly placeholders");
    }

    const prompt = buildPersonaPrompt(items);
    this.logger.info("synthesizer", `Generating persona with ${this.model.name}...`);
    this.logger.debug("synthesizer", `Prompt is ${prompt.length} characters`);

    const raw = await this.model.generateJson(prompt);
    const usage = this.model.getUsage();
    this.logger.debug("synthesizer", `Model usage: ${usage.requests} requests, ~${usage.tokens} tokens`);

    if (options.rawOutputPath) {
      await this.saveRaw(options.rawOutputPath, raw);
    }

    const persona = parsePersonaResponse(raw);
    this.logger.info("synthesizer", `✅ Persona generated: ${persona.name} (${persona.archetype})`);
    return persona;
  }

  private async saveRaw(path: string, raw: string): Promise<void> {
    try {
      await writeFile(path, raw, "utf-8");
      this.logger.info("synthesizer", `Raw model output saved to ${path}`);
    } catch (error) {
      this.logger.warn("synthesizer", `Could not save raw model output to ${path}`, error);
    }
  }
}
