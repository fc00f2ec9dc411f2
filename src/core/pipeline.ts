import type { PersonaRecord } from "../types/persona.js";
import type { AppConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { GeminiModel, PersonaSynthesizer } from "./ai-engine.js";
import { Collector } from "./collector.js";
import { RedditClient } from "./reddit.js";
import { CardRenderer } from "./renderer.js";

export interface PipelineOptions {
  username: string;
  maxItems: number;
  outputPath: string;
  rawOutputPath?: string;
}

export interface PipelineDeps {
  collector: Pick<Collector, "collect">;
  synthesizer: Pick<PersonaSynthesizer, "synthesize">;
  renderer: Pick<CardRenderer, "render">;
  logger: Logger;
}

export interface PipelineResult {
  username: string;
  itemCount: number;
  outputPath: string;
  persona: PersonaRecord;
}

/** Wires the real Reddit, Gemini and resvg backed stages from the configuration. */
export function createPipelineDeps(config: AppConfig, logger: Logger): PipelineDeps {
  const model = new GeminiModel();
  model.initialize({
    api_key: config.gemini.apiKey,
    model_name: config.gemini.modelName,
    temperature: config.gemini.temperature,
  });

  return {
    collector: new Collector(new RedditClient(config.reddit, logger), logger),
    synthesizer: new PersonaSynthesizer(model, logger),
    renderer: new CardRenderer(logger, { fontFiles: config.renderer.fontFiles }),
    logger,
  };
}

/**
 * Collect, synthesize, render. Each stage runs to completion before the next
 * starts and any failure aborts the run before the card is written.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { username, maxItems, outputPath, rawOutputPath } = options;
  deps.logger.info("pipeline", `--- Starting persona generation for u/${username} ---`);

  const items = await deps.collector.collect(username, maxItems);
  const persona = await deps.synthesizer.synthesize(items, { rawOutputPath });
  await deps.renderer.render(persona, outputPath);

  deps.logger.info("pipeline", `--- Persona generation for u/${username} complete ---`);
  return { username, itemCount: items.length, outputPath, persona };
}
