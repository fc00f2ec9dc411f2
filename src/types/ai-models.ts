export interface ModelConfig {
  api_key: string;
  model_name: string;
  temperature?: number;
}

export interface ModelUsage {
  tokens: number;
  requests: number;
}

/**
 * A text-generation backend that answers a single prompt with a JSON
 * document, returned as raw text.
 */
export interface PersonaModel {
  readonly name: string;
  generateJson(prompt: string): Promise<string>;
  getUsage(): ModelUsage;
}
