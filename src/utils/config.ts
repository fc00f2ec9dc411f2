import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";
import "dotenv/config";
import { ConfigurationError, MissingCredentialsError } from "../core/errors.js";
import type { LogLevel } from "./logger.js";

type RuntimeEnv = Record<string, string | undefined>;

const REQUIRED_KEYS = ["REDDIT_CLIENT_ID", "REDDIT_SECRET", "GEMINI_API_KEY"] as const;

export interface RedditConfig {
  clientId: string;
  clientSecret: string;
  userAgent: string;
}

export interface GeminiConfig {
  apiKey: string;
  modelName: string;
  temperature: number;
}

export interface AppConfig {
  reddit: Readonly<RedditConfig>;
  gemini: Readonly<GeminiConfig>;
  collector: Readonly<{ maxItems: number }>;
  renderer: Readonly<{ fontFiles: readonly string[] }>;
  logLevel: LogLevel;
}

function missingKeys(runtimeEnv: RuntimeEnv): string[] {
  return REQUIRED_KEYS.filter((key) => !runtimeEnv[key]?.trim());
}

function validationError(runtimeEnv: RuntimeEnv): ConfigurationError {
  const missing = missingKeys(runtimeEnv);
  if (missing.length > 0) {
    return new MissingCredentialsError(missing);
  }
  return new ConfigurationError("Invalid environment variables");
}

/**
 * Validates the environment once at startup and returns the configuration
 * every component receives explicitly.
 */
export function loadConfig(runtimeEnv: RuntimeEnv = process.env): AppConfig {
  const env = createEnv({
    server: {
      // Reddit "script" app credentials
      REDDIT_CLIENT_ID: z.string().trim().min(1),
      REDDIT_SECRET: z.string().trim().min(1),
      REDDIT_USER_AGENT: z.string().min(1).default("persona-card/0.1.0"),

      // Gemini
      GEMINI_API_KEY: z.string().trim().min(1),
      GEMINI_MODEL: z.string().min(1).default("gemini-1.5-pro"),
      GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),

      // Collector
      PERSONA_MAX_ITEMS: z.coerce.number().int().positive().default(60),

      // Renderer: comma separated font files loaded before the system fonts
      PERSONA_FONT_FILES: z
        .string()
        .optional()
        .transform((str) =>
          str
            ? str
                .split(",")
                .map((s) => s.trim())
                .filter(Boolean)
            : []
        ),

      LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: () => {
      throw validationError(runtimeEnv);
    },
  });

  return Object.freeze({
    reddit: Object.freeze({
      clientId: env.REDDIT_CLIENT_ID,
      clientSecret: env.REDDIT_SECRET,
      userAgent: env.REDDIT_USER_AGENT,
    }),
    gemini: Object.freeze({
      apiKey: env.GEMINI_API_KEY,
      modelName: env.GEMINI_MODEL,
      temperature: env.GEMINI_TEMPERATURE,
    }),
    collector: Object.freeze({ maxItems: env.PERSONA_MAX_ITEMS }),
    renderer: Object.freeze({ fontFiles: Object.freeze(env.PERSONA_FONT_FILES) }),
    logLevel: env.LOG_LEVEL,
  });
}
