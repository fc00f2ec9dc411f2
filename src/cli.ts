import { join } from "node:path";
import { parseArgs } from "node:util";
import { createPipelineDeps, runPipeline } from "./core/pipeline.js";
import { PersonaCardError } from "./core/errors.js";
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { extractUsername } from "./utils/username.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: persona-card <username | profile-url> [options]

Options:
  -l, --limit <n>      Maximum submissions and comments to read (default: PERSONA_MAX_ITEMS or 60)
  -o, --output <path>  PNG file to write (default: <username>_persona_card.png)
      --raw <path>     Also save the raw model response to this file
  -h, --help           Show this help message`;

export interface CliArgs {
  target: string;
  limit?: number;
  output?: string;
  raw?: string;
  help: boolean;
}

/** `<username>_persona_card.png` in the working directory. */
export function defaultOutputPath(username: string): string {
  return join(process.cwd(), `${username}_persona_card.png`);
}

export class UsageError extends Error {
  override name = "UsageError";
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      limit: { type: "string", short: "l" },
      output: { type: "string", short: "o" },
      raw: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const help = values.help ?? false;
  if (help) {
    return { target: "", help };
  }
  if (positionals.length !== 1) {
    throw new UsageError("Expected exactly one Reddit username or profile URL");
  }

  let limit: number | undefined;
  if (values.limit !== undefined) {
    limit = Number(values.limit);
    if (!/^\d+$/.test(values.limit) || !Number.isSafeInteger(limit) || limit < 1) {
      throw new UsageError(`--limit must be a positive integer, got "${values.limit}"`);
    }
  }

  return { target: positionals[0], limit, output: values.output, raw: values.raw, help };
}

/** Runs one persona generation and returns the process exit code. */
export async function main(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const username = extractUsername(args.target);
  if (!username) {
    console.error(`"${args.target}" is not a Reddit username or profile URL\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  let logger = createLogger();
  try {
    const config = loadConfig(env);
    logger = createLogger(config.logLevel);
    logger.debug("cli", `Credentials loaded; using ${config.gemini.modelName}`);

    await runPipeline(
      {
        username,
        maxItems: args.limit ?? config.collector.maxItems,
        outputPath: args.output ?? defaultOutputPath(username),
        rawOutputPath: args.raw,
      },
      createPipelineDeps(config, logger)
    );
    return EXIT_OK;
  } catch (error) {
    if (error instanceof PersonaCardError) {
      logger.error("cli", `❌ ${error.message}`);
      if (error.cause !== undefined) {
        logger.debug("cli", "Caused by", error.cause);
      }
      return EXIT_FAILURE;
    }
    logger.error("cli", "❌ Unexpected failure", error);
    return EXIT_FAILURE;
  }
}
