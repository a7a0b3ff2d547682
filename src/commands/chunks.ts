import chalk from "chalk";
import { generateDateChunks } from "../pipeline/chunker.js";
import { loadConfig } from "../utils/config.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { consoleLogger } from "../utils/logger.js";

export interface ChunksCommandOptions {
  config: string;
  chunkMonths?: string;
}

function parseChunkMonths(value: string): number {
  const months = Number(value);
  if (!Number.isInteger(months) || months < 1) {
    throw new ConfigError(`--chunk-months must be a positive integer, got '${value}'`);
  }
  return months;
}

/** Print the request windows a run would use, without calling the API. */
export async function runChunks(options: ChunksCommandOptions): Promise<void> {
  const logger = consoleLogger;

  try {
    const config = loadConfig(options.config, logger);
    const months = options.chunkMonths
      ? parseChunkMonths(options.chunkMonths)
      : config.settings.chunkMonths;

    console.log(
      chalk.bold(
        `\n${config.dates.startDate} to ${config.dates.endDate} in chunks of up to ${months} month${months !== 1 ? "s" : ""}\n`
      )
    );

    let count = 0;
    for (const chunk of generateDateChunks(config.dates, months)) {
      count++;
      console.log(`  ${chalk.cyan(String(count).padStart(3))}  ${chunk.startDate} → ${chunk.endDate}`);
    }

    const requests = count * config.domains.length;
    console.log(
      chalk.dim(
        `\n  ${count} chunks × ${config.domains.length} domains = ${requests} API requests per full fetch\n`
      )
    );
  } catch (error) {
    const message = error instanceof ConfigError ? `Configuration error: ${error.message}` : errorMessage(error);
    logger.error(message);
    process.exit(1);
  }
}
