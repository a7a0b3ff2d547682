import type {
  ActivityRecord,
  ActivityRow,
  ActivitySource,
  DateChunk,
  Domain,
  PipelineConfig,
} from "../types.js";
import { getDomainDatasetPath } from "../utils/config.js";
import { writeDataset } from "../utils/dataset.js";
import { FetchError, WriteError, describeContext, errorMessage } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { listDateChunks } from "./chunker.js";

export interface ChunkProgress {
  domain: Domain;
  chunk: DateChunk;
  /** 1-based position of the chunk. */
  index: number;
  total: number;
}

export interface DomainFetchResult {
  domain: Domain;
  outputPath: string;
  rowCount: number;
  chunkCount: number;
}

export interface DomainFetchFailure {
  domain: Domain;
  error: FetchError | WriteError;
}

export interface FetchReport {
  succeeded: DomainFetchResult[];
  failed: DomainFetchFailure[];
}

export interface FetchReporter {
  domainStarted(domain: Domain, index: number, total: number): void;
  chunkStarted(progress: ChunkProgress): void;
  domainFinished(result: DomainFetchResult): void;
  domainFailed(failure: DomainFetchFailure): void;
}

export interface FetchDomainOptions {
  source: ActivitySource;
  detailed: boolean;
  onChunk?: (progress: ChunkProgress) => void;
}

export interface FetchDomainsOptions {
  source: ActivitySource;
  reporter?: FetchReporter;
  logger?: Logger;
}

function describeDomain(domain: Domain): string {
  if (domain.subgroup) {
    return `'${domain.name}' (group: ${domain.group}, subgroup: ${domain.subgroup})`;
  }
  return `'${domain.name}' (group: ${domain.group})`;
}

export function createLoggingReporter(logger: Logger): FetchReporter {
  return {
    domainStarted(domain, index, total) {
      logger.step(`Processing domain ${index}/${total}: ${describeDomain(domain)}`);
    },
    chunkStarted({ chunk, index, total }) {
      logger.dim(`  Chunk ${index}/${total}: ${chunk.startDate} to ${chunk.endDate}`);
    },
    domainFinished(result) {
      logger.success(`  Saved ${result.rowCount} rows to ${result.outputPath}`);
    },
    domainFailed({ domain, error }) {
      logger.warn(
        `Fetch for domain '${domain.name}' aborted: ${error.message} (${describeContext(error.context)})`
      );
    },
  };
}

/**
 * Fetch every chunk for one domain, in order, and write the tagged rows to
 * `outputPath`. Any failing chunk aborts the domain before anything is
 * written, so a previous file at `outputPath` survives a failed fetch. A
 * failed write surfaces as a WriteError.
 */
export async function fetchDomain(
  domain: Domain,
  chunks: readonly DateChunk[],
  outputPath: string,
  options: FetchDomainOptions
): Promise<DomainFetchResult> {
  const records: ActivityRecord[] = [];

  for (const [position, chunk] of chunks.entries()) {
    options.onChunk?.({ domain, chunk, index: position + 1, total: chunks.length });

    let rows: ActivityRow[];
    try {
      rows = await options.source.fetchActivity({
        domain: domain.name,
        startDate: chunk.startDate,
        endDate: chunk.endDate,
        detailed: options.detailed,
      });
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(errorMessage(error), {
        domain: domain.name,
        startDate: chunk.startDate,
        endDate: chunk.endDate,
      });
    }

    for (const row of rows) {
      records.push({
        ...row,
        domain: domain.name,
        group: domain.group,
        subgroup: domain.subgroup,
      });
    }
  }

  try {
    await writeDataset(outputPath, records);
  } catch (error) {
    throw new WriteError(`Could not write ${outputPath}: ${errorMessage(error)}`, {
      domain: domain.name,
      path: outputPath,
    });
  }

  return { domain, outputPath, rowCount: records.length, chunkCount: chunks.length };
}

/**
 * Fetch the given domains one after another. A FetchError or WriteError only
 * aborts the domain it happened in; anything else is rethrown.
 */
export async function fetchDomains(
  config: PipelineConfig,
  domains: readonly Domain[],
  options: FetchDomainsOptions
): Promise<FetchReport> {
  const reporter = options.reporter ?? createLoggingReporter(options.logger ?? silentLogger);
  const chunks = listDateChunks(config.dates, config.settings.chunkMonths);
  const report: FetchReport = { succeeded: [], failed: [] };

  for (const [position, domain] of domains.entries()) {
    reporter.domainStarted(domain, position + 1, domains.length);
    try {
      const result = await fetchDomain(domain, chunks, getDomainDatasetPath(config, domain), {
        source: options.source,
        detailed: config.settings.detailedData,
        onChunk: (progress) => reporter.chunkStarted(progress),
      });
      reporter.domainFinished(result);
      report.succeeded.push(result);
    } catch (error) {
      if (!(error instanceof FetchError || error instanceof WriteError)) throw error;
      const failure = { domain, error };
      reporter.domainFailed(failure);
      report.failed.push(failure);
    }
  }

  return report;
}
