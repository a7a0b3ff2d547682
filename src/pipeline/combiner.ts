import type {
  ActivityRecord,
  CombineMode,
  CombineSkips,
  Domain,
  GroupSpec,
  PipelineConfig,
} from "../types.js";
import {
  ALL_GROUP_NAME,
  findGroup,
  getDomainDatasetPath,
  getGroupOutputPath,
  getSubgroups,
  getTopLevelGroups,
} from "../utils/config.js";
import { datasetExists, readDataset, writeDataset } from "../utils/dataset.js";
import { CombineError, WriteError, describeContext, errorMessage } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface CombineResult {
  mode: CombineMode;
  name: string;
  outputPath: string;
  /** Domains whose datasets made it into the output, in config order. */
  included: string[];
  /** Domains left out because their dataset was missing or unreadable. */
  missing: string[];
  rowCount: number;
}

export interface SkippedAggregate {
  mode: CombineMode;
  name: string;
  reason: string;
}

export interface CombineReport {
  written: CombineResult[];
  skipped: SkippedAggregate[];
}

export interface CombineOptions extends CombineSkips {
  logger?: Logger;
  /** Called after each aggregate is written, with the rows it holds. */
  onCombined?: (result: CombineResult, records: readonly ActivityRecord[]) => void;
}

interface LoadedDatasets {
  records: ActivityRecord[];
  included: string[];
  missing: string[];
}

const MODE_LABELS: Record<CombineMode, string> = {
  subgroup: "subgroup",
  group: "group",
  all: "all domains",
};

async function loadDomainDataset(
  config: PipelineConfig,
  domain: Domain
): Promise<ActivityRecord[]> {
  const datasetPath = getDomainDatasetPath(config, domain);
  if (!datasetExists(datasetPath)) {
    throw new CombineError(`No dataset for domain '${domain.name}' at ${datasetPath}`, {
      domain: domain.name,
      path: datasetPath,
    });
  }
  try {
    return await readDataset(datasetPath);
  } catch (error) {
    throw new CombineError(
      `Could not read dataset for domain '${domain.name}' at ${datasetPath}: ${errorMessage(error)}`,
      { domain: domain.name, path: datasetPath }
    );
  }
}

/**
 * Concatenate per-domain datasets in the order given. Missing or unreadable
 * files are reported and left out.
 */
export async function loadDomainDatasets(
  config: PipelineConfig,
  domains: readonly Domain[],
  logger: Logger = silentLogger
): Promise<LoadedDatasets> {
  const loaded: LoadedDatasets = { records: [], included: [], missing: [] };

  for (const domain of domains) {
    try {
      const records = await loadDomainDataset(config, domain);
      loaded.records.push(...records);
      loaded.included.push(domain.name);
    } catch (error) {
      if (!(error instanceof CombineError)) throw error;
      logger.warn(`${error.message}. Leaving it out.`);
      loaded.missing.push(domain.name);
    }
  }

  return loaded;
}

async function combineInto(
  config: PipelineConfig,
  mode: CombineMode,
  group: GroupSpec,
  domains: readonly Domain[],
  options: CombineOptions,
  report: CombineReport
): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const label = mode === "all" ? MODE_LABELS.all : `${MODE_LABELS[mode]} '${group.name}'`;

  if (domains.length === 0) {
    const reason = `No domains found for ${label}`;
    logger.warn(`${reason}. Skipping.`);
    report.skipped.push({ mode, name: group.name, reason });
    return;
  }

  logger.step(`Combining ${label}`);
  const { records, included, missing } = await loadDomainDatasets(config, domains, logger);

  if (included.length === 0) {
    const reason = `No datasets found for ${label}`;
    logger.warn(`${reason}. Skipping.`);
    report.skipped.push({ mode, name: group.name, reason });
    return;
  }

  const outputPath = getGroupOutputPath(group);
  try {
    await writeDataset(outputPath, records);
  } catch (error) {
    const failure = new WriteError(`Could not write ${outputPath}: ${errorMessage(error)}`, {
      group: group.name,
      path: outputPath,
    });
    logger.warn(`${failure.message} (${describeContext(failure.context)}). Skipping ${label}.`);
    report.skipped.push({ mode, name: group.name, reason: failure.message });
    return;
  }

  const result: CombineResult = {
    mode,
    name: group.name,
    outputPath,
    included,
    missing,
    rowCount: records.length,
  };
  logger.success(
    `Combined ${included.length} of ${domains.length} domains into ${outputPath} (${records.length} rows)`
  );
  options.onCombined?.(result, records);
  report.written.push(result);
}

export async function combineSubgroups(
  config: PipelineConfig,
  options: CombineOptions = {},
  report: CombineReport = { written: [], skipped: [] }
): Promise<CombineReport> {
  for (const subgroup of getSubgroups(config)) {
    const domains = config.domains.filter((domain) => domain.subgroup === subgroup.name);
    await combineInto(config, "subgroup", subgroup, domains, options, report);
  }
  return report;
}

/**
 * A domain's subgroup is always a child of its group, so matching on `group`
 * covers both the group's direct domains and every domain of its subgroups.
 */
export async function combineGroups(
  config: PipelineConfig,
  options: CombineOptions = {},
  report: CombineReport = { written: [], skipped: [] }
): Promise<CombineReport> {
  for (const group of getTopLevelGroups(config)) {
    const domains = config.domains.filter((domain) => domain.group === group.name);
    await combineInto(config, "group", group, domains, options, report);
  }
  return report;
}

export async function combineAllDomains(
  config: PipelineConfig,
  options: CombineOptions = {},
  report: CombineReport = { written: [], skipped: [] }
): Promise<CombineReport> {
  const allGroup = findGroup(config, ALL_GROUP_NAME);
  if (!allGroup) {
    const reason = `No '${ALL_GROUP_NAME}' group in configuration`;
    (options.logger ?? silentLogger).warn(`${reason}. Skipping all-domains combination.`);
    report.skipped.push({ mode: "all", name: ALL_GROUP_NAME, reason });
    return report;
  }
  await combineInto(config, "all", allGroup, config.domains, options, report);
  return report;
}

/**
 * Regenerate the aggregates: subgroups, then top-level groups (when
 * `combine_by_group` is set), then all domains (when `combine_all` is set).
 * Each tier can also be skipped on its own.
 */
export async function combineDatasets(
  config: PipelineConfig,
  options: CombineOptions = {}
): Promise<CombineReport> {
  const logger = options.logger ?? silentLogger;
  const report: CombineReport = { written: [], skipped: [] };

  if (options.skipSubgroups) {
    logger.dim("Skipping subgroup combination");
  } else {
    await combineSubgroups(config, options, report);
  }

  if (!config.settings.combineByGroup) {
    logger.dim("Group combination disabled (combine_by_group: false)");
  } else if (options.skipGroups) {
    logger.dim("Skipping group combination");
  } else {
    await combineGroups(config, options, report);
  }

  if (!config.settings.combineAll) {
    logger.dim("All-domains combination disabled (combine_all: false)");
  } else if (options.skipAll) {
    logger.dim("Skipping all-domains combination");
  } else {
    await combineAllDomains(config, options, report);
  }

  return report;
}
