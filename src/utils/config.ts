import * as fs from "fs";
import * as path from "path";
import { dump, load } from "js-yaml";
import { z } from "zod";
import type { Domain, GroupSpec, PipelineConfig, Settings } from "../types.js";
import { formatIsoDate, validateDateRange } from "../pipeline/chunker.js";
import { ConfigError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const DEFAULT_CONFIG_PATH = "config.yml";
export const ALL_GROUP_NAME = "all";

export const DEFAULT_SETTINGS: Settings = {
  chunkMonths: 3,
  detailedData: true,
  combineAll: true,
  combineByGroup: true,
};

const DEFAULT_ALL_GROUP: GroupSpec = {
  name: ALL_GROUP_NAME,
  outputDir: "rescuetime_data",
  outputFile: "all_domains_history.parquet",
  parent: null,
  subgroups: [],
};

// Unquoted YAML dates load as Date objects.
const isoDate = z
  .union([z.string(), z.date()])
  .transform((value) => (value instanceof Date ? formatIsoDate(value) : value))
  .pipe(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date"));

const nameField = z.string().trim().min(1);

const rawConfigSchema = z.object({
  dates: z.object({
    start_date: isoDate,
    end_date: isoDate,
  }),
  domains: z
    .array(
      z.object({
        name: nameField,
        group: nameField,
        subgroup: nameField.nullish(),
      })
    )
    .min(1, "at least one domain is required"),
  groups: z
    .array(
      z.object({
        name: nameField,
        parent: nameField.nullish(),
        output_dir: nameField,
        output_file: nameField,
      })
    )
    .min(1, "at least one group is required"),
  settings: z.preprocess(
    (value) => value ?? {},
    z.object({
      chunk_months: z.number().int().min(1).default(DEFAULT_SETTINGS.chunkMonths),
      detailed_data: z.boolean().default(DEFAULT_SETTINGS.detailedData),
      combine_all: z.boolean().default(DEFAULT_SETTINGS.combineAll),
      combine_by_group: z.boolean().default(DEFAULT_SETTINGS.combineByGroup),
    })
  ),
});

export type RawConfig = z.input<typeof rawConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  ${where}: ${issue.message}`;
    })
    .join("\n");
}

function resolveGroups(
  rawGroups: z.output<typeof rawConfigSchema>["groups"]
): GroupSpec[] {
  const seen = new Set<string>();
  for (const group of rawGroups) {
    if (seen.has(group.name)) {
      throw new ConfigError(`Group '${group.name}' is declared more than once`, {
        group: group.name,
      });
    }
    seen.add(group.name);
  }

  const byName = new Map(rawGroups.map((group) => [group.name, group]));

  for (const group of rawGroups) {
    const parentName = group.parent;
    if (!parentName) continue;
    const parent = byName.get(parentName);
    if (!parent) {
      throw new ConfigError(
        `Group '${group.name}' references unknown parent group '${parentName}'`,
        { group: group.name, parent: parentName }
      );
    }
    if (parent.parent) {
      throw new ConfigError(
        `Group '${group.name}' has parent '${parentName}', which is itself a subgroup`,
        { group: group.name, parent: parentName }
      );
    }
    if (group.name === ALL_GROUP_NAME || parentName === ALL_GROUP_NAME) {
      throw new ConfigError(`The '${ALL_GROUP_NAME}' group cannot take part in the hierarchy`, {
        group: group.name,
      });
    }
  }

  return rawGroups.map((group) => ({
    name: group.name,
    outputDir: group.output_dir,
    outputFile: group.output_file,
    parent: group.parent ?? null,
    subgroups: rawGroups
      .filter((child) => child.parent === group.name)
      .map((child) => child.name),
  }));
}

function resolveDomains(
  rawDomains: z.output<typeof rawConfigSchema>["domains"],
  groups: Map<string, GroupSpec>
): Domain[] {
  const seen = new Set<string>();
  const datasetOwners = new Map<string, string>();

  return rawDomains.map((raw) => {
    if (seen.has(raw.name)) {
      throw new ConfigError(`Domain '${raw.name}' is listed more than once`, {
        domain: raw.name,
      });
    }
    seen.add(raw.name);

    if (raw.group === ALL_GROUP_NAME || raw.subgroup === ALL_GROUP_NAME) {
      throw new ConfigError(
        `Domain '${raw.name}' cannot be assigned to the reserved '${ALL_GROUP_NAME}' group`,
        { domain: raw.name }
      );
    }

    const group = groups.get(raw.group);
    if (!group) {
      throw new ConfigError(`Domain '${raw.name}' references unknown group '${raw.group}'`, {
        domain: raw.name,
        group: raw.group,
      });
    }
    if (group.parent) {
      throw new ConfigError(
        `Domain '${raw.name}' uses subgroup '${raw.group}' as its group; set group: ${group.parent} and subgroup: ${raw.group}`,
        { domain: raw.name, group: raw.group }
      );
    }

    const subgroupName = raw.subgroup ?? null;
    if (subgroupName) {
      const subgroup = groups.get(subgroupName);
      if (!subgroup) {
        throw new ConfigError(
          `Domain '${raw.name}' references unknown subgroup '${subgroupName}'`,
          { domain: raw.name, subgroup: subgroupName }
        );
      }
      if (subgroup.parent !== raw.group) {
        throw new ConfigError(
          `Subgroup '${subgroupName}' is not a child of group '${raw.group}'`,
          { domain: raw.name, group: raw.group, subgroup: subgroupName }
        );
      }
    }

    const owner = groups.get(subgroupName ?? raw.group) ?? group;
    const datasetPath = domainDatasetPath(owner, raw.name);
    const clash = datasetOwners.get(datasetPath);
    if (clash) {
      throw new ConfigError(
        `Domains '${clash}' and '${raw.name}' would both be saved to ${datasetPath}`,
        { domain: raw.name, path: datasetPath }
      );
    }
    datasetOwners.set(datasetPath, raw.name);

    return { name: raw.name, group: raw.group, subgroup: subgroupName };
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a parsed YAML document and resolve it into a PipelineConfig.
 * Throws ConfigError on any shape or reference problem.
 */
export function parseConfig(raw: unknown, logger: Logger = silentLogger): PipelineConfig {
  const result = rawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  const data = result.data;

  const dates = { startDate: data.dates.start_date, endDate: data.dates.end_date };
  try {
    validateDateRange(dates);
  } catch (error) {
    throw new ConfigError(`Invalid date range: ${errorMessage(error)}`, { ...dates });
  }

  const settings: Settings = {
    chunkMonths: data.settings.chunk_months,
    detailedData: data.settings.detailed_data,
    combineAll: data.settings.combine_all,
    combineByGroup: data.settings.combine_by_group,
  };

  const groups = resolveGroups(data.groups);
  if (settings.combineAll && !groups.some((group) => group.name === ALL_GROUP_NAME)) {
    logger.warn(
      `combine_all is enabled but no '${ALL_GROUP_NAME}' group is defined. Using ${path.join(DEFAULT_ALL_GROUP.outputDir, DEFAULT_ALL_GROUP.outputFile)}`
    );
    groups.push({ ...DEFAULT_ALL_GROUP });
  }

  const domains = resolveDomains(
    data.domains,
    new Map(groups.map((group) => [group.name, group]))
  );

  return deepFreeze({ dates, domains, groups, settings });
}

export function configExists(configPath: string): boolean {
  return fs.existsSync(configPath);
}

export function loadConfig(configPath: string, logger: Logger = silentLogger): PipelineConfig {
  if (!configExists(configPath)) {
    throw new ConfigError(`Configuration file '${configPath}' not found`, { path: configPath });
  }

  let raw: unknown;
  try {
    raw = load(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not parse '${configPath}': ${errorMessage(error)}`, {
      path: configPath,
    });
  }

  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`Configuration file '${configPath}' must contain a YAML mapping`, {
      path: configPath,
    });
  }

  return parseConfig(raw, logger);
}

export function writeConfigFile(configPath: string, config: RawConfig): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(configPath, dump(config, { lineWidth: 100 }));
}

export function findGroup(config: PipelineConfig, groupName: string): GroupSpec | undefined {
  return config.groups.find((group) => group.name === groupName);
}

export function getGroup(config: PipelineConfig, groupName: string): GroupSpec {
  const group = findGroup(config, groupName);
  if (!group) {
    throw new ConfigError(`Unknown group '${groupName}'`, { group: groupName });
  }
  return group;
}

export function getTopLevelGroups(config: PipelineConfig): GroupSpec[] {
  return config.groups.filter(
    (group) => group.parent === null && group.name !== ALL_GROUP_NAME
  );
}

export function getSubgroups(config: PipelineConfig): GroupSpec[] {
  return config.groups.filter((group) => group.parent !== null);
}

export function getGroupOutputPath(group: GroupSpec): string {
  return path.join(group.outputDir, group.outputFile);
}

function toFileName(domainName: string): string {
  return domainName.replace(/[^A-Za-z0-9._-]/g, "_");
}

function domainDatasetPath(owner: GroupSpec, domainName: string): string {
  return path.join(owner.outputDir, "domains", `${toFileName(domainName)}.parquet`);
}

/**
 * Per-domain datasets live in a `domains/` directory under the output
 * directory of the domain's subgroup, or of its group when it has none.
 */
export function getDomainDatasetPath(config: PipelineConfig, domain: Domain): string {
  return domainDatasetPath(getGroup(config, domain.subgroup ?? domain.group), domain.name);
}

export function getApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.RESCUETIME_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError(
      "RESCUETIME_API_KEY is not set. Add it to your environment or a .env file"
    );
  }
  return apiKey;
}
