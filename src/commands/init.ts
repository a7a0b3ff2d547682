import * as path from "path";
import chalk from "chalk";
import inquirer from "inquirer";
import { formatIsoDate, parseIsoDate } from "../pipeline/chunker.js";
import {
  ALL_GROUP_NAME,
  DEFAULT_CONFIG_PATH,
  DEFAULT_SETTINGS,
  configExists,
  parseConfig,
  writeConfigFile,
  type RawConfig,
} from "../utils/config.js";
import { errorMessage } from "../utils/errors.js";

export interface StarterAnswers {
  startDate: string;
  endDate: string;
  chunkMonths: number;
  outputDir: string;
  domain: string;
  group: string;
  subgroup: string;
}

function validateDate(input: string): true | string {
  try {
    parseIsoDate(input.trim());
    return true;
  } catch (error) {
    return errorMessage(error);
  }
}

function validateName(input: string): true | string {
  return /^[A-Za-z0-9._-]+$/.test(input.trim()) || "Use letters, numbers, dots, dashes or underscores";
}

/**
 * A config with one domain, its group, an optional subgroup and the `all`
 * aggregate, all writing to `outputDir`.
 */
export function buildStarterConfig(answers: StarterAnswers): RawConfig {
  const domain = answers.domain.trim();
  const group = answers.group.trim();
  const subgroup = answers.subgroup.trim();
  const outputDir = answers.outputDir.trim();

  const groups: RawConfig["groups"] = [
    {
      name: group,
      output_dir: outputDir,
      output_file: `${group}_history.parquet`,
    },
  ];
  if (subgroup) {
    groups.push({
      name: subgroup,
      parent: group,
      output_dir: outputDir,
      output_file: `${subgroup}_history.parquet`,
    });
  }
  groups.push({
    name: ALL_GROUP_NAME,
    output_dir: outputDir,
    output_file: "all_domains_history.parquet",
  });

  return {
    dates: { start_date: answers.startDate.trim(), end_date: answers.endDate.trim() },
    domains: [subgroup ? { name: domain, group, subgroup } : { name: domain, group }],
    groups,
    settings: {
      chunk_months: answers.chunkMonths,
      detailed_data: DEFAULT_SETTINGS.detailedData,
      combine_all: DEFAULT_SETTINGS.combineAll,
      combine_by_group: DEFAULT_SETTINGS.combineByGroup,
    },
  };
}

export async function runInit(configArg?: string): Promise<void> {
  const configPath = configArg && configArg.trim().length > 0 ? configArg : DEFAULT_CONFIG_PATH;

  console.log(chalk.bold("\nrtpipe - RescueTime pipeline setup\n"));

  if (configExists(configPath)) {
    console.log(chalk.yellow(`${configPath} already exists`));
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
      {
        type: "confirm",
        name: "overwrite",
        message: "Do you want to replace it?",
        default: false,
      },
    ]);
    if (!overwrite) {
      return;
    }
  }

  const today = formatIsoDate(new Date());

  const answers = await inquirer.prompt<Omit<StarterAnswers, "chunkMonths"> & { chunkMonths: string }>([
    {
      type: "input",
      name: "startDate",
      message: "Start date (YYYY-MM-DD):",
      validate: validateDate,
    },
    {
      type: "input",
      name: "endDate",
      message: "End date (YYYY-MM-DD):",
      default: today,
      validate: validateDate,
    },
    {
      type: "input",
      name: "chunkMonths",
      message: "Months per API request:",
      default: String(DEFAULT_SETTINGS.chunkMonths),
      validate: (input: string) =>
        /^[1-9]\d*$/.test(input.trim()) || "Enter a whole number of months (1 or more)",
    },
    {
      type: "input",
      name: "outputDir",
      message: "Output directory:",
      default: "rescuetime_data",
    },
    {
      type: "input",
      name: "domain",
      message: "First domain to track:",
      validate: validateName,
    },
    {
      type: "input",
      name: "group",
      message: "Its group:",
      default: "work",
      validate: validateName,
    },
    {
      type: "input",
      name: "subgroup",
      message: "Its subgroup (leave empty for none):",
      validate: (input: string) => input.trim() === "" || validateName(input),
    },
  ]);

  const starter = buildStarterConfig({
    ...answers,
    chunkMonths: Number(answers.chunkMonths.trim()),
  });

  try {
    parseConfig(starter);
  } catch (error) {
    console.log(chalk.red(errorMessage(error)));
    process.exit(1);
  }

  writeConfigFile(configPath, starter);

  console.log(chalk.green(`\nWrote ${path.resolve(configPath)}`));
  console.log(chalk.dim("\nNext steps:"));
  console.log(chalk.dim("  1. Put RESCUETIME_API_KEY=<your key> in .env"));
  console.log(chalk.dim(`  2. Add more domains and groups to ${configPath}`));
  console.log(chalk.dim(`  3. Run: rtpipe --config ${configPath}\n`));
}
