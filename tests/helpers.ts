import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { ActivityQuery, ActivityRecord, ActivityRow, ActivitySource, PipelineConfig } from "../src/types.js";
import { parseConfig } from "../src/utils/config.js";
import type { Logger } from "../src/utils/logger.js";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "rtpipe-test-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Two groups with subgroups, one domain without a subgroup, one subgroup
 * with no domains, and the `all` aggregate, all under `outputDir`.
 */
export function sampleRawConfig(outputDir: string) {
  return {
    dates: { start_date: "2023-01-01", end_date: "2023-08-15" },
    domains: [
      { name: "graphext.com", group: "work", subgroup: "graphext" },
      { name: "github.com", group: "work" },
      { name: "x.com", group: "social", subgroup: "twitter" },
      { name: "twitter.com", group: "social", subgroup: "twitter" },
    ],
    groups: [
      { name: "work", output_dir: outputDir, output_file: "work_history.parquet" },
      { name: "social", output_dir: outputDir, output_file: "social_history.parquet" },
      { name: "graphext", parent: "work", output_dir: outputDir, output_file: "graphext_history.parquet" },
      { name: "twitter", parent: "social", output_dir: outputDir, output_file: "twitter_history.parquet" },
      { name: "reading", parent: "social", output_dir: outputDir, output_file: "reading_history.parquet" },
      { name: "all", output_dir: outputDir, output_file: "all_domains_history.parquet" },
    ],
    settings: { chunk_months: 3 },
  };
}

export function sampleConfig(outputDir: string): PipelineConfig {
  return parseConfig(sampleRawConfig(outputDir));
}

/** Two rows per request: one on the first day of the chunk, one on the last. */
export function rowsFor(query: ActivityQuery): ActivityRow[] {
  return [
    {
      date: `${query.startDate}T09:00:00`,
      timeSpentSeconds: 600,
      numberOfPeople: 1,
      activity: query.domain,
      category: "General",
      productivity: 2,
    },
    {
      date: `${query.endDate}T17:00:00`,
      timeSpentSeconds: 300,
      numberOfPeople: 1,
      activity: query.domain,
      category: "General",
      productivity: 2,
    },
  ];
}

export interface FakeSource extends ActivitySource {
  calls: ActivityQuery[];
}

export function createFakeSource(shouldFail?: (query: ActivityQuery) => boolean): FakeSource {
  const calls: ActivityQuery[] = [];
  return {
    calls,
    async fetchActivity(query) {
      calls.push(query);
      if (shouldFail?.(query)) {
        throw new Error(`simulated outage for ${query.domain}`);
      }
      return rowsFor(query);
    },
  };
}

export function makeRecord(overrides: Partial<ActivityRecord> = {}): ActivityRecord {
  return {
    date: "2023-01-01T09:00:00",
    timeSpentSeconds: 600,
    numberOfPeople: 1,
    activity: "graphext.com",
    category: "General",
    productivity: 2,
    domain: "graphext.com",
    group: "work",
    subgroup: "graphext",
    ...overrides,
  };
}

export interface RecordingLogger extends Logger {
  warnings: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  return {
    warnings,
    step() {},
    info() {},
    success() {},
    warn(message) {
      warnings.push(message);
    },
    error() {},
    dim() {},
  };
}
