import * as fs from "fs";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  getApiKey,
  getDomainDatasetPath,
  getGroupOutputPath,
  getSubgroups,
  getTopLevelGroups,
  loadConfig,
  parseConfig,
} from "../src/utils/config.js";
import { ConfigError } from "../src/utils/errors.js";
import {
  createRecordingLogger,
  makeTempDir,
  removeDir,
  sampleConfig,
  sampleRawConfig,
} from "./helpers.js";

type SampleRaw = ReturnType<typeof sampleRawConfig>;
type InvalidCase = [label: string, mutate: (raw: SampleRaw) => unknown, message: string];

const invalidCases: InvalidCase[] = [
  [
    "an unknown group",
    (raw) => ({ ...raw, domains: [{ name: "a.com", group: "missing" }] }),
    "Domain 'a.com' references unknown group 'missing'",
  ],
  [
    "an unknown subgroup",
    (raw) => ({ ...raw, domains: [{ name: "a.com", group: "work", subgroup: "missing" }] }),
    "Domain 'a.com' references unknown subgroup 'missing'",
  ],
  [
    "a subgroup under the wrong parent",
    (raw) => ({ ...raw, domains: [{ name: "a.com", group: "work", subgroup: "twitter" }] }),
    "Subgroup 'twitter' is not a child of group 'work'",
  ],
  [
    "a subgroup used as a domain's group",
    (raw) => ({ ...raw, domains: [{ name: "a.com", group: "twitter" }] }),
    "Domain 'a.com' uses subgroup 'twitter' as its group",
  ],
  [
    "two domains sharing a dataset file",
    (raw) => ({
      ...raw,
      domains: [
        { name: "a b", group: "work" },
        { name: "a_b", group: "social" },
      ],
    }),
    "Domains 'a b' and 'a_b' would both be saved to",
  ],
  [
    "an unknown parent group",
    (raw) => ({
      ...raw,
      groups: [
        ...raw.groups,
        { name: "orphan", parent: "nowhere", output_dir: "out", output_file: "o.parquet" },
      ],
    }),
    "Group 'orphan' references unknown parent group 'nowhere'",
  ],
  [
    "a duplicate group",
    (raw) => ({ ...raw, groups: [...raw.groups, raw.groups[0]] }),
    "Group 'work' is declared more than once",
  ],
  [
    "a duplicate domain",
    (raw) => ({ ...raw, domains: [...raw.domains, { name: "x.com", group: "social" }] }),
    "Domain 'x.com' is listed more than once",
  ],
  [
    "a domain in the reserved group",
    (raw) => ({ ...raw, domains: [{ name: "a.com", group: "all" }] }),
    "reserved 'all' group",
  ],
  [
    "an end date before the start date",
    (raw) => ({ ...raw, dates: { start_date: "2023-05-01", end_date: "2023-04-01" } }),
    "Invalid date range",
  ],
  [
    "a missing section",
    (raw) => ({ dates: raw.dates, domains: raw.domains }),
    "groups",
  ],
  [
    "a non-positive chunk size",
    (raw) => ({ ...raw, settings: { chunk_months: 0 } }),
    "settings.chunk_months",
  ],
];

describe("parseConfig", () => {
  it("resolves domains, the group hierarchy and default settings", () => {
    const raw = sampleRawConfig("out");
    const config = parseConfig({ ...raw, settings: undefined });

    expect(config.dates).toEqual({ startDate: "2023-01-01", endDate: "2023-08-15" });
    expect(config.settings).toEqual({
      chunkMonths: 3,
      detailedData: true,
      combineAll: true,
      combineByGroup: true,
    });
    expect(config.domains[1]).toEqual({ name: "github.com", group: "work", subgroup: null });
    expect(config.groups.find((g) => g.name === "social")?.subgroups).toEqual([
      "twitter",
      "reading",
    ]);
    expect(getTopLevelGroups(config).map((g) => g.name)).toEqual(["work", "social"]);
    expect(getSubgroups(config).map((g) => g.name)).toEqual(["graphext", "twitter", "reading"]);
  });

  it("returns a frozen value", () => {
    const config = sampleConfig("out");
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.domains)).toBe(true);
    expect(Object.isFrozen(config.domains[0])).toBe(true);
  });

  it("adds a default 'all' group with a warning when combine_all is on", () => {
    const raw = sampleRawConfig("out");
    const logger = createRecordingLogger();
    const config = parseConfig(
      { ...raw, groups: raw.groups.filter((g) => g.name !== "all") },
      logger
    );

    const allGroup = config.groups.find((g) => g.name === "all");
    expect(allGroup && getGroupOutputPath(allGroup)).toBe(
      path.join("rescuetime_data", "all_domains_history.parquet")
    );
    expect(logger.warnings).toHaveLength(1);
  });

  it("does not add an 'all' group when combine_all is off", () => {
    const raw = sampleRawConfig("out");
    const config = parseConfig({
      ...raw,
      groups: raw.groups.filter((g) => g.name !== "all"),
      settings: { combine_all: false },
    });
    expect(config.groups.some((g) => g.name === "all")).toBe(false);
  });

  it("accepts unquoted YAML dates", () => {
    const raw = sampleRawConfig("out");
    const config = parseConfig({
      ...raw,
      dates: { start_date: new Date("2023-01-01T00:00:00Z"), end_date: "2023-02-01" },
    });
    expect(config.dates.startDate).toBe("2023-01-01");
  });

  it.each(invalidCases)("rejects %s", (_label, mutate, message) => {
    const raw = mutate(sampleRawConfig("out"));
    expect(() => parseConfig(raw)).toThrow(ConfigError);
    expect(() => parseConfig(raw)).toThrow(message);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("reads a YAML file", () => {
    const configPath = path.join(dir, "config.yml");
    fs.writeFileSync(
      configPath,
      [
        "dates:",
        "  start_date: 2023-01-01",
        '  end_date: "2023-03-06"',
        "domains:",
        "  - name: graphext.com",
        "    group: work",
        "groups:",
        "  - name: work",
        "    output_dir: data",
        "    output_file: work_history.parquet",
        "settings:",
        "  chunk_months: 1",
        "  combine_all: false",
        "",
      ].join("\n")
    );

    const config = loadConfig(configPath);

    expect(config.dates).toEqual({ startDate: "2023-01-01", endDate: "2023-03-06" });
    expect(config.settings.chunkMonths).toBe(1);
    expect(config.settings.combineAll).toBe(false);
    expect(config.domains).toEqual([{ name: "graphext.com", group: "work", subgroup: null }]);
  });

  it("fails with a ConfigError when the file is missing", () => {
    expect(() => loadConfig(path.join(dir, "nope.yml"))).toThrow(ConfigError);
  });

  it("fails with a ConfigError on malformed YAML", () => {
    const configPath = path.join(dir, "broken.yml");
    fs.writeFileSync(configPath, "dates: [unclosed\n");
    expect(() => loadConfig(configPath)).toThrow(/Could not parse/);
  });

  it("fails with a ConfigError when the document is not a mapping", () => {
    const configPath = path.join(dir, "list.yml");
    fs.writeFileSync(configPath, "- just\n- a list\n");
    expect(() => loadConfig(configPath)).toThrow(/must contain a YAML mapping/);
  });
});

describe("getDomainDatasetPath", () => {
  it("uses the subgroup's directory, or the group's when there is no subgroup", () => {
    const raw = sampleRawConfig("out");
    const config = parseConfig({
      ...raw,
      groups: raw.groups.map((g) =>
        g.name === "graphext" ? { ...g, output_dir: "graphext-dir" } : g
      ),
    });

    expect(getDomainDatasetPath(config, config.domains[0])).toBe(
      path.join("graphext-dir", "domains", "graphext.com.parquet")
    );
    expect(getDomainDatasetPath(config, config.domains[1])).toBe(
      path.join("out", "domains", "github.com.parquet")
    );
  });

  it("replaces characters that are unsafe in file names", () => {
    const config = sampleConfig("out");
    const domain = { name: "example.com/docs", group: "work", subgroup: null };
    expect(getDomainDatasetPath(config, domain)).toBe(
      path.join("out", "domains", "example.com_docs.parquet")
    );
  });
});

describe("getApiKey", () => {
  it("reads RESCUETIME_API_KEY", () => {
    expect(getApiKey({ RESCUETIME_API_KEY: " test-key " })).toBe("test-key");
  });

  it("throws a ConfigError when it is missing", () => {
    expect(() => getApiKey({})).toThrow(ConfigError);
  });
});
