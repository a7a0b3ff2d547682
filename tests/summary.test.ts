import { describe, it, expect } from "vitest";
import { renderSummary, summarizeDataset } from "../src/output/summary.js";
import { makeRecord } from "./helpers.js";

const records = [
  makeRecord({ date: "2023-01-01T09:00:00", timeSpentSeconds: 600 }),
  makeRecord({
    date: "2023-01-01T17:00:00",
    timeSpentSeconds: 300,
    domain: "github.com",
    subgroup: null,
  }),
  makeRecord({
    date: "2023-01-03T10:00:00",
    timeSpentSeconds: 1800,
    domain: "x.com",
    group: "social",
    subgroup: "twitter",
  }),
  makeRecord({ date: "2022-12-31T23:00:00", timeSpentSeconds: 120 }),
];

describe("summarizeDataset", () => {
  it("reports the date span, total time and time per group", () => {
    const summary = summarizeDataset(records);

    expect(summary.rowCount).toBe(4);
    expect(summary.firstDate).toBe("2022-12-31T23:00:00");
    expect(summary.lastDate).toBe("2023-01-03T10:00:00");
    expect(summary.totalSeconds).toBe(2820);
    expect(summary.byGroup).toEqual([
      { group: "social", subgroup: "twitter", seconds: 1800 },
      { group: "work", subgroup: "graphext", seconds: 720 },
      { group: "work", subgroup: null, seconds: 300 },
    ]);
  });

  it("ranks the busiest days", () => {
    expect(summarizeDataset(records, 2).topDays).toEqual([
      { day: "2023-01-03", seconds: 1800 },
      { day: "2023-01-01", seconds: 900 },
    ]);
  });

  it("breaks ties between days by date", () => {
    const tied = [
      makeRecord({ date: "2023-02-02T09:00:00", timeSpentSeconds: 60 }),
      makeRecord({ date: "2023-02-01T09:00:00", timeSpentSeconds: 60 }),
    ];
    expect(summarizeDataset(tied).topDays.map((day) => day.day)).toEqual([
      "2023-02-01",
      "2023-02-02",
    ]);
  });

  it("handles an empty dataset", () => {
    expect(summarizeDataset([])).toEqual({
      rowCount: 0,
      firstDate: null,
      lastDate: null,
      totalSeconds: 0,
      byGroup: [],
      topDays: [],
    });
  });
});

describe("renderSummary", () => {
  it("shows totals in hours and labels subgroups with their group", () => {
    const output = renderSummary("Group work", summarizeDataset(records));

    expect(output).toContain("Group work");
    expect(output).toContain("0.78h");
    expect(output).toContain("social/twitter");
    expect(output).toContain("2023-01-03");
  });

  it("renders an empty box for no rows", () => {
    expect(renderSummary("All domains", summarizeDataset([]))).toContain("No rows");
  });
});
