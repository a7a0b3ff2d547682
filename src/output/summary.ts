import chalk from "chalk";
import boxen from "boxen";
import type { ActivityRecord } from "../types.js";
import { formatHours, formatNumber } from "../utils/format.js";

export interface GroupTotal {
  group: string;
  subgroup: string | null;
  seconds: number;
}

export interface DayTotal {
  day: string;
  seconds: number;
}

export interface DatasetSummary {
  rowCount: number;
  firstDate: string | null;
  lastDate: string | null;
  totalSeconds: number;
  byGroup: GroupTotal[];
  topDays: DayTotal[];
}

export function summarizeDataset(
  records: readonly ActivityRecord[],
  topDayCount = 5
): DatasetSummary {
  let firstDate: string | null = null;
  let lastDate: string | null = null;
  let totalSeconds = 0;
  const groups = new Map<string, GroupTotal>();
  const days = new Map<string, number>();

  for (const record of records) {
    if (firstDate === null || record.date < firstDate) firstDate = record.date;
    if (lastDate === null || record.date > lastDate) lastDate = record.date;
    totalSeconds += record.timeSpentSeconds;

    const key = `${record.group}\u0000${record.subgroup ?? ""}`;
    const total = groups.get(key);
    if (total) {
      total.seconds += record.timeSpentSeconds;
    } else {
      groups.set(key, {
        group: record.group,
        subgroup: record.subgroup,
        seconds: record.timeSpentSeconds,
      });
    }

    const day = record.date.slice(0, 10);
    days.set(day, (days.get(day) ?? 0) + record.timeSpentSeconds);
  }

  const byGroup = [...groups.values()].sort((a, b) => b.seconds - a.seconds);
  const topDays = [...days.entries()]
    .map(([day, seconds]) => ({ day, seconds }))
    .sort((a, b) => b.seconds - a.seconds || a.day.localeCompare(b.day))
    .slice(0, topDayCount);

  return { rowCount: records.length, firstDate, lastDate, totalSeconds, byGroup, topDays };
}

function renderBar(value: number, maxValue: number, width: number): string {
  const filled = maxValue > 0 ? Math.round((value / maxValue) * width) : 0;
  return chalk.cyan("█".repeat(filled)) + chalk.dim("░".repeat(width - filled));
}

export function renderSummary(title: string, summary: DatasetSummary): string {
  if (summary.rowCount === 0) {
    return boxen(chalk.dim("No rows"), {
      title,
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      borderStyle: "round",
      borderColor: "gray",
    });
  }

  const lines = [
    `${chalk.bold("Rows")}       ${formatNumber(summary.rowCount)}`,
    `${chalk.bold("From")}       ${summary.firstDate ?? "-"}`,
    `${chalk.bold("To")}         ${summary.lastDate ?? "-"}`,
    `${chalk.bold("Total")}      ${formatHours(summary.totalSeconds)}`,
  ];

  lines.push("", chalk.bold("By group"));
  const maxGroup = summary.byGroup[0]?.seconds ?? 0;
  const labels = summary.byGroup.map((c) =>
    c.subgroup ? `${c.group}/${c.subgroup}` : c.group
  );
  const labelWidth = Math.max(...labels.map((label) => label.length));
  summary.byGroup.forEach((total, i) => {
    lines.push(
      `  ${labels[i].padEnd(labelWidth)}  ${renderBar(total.seconds, maxGroup, 16)}  ${chalk.dim(formatHours(total.seconds))}`
    );
  });

  lines.push("", chalk.bold("Top days"));
  for (const day of summary.topDays) {
    lines.push(`  ${day.day}  ${chalk.dim(formatHours(day.seconds))}`);
  }

  return boxen(lines.join("\n"), {
    title,
    titleAlignment: "center",
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    margin: { top: 1, bottom: 0, left: 0, right: 0 },
    borderStyle: "round",
    borderColor: "cyan",
  });
}
