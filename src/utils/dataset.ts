import * as fs from "fs";
import * as path from "path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { z } from "zod";
import type { ActivityRecord } from "../types.js";

export const ACTIVITY_SCHEMA = new ParquetSchema({
  date: { type: "UTF8" },
  time_spent_seconds: { type: "INT32" },
  number_of_people: { type: "INT32" },
  activity: { type: "UTF8" },
  category: { type: "UTF8" },
  productivity: { type: "INT32" },
  domain: { type: "UTF8" },
  group: { type: "UTF8" },
  subgroup: { type: "UTF8", optional: true },
});

const parquetRowSchema = z.object({
  date: z.string(),
  time_spent_seconds: z.number(),
  number_of_people: z.number(),
  activity: z.string(),
  category: z.string(),
  productivity: z.number(),
  domain: z.string(),
  group: z.string(),
  subgroup: z.string().nullish(),
});

function toParquetRow(record: ActivityRecord): Record<string, string | number> {
  return {
    date: record.date,
    time_spent_seconds: record.timeSpentSeconds,
    number_of_people: record.numberOfPeople,
    activity: record.activity,
    category: record.category,
    productivity: record.productivity,
    domain: record.domain,
    group: record.group,
    // Optional columns are left out rather than set to null.
    ...(record.subgroup !== null ? { subgroup: record.subgroup } : {}),
  };
}

function fromParquetRow(row: z.infer<typeof parquetRowSchema>): ActivityRecord {
  return {
    date: row.date,
    timeSpentSeconds: row.time_spent_seconds,
    numberOfPeople: row.number_of_people,
    activity: row.activity,
    category: row.category,
    productivity: row.productivity,
    domain: row.domain,
    group: row.group,
    subgroup: row.subgroup ?? null,
  };
}

export function datasetExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Write records to a Parquet file, replacing whatever was there. The write is
 * not atomic: a crash part-way leaves a truncated file behind.
 */
export async function writeDataset(
  filePath: string,
  records: readonly ActivityRecord[]
): Promise<void> {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const writer = await ParquetWriter.openFile(ACTIVITY_SCHEMA, filePath);
  try {
    for (const record of records) {
      await writer.appendRow(toParquetRow(record));
    }
  } finally {
    await writer.close();
  }
}

export async function readDataset(filePath: string): Promise<ActivityRecord[]> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const cursor = reader.getCursor();
    const records: ActivityRecord[] = [];
    let row: unknown = await cursor.next();
    while (row) {
      records.push(fromParquetRow(parquetRowSchema.parse(row)));
      row = await cursor.next();
    }
    return records;
  } finally {
    await reader.close();
  }
}
