import { z } from "zod";
import type { ActivityQuery, ActivityRow, ActivitySource } from "../types.js";
import { FetchError, errorMessage } from "./errors.js";

export const RESCUETIME_API_URL = "https://www.rescuetime.com/anapi/data";
const REQUEST_TIMEOUT_MS = 60_000;

/** Columns searched for the domain name, in the order RescueTime may return them. */
const DOMAIN_COLUMNS = ["Document", "Activity", "Category", "Description"];

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const responseSchema = z.object({
  row_headers: z.array(z.string()),
  rows: z.array(z.array(cellSchema)),
});

type Cell = z.infer<typeof cellSchema>;

export interface RescueTimeClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export function buildActivityUrl(
  apiKey: string,
  query: ActivityQuery,
  baseUrl: string = RESCUETIME_API_URL
): string {
  const url = new URL(baseUrl);
  url.searchParams.set("key", apiKey);
  url.searchParams.set("perspective", "interval");
  url.searchParams.set("resolution_time", query.detailed ? "hour" : "day");
  url.searchParams.set("restrict_begin", query.startDate);
  url.searchParams.set("restrict_end", query.endDate);
  url.searchParams.set("format", "json");
  return url.toString();
}

function toText(cell: Cell | undefined): string {
  return cell === null || cell === undefined ? "" : String(cell);
}

function toNumber(cell: Cell | undefined, fallback: number): number {
  if (cell === null || cell === undefined || cell === "") return fallback;
  const value = typeof cell === "number" ? cell : Number(cell);
  return Number.isFinite(value) ? Math.round(value) : fallback;
}

/**
 * Turn the header/rows payload into ActivityRows, keeping only rows where the
 * domain appears (case-insensitively) in one of the descriptive columns.
 */
export function parseActivityResponse(payload: unknown, domain: string): ActivityRow[] {
  const { row_headers: headers, rows } = responseSchema.parse(payload);
  const column = (name: string) => headers.indexOf(name);

  const dateIndex = column("Date");
  const timeIndex = column("Time Spent (seconds)");
  if (dateIndex === -1 || timeIndex === -1) {
    throw new Error(`Response is missing Date or Time Spent columns (got: ${headers.join(", ")})`);
  }

  const searchIndexes = DOMAIN_COLUMNS.map(column).filter((index) => index !== -1);
  const needle = domain.toLowerCase();

  return rows
    .filter((row) =>
      searchIndexes.some((index) => toText(row[index]).toLowerCase().includes(needle))
    )
    .map((row) => ({
      date: toText(row[dateIndex]),
      timeSpentSeconds: toNumber(row[timeIndex], 0),
      numberOfPeople: toNumber(row[column("Number of People")], 1),
      activity: toText(row[column("Activity")]),
      category: toText(row[column("Category")]),
      productivity: toNumber(row[column("Productivity")], 0),
    }));
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 200);
  } catch (error) {
    return `(body unreadable: ${errorMessage(error)})`;
  }
}

export function createRescueTimeSource(
  apiKey: string,
  options: RescueTimeClientOptions = {}
): ActivitySource {
  const baseUrl = options.baseUrl ?? RESCUETIME_API_URL;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  return {
    async fetchActivity(query: ActivityQuery): Promise<ActivityRow[]> {
      const context = {
        domain: query.domain,
        startDate: query.startDate,
        endDate: query.endDate,
      };

      let response: Response;
      try {
        response = await fetch(buildActivityUrl(apiKey, query, baseUrl), {
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new FetchError(`Request to RescueTime failed: ${errorMessage(error)}`, context);
      }

      if (!response.ok) {
        const body = await readBody(response);
        throw new FetchError(
          `RescueTime responded with ${response.status} ${response.statusText}: ${body}`,
          { ...context, status: response.status }
        );
      }

      try {
        return parseActivityResponse(await response.json(), query.domain);
      } catch (error) {
        throw new FetchError(`Unexpected RescueTime response: ${errorMessage(error)}`, context);
      }
    },
  };
}
