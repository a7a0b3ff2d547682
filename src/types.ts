export interface DateRange {
  readonly startDate: string;
  readonly endDate: string;
}

export type DateChunk = DateRange;

export interface Domain {
  readonly name: string;
  readonly group: string;
  readonly subgroup: string | null;
}

export interface GroupSpec {
  readonly name: string;
  readonly outputDir: string;
  readonly outputFile: string;
  readonly parent: string | null;
  /** Names of the groups that declare this one as their parent. */
  readonly subgroups: readonly string[];
}

export interface Settings {
  readonly chunkMonths: number;
  readonly detailedData: boolean;
  readonly combineAll: boolean;
  readonly combineByGroup: boolean;
}

export interface PipelineConfig {
  readonly dates: DateRange;
  readonly domains: readonly Domain[];
  readonly groups: readonly GroupSpec[];
  readonly settings: Settings;
}

export interface ActivityRow {
  date: string;
  timeSpentSeconds: number;
  numberOfPeople: number;
  activity: string;
  category: string;
  productivity: number;
}

export interface ActivityRecord extends ActivityRow {
  domain: string;
  group: string;
  subgroup: string | null;
}

export interface ActivityQuery {
  domain: string;
  startDate: string;
  endDate: string;
  detailed: boolean;
}

export interface ActivitySource {
  fetchActivity(query: ActivityQuery): Promise<ActivityRow[]>;
}

export type CombineMode = "subgroup" | "group" | "all";

export interface DomainFilter {
  domain?: string;
  group?: string;
  subgroup?: string;
}

export interface CombineSkips {
  skipSubgroups?: boolean;
  skipGroups?: boolean;
  skipAll?: boolean;
}
