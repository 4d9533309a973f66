export type ItemKind = "issue" | "pull_request" | "draft_issue";

export type Weekday =
  | "sunday"
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday";

export type Field =
  | { kind: "empty"; name: string }
  | { kind: "text"; name: string; text: string }
  | { kind: "date"; name: string; date: string }
  | { kind: "number"; name: string; number: number }
  | {
      kind: "iteration";
      name: string;
      durationDays: number;
      iterationId: string;
      startDate: string;
      title: string;
    };

export interface ItemRepo {
  name: string;
  slug: string;
  url: string;
  /** Base branch of a pull request, empty for everything else. */
  branch: string;
}

export interface Item {
  id: string;
  archived: boolean;
  kind: ItemKind;
  number: number;
  url: string;
  completedAt?: string;
  repo?: ItemRepo;
  labels: string[];
  fields: Record<string, Field>;
}

export interface BranchRule {
  org: string;
  repo: string;
  branch: string;
}

export interface Match {
  labels: string[];
  prefixes: string[];
  branches: BranchRule[];
}

export interface SectionDefinition {
  name: string;
  renderOrder: number;
  omitIfEmpty: boolean;
  match: Match;
}

export interface UnclassifiedDefinition {
  name: string;
  renderOrder: number;
  omitIfEmpty: boolean;
}

export interface WeeklyWindow {
  start: Date;
  end: Date;
  items: Item[];
}

export interface SectionBucket {
  name: string;
  renderOrder: number;
  omitIfEmpty: boolean;
  unclassified: boolean;
  items: Item[];
}

export interface WeeklyReport extends WeeklyWindow {
  sections: Map<number, SectionBucket>;
  labels: Map<string, number>;
}

export interface ReportOptions {
  sections: SectionDefinition[];
  unclassified: UnclassifiedDefinition;
  anchorWeekday?: Weekday;
  includeEmptyWeeks?: boolean;
}
