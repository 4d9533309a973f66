import { Octokit } from "@octokit/rest";
import type { Field, Item, ItemKind, ItemRepo } from "@weekly-status/core";
import {
  ARCHIVE_ITEM_MUTATION,
  ORGANIZATION_PROJECT_QUERY,
  PROJECT_ITEMS_QUERY,
  UNARCHIVE_ITEM_MUTATION,
  USER_PROJECT_QUERY
} from "./queries.js";

export interface GithubFieldRef {
  name?: string;
}

export type GithubFieldValue =
  | { __typename: "ProjectV2ItemFieldTextValue"; text: string | null; field: GithubFieldRef | null }
  | { __typename: "ProjectV2ItemFieldDateValue"; date: string | null; field: GithubFieldRef | null }
  | { __typename: "ProjectV2ItemFieldNumberValue"; number: number | null; field: GithubFieldRef | null }
  | { __typename: "ProjectV2ItemFieldSingleSelectValue"; name: string | null; field: GithubFieldRef | null }
  | {
      __typename: "ProjectV2ItemFieldIterationValue";
      duration: number;
      iterationId: string;
      startDate: string | null;
      title: string;
      field: GithubFieldRef | null;
    }
  | {
      __typename: "ProjectV2ItemFieldLabelValue";
      labels: { nodes: Array<{ name: string } | null> | null } | null;
    }
  | {
      __typename:
        | "ProjectV2ItemFieldMilestoneValue"
        | "ProjectV2ItemFieldPullRequestValue"
        | "ProjectV2ItemFieldRepositoryValue"
        | "ProjectV2ItemFieldReviewerValue"
        | "ProjectV2ItemFieldUserValue";
    };

export interface GithubRepository {
  name: string;
  nameWithOwner: string;
  url: string;
}

export type GithubItemContent =
  | { __typename: "DraftIssue"; title: string; updatedAt: string | null }
  | {
      __typename: "Issue";
      title: string;
      number: number;
      url: string;
      updatedAt: string | null;
      closedAt: string | null;
      repository: GithubRepository;
    }
  | {
      __typename: "PullRequest";
      title: string;
      number: number;
      url: string;
      updatedAt: string | null;
      closedAt: string | null;
      mergedAt: string | null;
      baseRefName: string;
      repository: GithubRepository;
    };

export interface GithubProjectItem {
  id: string;
  isArchived: boolean;
  type: "ISSUE" | "PULL_REQUEST" | "DRAFT_ISSUE" | "REDACTED";
  updatedAt: string;
  fieldValues: { nodes: Array<GithubFieldValue | null> };
  content: GithubItemContent | null;
}

export interface GithubProjectItemsPage {
  nodes: Array<GithubProjectItem | null>;
  pageInfo: { hasNextPage: boolean; endCursor: string | null };
}

export type ProjectOwnerType = "organization" | "user";

export interface ProjectRef {
  owner: string;
  ownerType: ProjectOwnerType;
  projectNumber: number;
}

export interface ProjectItemsParams {
  projectId: string;
  count: number;
  labelCount: number;
  fieldValueCount: number;
  after?: string;
}

export interface ProjectItemParams {
  projectId: string;
  itemId: string;
}

export interface GithubProjectApi {
  fetchProjectId(ref: ProjectRef): Promise<string | null>;
  listProjectItems(params: ProjectItemsParams): Promise<GithubProjectItemsPage>;
  archiveProjectItem(params: ProjectItemParams): Promise<void>;
  unarchiveProjectItem(params: ProjectItemParams): Promise<void>;
}

export type GraphqlRequestLogger = (operation: string, variables: Readonly<Record<string, unknown>>) => void;

export interface FetchTuning {
  /** Items per page; every page is fetched. */
  issueCount: number;
  /** Labels per item; not paged. */
  labelCount: number;
  /** Field values per item; not paged. */
  fieldValueCount: number;
}

export interface GithubProjectClientOptions {
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  api?: GithubProjectApi;
  onRequest?: GraphqlRequestLogger;
}

function toField(value: GithubFieldValue): Field | undefined {
  switch (value.__typename) {
    case "ProjectV2ItemFieldTextValue": {
      const name = value.field?.name;
      return name && value.text !== null ? { kind: "text", name, text: value.text } : undefined;
    }
    case "ProjectV2ItemFieldSingleSelectValue": {
      const name = value.field?.name;
      return name && value.name !== null ? { kind: "text", name, text: value.name } : undefined;
    }
    case "ProjectV2ItemFieldDateValue": {
      const name = value.field?.name;
      return name && value.date !== null ? { kind: "date", name, date: value.date } : undefined;
    }
    case "ProjectV2ItemFieldNumberValue": {
      const name = value.field?.name;
      return name && value.number !== null ? { kind: "number", name, number: value.number } : undefined;
    }
    case "ProjectV2ItemFieldIterationValue": {
      const name = value.field?.name;
      if (!name || value.startDate === null) {
        return undefined;
      }
      return {
        kind: "iteration",
        name,
        durationDays: value.duration,
        iterationId: value.iterationId,
        startDate: value.startDate,
        title: value.title
      };
    }
    default:
      return undefined;
  }
}

function toKind(node: GithubProjectItem): ItemKind {
  if (node.type === "ISSUE") {
    return "issue";
  }
  if (node.type === "PULL_REQUEST") {
    return "pull_request";
  }
  return "draft_issue";
}

function toRepo(repository: GithubRepository, branch: string): ItemRepo {
  return {
    name: repository.name,
    slug: repository.nameWithOwner,
    url: repository.url,
    branch
  };
}

function completionTimestamp(node: GithubProjectItem): string | undefined {
  const content = node.content;
  if (content?.__typename === "PullRequest") {
    return content.mergedAt ?? content.closedAt ?? content.updatedAt ?? node.updatedAt;
  }
  if (content?.__typename === "Issue") {
    return content.closedAt ?? content.updatedAt ?? node.updatedAt;
  }
  return content?.updatedAt ?? node.updatedAt;
}

export function normalizeProjectItem(node: GithubProjectItem): Item {
  const fields: Record<string, Field> = {};
  const labels: string[] = [];

  for (const value of node.fieldValues.nodes) {
    if (!value) {
      continue;
    }
    if (value.__typename === "ProjectV2ItemFieldLabelValue") {
      for (const label of value.labels?.nodes ?? []) {
        if (label?.name) {
          labels.push(label.name);
        }
      }
      continue;
    }
    const field = toField(value);
    if (field) {
      fields[field.name] = field;
    }
  }

  const content = node.content;
  if (!fields["Title"] && content?.title) {
    fields["Title"] = { kind: "text", name: "Title", text: content.title };
  }

  const completedAt = completionTimestamp(node);
  let repo: ItemRepo | undefined;
  if (content?.__typename === "Issue") {
    repo = toRepo(content.repository, "");
  } else if (content?.__typename === "PullRequest") {
    repo = toRepo(content.repository, content.baseRefName);
  }

  return {
    id: node.id,
    archived: node.isArchived,
    kind: toKind(node),
    number: content?.__typename === "Issue" || content?.__typename === "PullRequest" ? content.number : 0,
    url: content?.__typename === "Issue" || content?.__typename === "PullRequest" ? content.url : "",
    ...(completedAt ? { completedAt } : {}),
    ...(repo ? { repo } : {}),
    labels,
    fields
  };
}

function readStatus(error: object): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

function wrapGithubError(error: unknown, target: string): Error {
  const detail = error instanceof Error ? error.message : String(error);
  const status = error && typeof error === "object" ? readStatus(error) : undefined;

  switch (status) {
    case 401:
      return new Error(`GitHub rejected the token for ${target}. It needs read and write access to Projects.`);
    case 403:
      if (/rate limit/i.test(detail)) {
        return new Error(`GitHub rate limit reached for ${target}. Run again after the limit resets.`);
      }
      break;
    default:
      break;
  }

  return new Error(`GitHub request for ${target} failed: ${detail}`);
}

interface ProjectIdResponse {
  organization?: { projectV2: { id: string } | null } | null;
  user?: { projectV2: { id: string } | null } | null;
}

interface ProjectItemsResponse {
  node: { items?: GithubProjectItemsPage } | null;
}

class OctokitGithubProjectApi implements GithubProjectApi {
  constructor(
    private readonly octokit: Octokit,
    private readonly onRequest?: GraphqlRequestLogger
  ) {}

  async fetchProjectId(ref: ProjectRef): Promise<string | null> {
    const variables = { owner: ref.owner, number: ref.projectNumber };
    const isUser = ref.ownerType === "user";
    this.onRequest?.(isUser ? "UserProject" : "OrganizationProject", variables);

    const data = await this.octokit.graphql<ProjectIdResponse>(
      isUser ? USER_PROJECT_QUERY : ORGANIZATION_PROJECT_QUERY,
      variables
    );
    const owner = isUser ? data.user : data.organization;
    return owner?.projectV2?.id ?? null;
  }

  async listProjectItems(params: ProjectItemsParams): Promise<GithubProjectItemsPage> {
    const variables = {
      projectId: params.projectId,
      count: params.count,
      labelCount: params.labelCount,
      fieldValueCount: params.fieldValueCount,
      after: params.after ?? null
    };
    this.onRequest?.("ProjectItems", variables);

    const data = await this.octokit.graphql<ProjectItemsResponse>(PROJECT_ITEMS_QUERY, variables);
    const items = data.node?.items;
    if (!items) {
      throw new Error(`Node ${params.projectId} is not a ProjectV2.`);
    }
    return items;
  }

  async archiveProjectItem(params: ProjectItemParams): Promise<void> {
    const variables = { projectId: params.projectId, itemId: params.itemId };
    this.onRequest?.("ArchiveProjectItem", variables);
    await this.octokit.graphql(ARCHIVE_ITEM_MUTATION, variables);
  }

  async unarchiveProjectItem(params: ProjectItemParams): Promise<void> {
    const variables = { projectId: params.projectId, itemId: params.itemId };
    this.onRequest?.("UnarchiveProjectItem", variables);
    await this.octokit.graphql(UNARCHIVE_ITEM_MUTATION, variables);
  }
}

export function createGithubProjectApi(
  token: string,
  options: Pick<GithubProjectClientOptions, "baseUrl" | "userAgent" | "onRequest"> = {}
): GithubProjectApi {
  const octokit = new Octokit({
    auth: token,
    userAgent: options.userAgent ?? "weekly-status/0.1.0",
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {})
  });
  return new OctokitGithubProjectApi(octokit, options.onRequest);
}

function describeProject(ref: ProjectRef): string {
  return `${ref.owner} project #${ref.projectNumber}`;
}

export class GithubProjectClient {
  private readonly api: GithubProjectApi;

  constructor(options: GithubProjectClientOptions) {
    if (options.api) {
      this.api = options.api;
      return;
    }

    if (!options.token) {
      throw new Error("GithubProjectClient requires either `api` or `token`.");
    }

    this.api = createGithubProjectApi(options.token, options);
  }

  async resolveProjectId(ref: ProjectRef): Promise<string> {
    let id: string | null;
    try {
      id = await this.api.fetchProjectId(ref);
    } catch (error: unknown) {
      throw wrapGithubError(error, describeProject(ref));
    }

    if (!id) {
      throw new Error(`GitHub ${describeProject(ref)} was not found or is not accessible.`);
    }
    return id;
  }

  async fetchItems(projectId: string, tuning: FetchTuning): Promise<Item[]> {
    const items: Item[] = [];
    let after: string | undefined;

    try {
      while (true) {
        const page = await this.api.listProjectItems({
          projectId,
          count: tuning.issueCount,
          labelCount: tuning.labelCount,
          fieldValueCount: tuning.fieldValueCount,
          ...(after ? { after } : {})
        });

        for (const node of page.nodes) {
          if (node) {
            items.push(normalizeProjectItem(node));
          }
        }

        const next = page.pageInfo.endCursor;
        if (!page.pageInfo.hasNextPage || !next || next === after) {
          break;
        }
        after = next;
      }
    } catch (error: unknown) {
      throw wrapGithubError(error, `project ${projectId}`);
    }

    return items;
  }

  async archiveItems(projectId: string, itemIds: string[]): Promise<number> {
    for (const itemId of itemIds) {
      try {
        await this.api.archiveProjectItem({ projectId, itemId });
      } catch (error: unknown) {
        throw wrapGithubError(error, `item ${itemId}`);
      }
    }
    return itemIds.length;
  }

  async unarchiveItems(projectId: string, itemIds: string[]): Promise<number> {
    for (const itemId of itemIds) {
      try {
        await this.api.unarchiveProjectItem({ projectId, itemId });
      } catch (error: unknown) {
        throw wrapGithubError(error, `item ${itemId}`);
      }
    }
    return itemIds.length;
  }
}
