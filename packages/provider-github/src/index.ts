import { Octokit } from "@octokit/rest";
import { z } from "zod";
import {
  MalformedEventError,
  TransportError,
  WeekreportError,
  formatError,
  isWithinWindow,
  type ActivityEvent,
  type EventPage,
  type Issue,
  type PullRequest,
  type PullRequestLookup,
  type TimeWindow
} from "@weekreport/core";

const githubUserSchema = z.object({ login: z.string() }).nullish();

const githubIssueSchema = z.object({
  number: z.number().int(),
  title: z.string().optional(),
  html_url: z.string().optional(),
  user: githubUserSchema,
  pull_request: z.unknown().optional()
});

const githubPullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string().optional(),
  html_url: z.string().optional(),
  state: z.string().optional(),
  merged: z.boolean().nullish()
});

export const githubEventSchema = z.object({
  id: z.string(),
  type: z.string().nullable(),
  repo: z.object({ name: z.string() }),
  created_at: z.string().nullable(),
  payload: z.unknown()
});

// Only the payloads of tracked event types are read.
const githubEventPayloadSchema = z.object({
  action: z.string().nullish(),
  issue: githubIssueSchema.nullish(),
  pull_request: githubPullRequestSchema.nullish()
});

const githubEventTimestampSchema = z.object({ created_at: z.string().nullish() });

const TRACKED_EVENT_TYPES = new Set([
  "IssueCommentEvent",
  "IssuesEvent",
  "PullRequestEvent",
  "PullRequestReviewCommentEvent"
]);

export type GithubIssue = z.infer<typeof githubIssueSchema>;
export type GithubPullRequest = z.infer<typeof githubPullRequestSchema>;
export type GithubEvent = z.infer<typeof githubEventSchema>;

export interface GithubEventsResponse {
  events: unknown[];
  link?: string;
}

export interface GithubActivityApi {
  listUserEvents(params: { username: string; page: number; perPage: number }): Promise<GithubEventsResponse>;
  getPullRequest(params: { owner: string; repo: string; pullNumber: number }): Promise<GithubPullRequest>;
  getAuthenticatedLogin(): Promise<string>;
}

export interface GithubActivityClientOptions {
  token?: string;
  userAgent?: string;
  perPage?: number;
  api?: GithubActivityApi;
}

export interface PageLinks {
  nextPage?: number;
  lastPage?: number;
}

const DEFAULT_PER_PAGE = 100;

function parseRepoRef(repoRef: string): { owner: string; repo: string } {
  const parts = repoRef.trim().split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new MalformedEventError(`Invalid repo reference: ${repoRef}. Expected owner/repo.`);
  }

  return { owner: parts[0], repo: parts[1] };
}

function itemHtmlUrl(repoName: string, number: number, isPullRequest: boolean): string {
  return `https://github.com/${repoName}/${isPullRequest ? "pull" : "issues"}/${number}`;
}

/** Reads `page` numbers out of a `Link: <...?page=2>; rel="next", <...?page=5>; rel="last"` header. */
export function parsePageLinks(linkHeader: string | undefined): PageLinks {
  const links: PageLinks = {};
  if (!linkHeader) {
    return links;
  }

  for (const part of linkHeader.split(",")) {
    const [rawUrl, ...params] = part
      .trim()
      .split(";")
      .map((segment) => segment.trim());
    const url = rawUrl?.match(/^<(.+)>$/)?.[1];
    const rel = params.find((param) => param.startsWith("rel="))?.slice(4).replace(/"/g, "");
    if (!url || (rel !== "next" && rel !== "last")) {
      continue;
    }

    const page = Number(new URL(url).searchParams.get("page"));
    if (!Number.isInteger(page)) {
      continue;
    }
    if (rel === "next") {
      links.nextPage = page;
    } else {
      links.lastPage = page;
    }
  }

  return links;
}

export function normalizeGithubIssue(repoName: string, issue: GithubIssue): Issue {
  const isPullRequest = issue.pull_request !== undefined && issue.pull_request !== null;
  return {
    number: issue.number,
    title: issue.title ?? `#${issue.number}`,
    url: issue.html_url ?? itemHtmlUrl(repoName, issue.number, isPullRequest),
    isPullRequest,
    ...(issue.user?.login ? { authorLogin: issue.user.login } : {})
  };
}

export function normalizeGithubPullRequest(repoName: string, pullRequest: GithubPullRequest): PullRequest {
  const merged =
    pullRequest.state !== "open" && typeof pullRequest.merged === "boolean" ? pullRequest.merged : undefined;
  return {
    number: pullRequest.number,
    title: pullRequest.title ?? `#${pullRequest.number}`,
    url: pullRequest.html_url ?? itemHtmlUrl(repoName, pullRequest.number, true),
    ...(merged === undefined ? {} : { merged })
  };
}

function parseEventPayload(event: GithubEvent): z.infer<typeof githubEventPayloadSchema> {
  const parsed = githubEventPayloadSchema.safeParse(event.payload ?? {});
  if (!parsed.success) {
    throw new MalformedEventError(
      `Unexpected payload for event ${event.id}:\n${formatError(parsed.error)}`,
      event.id
    );
  }
  return parsed.data;
}

export function normalizeGithubEvent(raw: unknown): ActivityEvent {
  const parsed = githubEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedEventError(`Unexpected event shape:\n${formatError(parsed.error)}`);
  }

  const event = parsed.data;
  const createdAt = new Date(event.created_at ?? Number.NaN);
  if (Number.isNaN(createdAt.getTime())) {
    throw new MalformedEventError(`Event ${event.id} has no valid created_at`, event.id);
  }

  const repoName = event.repo.name;
  const base = { id: event.id, createdAt, repoName };
  if (event.type === null || !TRACKED_EVENT_TYPES.has(event.type)) {
    return { ...base, payload: { kind: "Other", type: event.type ?? "unknown" } };
  }

  const payload = parseEventPayload(event);
  const action = payload.action ?? null;
  const issue = payload.issue ? normalizeGithubIssue(repoName, payload.issue) : null;
  const pullRequest = payload.pull_request ? normalizeGithubPullRequest(repoName, payload.pull_request) : null;

  switch (event.type) {
    case "IssueCommentEvent":
      return { ...base, payload: { kind: "IssueComment", action, issue } };
    case "IssuesEvent":
      return { ...base, payload: { kind: "Issues", action, issue } };
    case "PullRequestEvent":
      return { ...base, payload: { kind: "PullRequest", action, pullRequest } };
    default:
      return { ...base, payload: { kind: "PullRequestReviewComment", action, pullRequest } };
  }
}

/** An event without a readable `created_at` never falls inside a window. */
export function isRawEventInWindow(raw: unknown, window: TimeWindow): boolean {
  const parsed = githubEventTimestampSchema.safeParse(raw);
  if (!parsed.success || !parsed.data.created_at) {
    return false;
  }
  return isWithinWindow(new Date(parsed.data.created_at), window);
}

function readStatus(error: object): number | undefined {
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function formatProviderError(error: unknown, target: string): Error {
  if (error instanceof WeekreportError) {
    return error;
  }

  if (error && typeof error === "object") {
    const status = readStatus(error);
    const message = error instanceof Error ? error.message : "";
    const lower = message.toLowerCase();

    if (status === 403 && lower.includes("rate limit")) {
      return new TransportError(
        `GitHub rate limit reached for ${target}. Retry later or provide a token with -token or $GITHUB_TOKEN.`,
        status,
        { cause: error }
      );
    }

    if (status === 401) {
      return new TransportError(`GitHub authentication failed for ${target}. Check the token value.`, status, {
        cause: error
      });
    }

    if (status === 404) {
      return new TransportError(`GitHub could not find ${target}.`, status, { cause: error });
    }

    if (message) {
      return new TransportError(`GitHub request failed for ${target}: ${message}`, status, { cause: error });
    }
  }

  return new TransportError(`GitHub request failed for ${target}: ${String(error)}`, undefined, { cause: error });
}

class OctokitGithubActivityApi implements GithubActivityApi {
  constructor(private readonly octokit: Octokit) {}

  async listUserEvents(params: { username: string; page: number; perPage: number }): Promise<GithubEventsResponse> {
    // GET /users/{username}/events includes private activity when the token can see it.
    const response = await this.octokit.rest.activity.listEventsForAuthenticatedUser({
      username: params.username,
      page: params.page,
      per_page: params.perPage
    });

    return {
      events: response.data,
      ...(response.headers.link ? { link: response.headers.link } : {})
    };
  }

  async getPullRequest(params: { owner: string; repo: string; pullNumber: number }): Promise<GithubPullRequest> {
    const { data } = await this.octokit.rest.pulls.get({
      owner: params.owner,
      repo: params.repo,
      pull_number: params.pullNumber
    });

    return {
      number: data.number,
      title: data.title,
      html_url: data.html_url,
      state: data.state,
      merged: data.merged
    };
  }

  async getAuthenticatedLogin(): Promise<string> {
    const { data } = await this.octokit.rest.users.getAuthenticated();
    return data.login;
  }
}

export function createGithubActivityApi(token?: string, userAgent = "weekreport/0.1.0"): GithubActivityApi {
  const octokit = new Octokit({ ...(token ? { auth: token } : {}), userAgent });
  return new OctokitGithubActivityApi(octokit);
}

export class GithubActivityClient implements PullRequestLookup {
  private readonly api: GithubActivityApi;
  private readonly perPage: number;

  constructor(options: GithubActivityClientOptions = {}) {
    this.api = options.api ?? createGithubActivityApi(options.token, options.userAgent);
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
  }

  /** With a `window`, events outside it are dropped before their payload is validated. */
  async fetchEventPage(username: string, page: number, window?: TimeWindow): Promise<EventPage> {
    let response: GithubEventsResponse;
    try {
      response = await this.api.listUserEvents({ username, page, perPage: this.perPage });
    } catch (error: unknown) {
      throw formatProviderError(error, `events of user ${username}`);
    }

    const links = parsePageLinks(response.link);
    return {
      page,
      events: response.events
        .filter((raw) => window === undefined || isRawEventInWindow(raw, window))
        .map((raw) => normalizeGithubEvent(raw)),
      ...links
    };
  }

  async getPullRequest(repoName: string, number: number): Promise<PullRequest> {
    const { owner, repo } = parseRepoRef(repoName);
    try {
      const pullRequest = await this.api.getPullRequest({ owner, repo, pullNumber: number });
      return normalizeGithubPullRequest(repoName, pullRequest);
    } catch (error: unknown) {
      throw formatProviderError(error, `${repoName}#${number}`);
    }
  }

  async getAuthenticatedLogin(): Promise<string> {
    try {
      return await this.api.getAuthenticatedLogin();
    } catch (error: unknown) {
      throw formatProviderError(error, "the authenticated user");
    }
  }
}
