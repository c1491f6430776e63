export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface Issue {
  number: number;
  title: string;
  url: string;
  authorLogin?: string;
  isPullRequest: boolean;
}

export interface PullRequest {
  number: number;
  title: string;
  url: string;
  /** Absent while the pull request is open or its merge state is unknown. */
  merged?: boolean;
}

export type ActivityPayload =
  | { kind: "IssueComment"; action: string | null; issue: Issue | null }
  | { kind: "Issues"; action: string | null; issue: Issue | null }
  | { kind: "PullRequest"; action: string | null; pullRequest: PullRequest | null }
  | { kind: "PullRequestReviewComment"; action: string | null; pullRequest: PullRequest | null }
  | { kind: "Other"; type: string };

export interface ActivityEvent {
  id: string;
  createdAt: Date;
  repoName: string;
  payload: ActivityPayload;
}

export interface EventPage {
  page: number;
  events: ActivityEvent[];
  nextPage?: number;
  lastPage?: number;
}

export type RepoBucket<TItem> = Map<string, Map<number, TItem>>;

export interface BucketSet {
  openedIssues: RepoBucket<Issue>;
  closedIssues: RepoBucket<Issue>;
  commentedIssues: RepoBucket<Issue>;
  openedPullRequests: RepoBucket<PullRequest>;
  closedPullRequests: RepoBucket<PullRequest>;
  reviewedPullRequests: RepoBucket<PullRequest>;
}

export type BucketName = keyof BucketSet;

export type BucketStats = Record<BucketName, number>;

export interface PullRequestLookup {
  getPullRequest(repoName: string, number: number): Promise<PullRequest>;
}

export interface PipelineContext {
  window: TimeWindow;
  username: string;
  signal?: AbortSignal;
}
