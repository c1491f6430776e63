import { MalformedEventError, throwIfCancelled } from "../errors.js";
import type {
  ActivityEvent,
  BucketSet,
  BucketStats,
  PullRequestLookup,
  RepoBucket,
  TimeWindow
} from "../types.js";
import { isWithinWindow } from "./time-window.js";

export interface ClassifyContext {
  window: TimeWindow;
  username: string;
  pullRequests: PullRequestLookup;
  signal?: AbortSignal;
}

const OPENED_PULL_REQUEST_ACTIONS = new Set(["created", "opened", "reopened"]);

export function createBucketSet(): BucketSet {
  return {
    openedIssues: new Map(),
    closedIssues: new Map(),
    commentedIssues: new Map(),
    openedPullRequests: new Map(),
    closedPullRequests: new Map(),
    reviewedPullRequests: new Map()
  };
}

function count<TItem>(bucket: RepoBucket<TItem>): number {
  return Array.from(bucket.values()).reduce((total, items) => total + items.size, 0);
}

export function countBuckets(buckets: BucketSet): BucketStats {
  return {
    openedIssues: count(buckets.openedIssues),
    closedIssues: count(buckets.closedIssues),
    commentedIssues: count(buckets.commentedIssues),
    openedPullRequests: count(buckets.openedPullRequests),
    closedPullRequests: count(buckets.closedPullRequests),
    reviewedPullRequests: count(buckets.reviewedPullRequests)
  };
}

function record<TItem extends { number: number }>(bucket: RepoBucket<TItem>, repoName: string, item: TItem): void {
  let items = bucket.get(repoName);
  if (!items) {
    items = new Map();
    bucket.set(repoName, items);
  }
  items.set(item.number, item);
}

function requireAction(event: ActivityEvent, action: string | null): string {
  if (action === null) {
    throw new MalformedEventError(`Event ${event.id} in ${event.repoName} has no action`, event.id);
  }
  return action;
}

function requireReference<T>(event: ActivityEvent, value: T | null, what: string): T {
  if (value === null) {
    throw new MalformedEventError(`Event ${event.id} in ${event.repoName} has no ${what}`, event.id);
  }
  return value;
}

function isSameLogin(a: string | undefined, b: string): boolean {
  return a !== undefined && a.toLowerCase() === b.toLowerCase();
}

export async function classifyEvent(
  event: ActivityEvent,
  ctx: ClassifyContext,
  buckets: BucketSet
): Promise<void> {
  if (!isWithinWindow(event.createdAt, ctx.window)) {
    return;
  }

  const payload = event.payload;
  switch (payload.kind) {
    case "IssueComment": {
      const issue = requireReference(event, payload.issue, "issue");
      const action = requireAction(event, payload.action);
      if (action !== "created") {
        return;
      }

      if (!issue.isPullRequest) {
        record(buckets.commentedIssues, event.repoName, issue);
        return;
      }

      // A comment on somebody else's pull request counts as reviewing it.
      if (isSameLogin(issue.authorLogin, ctx.username)) {
        return;
      }
      throwIfCancelled(ctx.signal);
      const pullRequest = await ctx.pullRequests.getPullRequest(event.repoName, issue.number);
      record(buckets.reviewedPullRequests, event.repoName, pullRequest);
      return;
    }

    case "Issues": {
      const issue = requireReference(event, payload.issue, "issue");
      const action = requireAction(event, payload.action);
      if (action === "opened") {
        record(buckets.openedIssues, event.repoName, issue);
      } else if (action === "closed") {
        record(buckets.closedIssues, event.repoName, issue);
      }
      return;
    }

    case "PullRequest": {
      const pullRequest = requireReference(event, payload.pullRequest, "pull request");
      const action = requireAction(event, payload.action);
      if (OPENED_PULL_REQUEST_ACTIONS.has(action)) {
        record(buckets.openedPullRequests, event.repoName, pullRequest);
      } else if (action === "closed") {
        record(buckets.closedPullRequests, event.repoName, pullRequest);
      }
      return;
    }

    case "PullRequestReviewComment": {
      const pullRequest = requireReference(event, payload.pullRequest, "pull request");
      const action = requireAction(event, payload.action);
      if (action === "created") {
        record(buckets.reviewedPullRequests, event.repoName, pullRequest);
      }
      return;
    }

    default:
      return;
  }
}

/** Classifies events in the order given; later events overwrite earlier ones for the same item. */
export async function classifyEvents(
  events: Iterable<ActivityEvent>,
  ctx: ClassifyContext,
  buckets: BucketSet
): Promise<void> {
  for (const event of events) {
    await classifyEvent(event, ctx, buckets);
  }
}
