import type { BucketSet, Issue, PullRequest, RepoBucket } from "@weekreport/core";

function formatRepo(repoName: string): string {
  return `-   **${repoName}**`;
}

function formatIssue(issue: Issue): string {
  return `    -   [${issue.title}](${issue.url})`;
}

function mergedSuffix(pullRequest: PullRequest): string {
  if (pullRequest.merged === undefined) {
    return "";
  }
  return pullRequest.merged ? " [merged]" : " [not merged]";
}

function formatPullRequest(pullRequest: PullRequest): string {
  return `    -   [${pullRequest.title}](${pullRequest.url})${mergedSuffix(pullRequest)}`;
}

export function sortRepoNames<TItem>(bucket: RepoBucket<TItem>): string[] {
  return Array.from(bucket.keys()).sort((a, b) => a.localeCompare(b));
}

export function sortByNumber<TItem extends { number: number }>(items: Iterable<TItem>): TItem[] {
  return Array.from(items).sort((a, b) => a.number - b.number);
}

function formatSection<TItem extends { number: number }>(
  heading: string,
  bucket: RepoBucket<TItem>,
  formatItem: (item: TItem) => string
): string | null {
  if (bucket.size === 0) {
    return null;
  }

  const lines = [`### ${heading}`, ""];
  for (const repoName of sortRepoNames(bucket)) {
    lines.push(formatRepo(repoName), "");
    for (const item of sortByNumber(bucket.get(repoName)?.values() ?? [])) {
      lines.push(formatItem(item));
    }
    lines.push("");
  }
  return lines.join("\n");
}

export function renderActivityReport(buckets: BucketSet): string {
  const sections = [
    formatSection("Opened issues", buckets.openedIssues, formatIssue),
    formatSection("Closed issues", buckets.closedIssues, formatIssue),
    formatSection("Commented issues", buckets.commentedIssues, formatIssue),
    formatSection("Pull requests opened", buckets.openedPullRequests, formatPullRequest),
    formatSection("Pull requests closed", buckets.closedPullRequests, formatPullRequest),
    formatSection("Code reviews", buckets.reviewedPullRequests, formatPullRequest)
  ].filter((section): section is string => section !== null);

  // Every section ends in a newline, so one more between them leaves a blank line.
  return sections.join("\n");
}
