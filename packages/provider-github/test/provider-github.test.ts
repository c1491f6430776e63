import { readFile } from "node:fs/promises";
import { describe, expect, it, vi } from "vitest";
import { MalformedEventError, TransportError } from "@weekreport/core";
import type { GithubActivityApi, GithubPullRequest } from "../src/index.js";
import { GithubActivityClient, normalizeGithubEvent, parsePageLinks } from "../src/index.js";

async function loadFixture(name: string): Promise<unknown[]> {
  const url = new URL(`./fixtures/${name}`, import.meta.url);
  const raw = await readFile(url, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed : [];
}

function createApi(overrides: Partial<GithubActivityApi> = {}): GithubActivityApi {
  return {
    listUserEvents: async () => ({ events: [] }),
    getPullRequest: async (params) => ({ number: params.pullNumber }),
    getAuthenticatedLogin: async () => "octocat",
    ...overrides
  };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe("normalizeGithubEvent", () => {
  it("maps the supported event types onto activity payloads", async () => {
    const events = (await loadFixture("events.json")).map((raw) => normalizeGithubEvent(raw));

    expect(events.map((event) => event.payload.kind)).toEqual([
      "Issues",
      "IssueComment",
      "PullRequest",
      "PullRequestReviewComment",
      "Other",
      "PullRequest"
    ]);
    expect(events[0]).toEqual({
      id: "101",
      createdAt: new Date("2026-02-10T10:00:00Z"),
      repoName: "a/b",
      payload: {
        kind: "Issues",
        action: "opened",
        issue: {
          number: 5,
          title: "Crash on start",
          url: "https://github.com/a/b/issues/5",
          authorLogin: "octocat",
          isPullRequest: false
        }
      }
    });
    expect(events[1]?.payload).toMatchObject({
      kind: "IssueComment",
      issue: { number: 9, authorLogin: "hubot", isPullRequest: true }
    });
    expect(events[2]?.payload).toEqual({
      kind: "PullRequest",
      action: "closed",
      pullRequest: { number: 7, title: "Add retry flag", url: "https://github.com/c/d/pull/7", merged: true }
    });
    expect(events[4]?.payload).toEqual({ kind: "Other", type: "PushEvent" });
  });

  it("leaves the merge state unknown for open pull requests", async () => {
    const events = (await loadFixture("events.json")).map((raw) => normalizeGithubEvent(raw));
    expect(events[3]?.payload).toEqual({
      kind: "PullRequestReviewComment",
      action: "created",
      pullRequest: { number: 11, title: "Speed up parser", url: "https://github.com/c/d/pull/11" }
    });
  });

  it("fills in title and link for trimmed payloads", async () => {
    const events = (await loadFixture("events.json")).map((raw) => normalizeGithubEvent(raw));
    expect(events[5]?.payload).toEqual({
      kind: "PullRequest",
      action: "opened",
      pullRequest: { number: 12, title: "#12", url: "https://github.com/c/d/pull/12" }
    });
  });

  it("keeps a missing issue reference for the classifier to reject", () => {
    const event = normalizeGithubEvent({
      id: "201",
      type: "IssuesEvent",
      repo: { name: "a/b" },
      created_at: "2026-02-10T10:00:00Z",
      payload: { action: "opened" }
    });
    expect(event.payload).toEqual({ kind: "Issues", action: "opened", issue: null });
  });

  it("rejects events without a repository or timestamp", () => {
    expect(() =>
      normalizeGithubEvent({ id: "202", type: "IssuesEvent", created_at: "2026-02-10T10:00:00Z", payload: {} })
    ).toThrowError(MalformedEventError);
    expect(() =>
      normalizeGithubEvent({ id: "203", type: "IssuesEvent", repo: { name: "a/b" }, created_at: null, payload: {} })
    ).toThrowError("Event 203 has no valid created_at");
  });

  it("does not read the payload of untracked event types", () => {
    const event = normalizeGithubEvent({
      id: "204",
      type: "PushEvent",
      repo: { name: "a/b" },
      created_at: "2026-02-10T10:00:00Z",
      payload: { action: 42, issue: "not an issue" }
    });
    expect(event.payload).toEqual({ kind: "Other", type: "PushEvent" });
  });

  it("rejects a tracked event with an unexpected payload", () => {
    expect(() =>
      normalizeGithubEvent({
        id: "205",
        type: "IssuesEvent",
        repo: { name: "a/b" },
        created_at: "2026-02-10T10:00:00Z",
        payload: { action: "opened", issue: { number: "five" } }
      })
    ).toThrowError(/^Unexpected payload for event 205:/);
  });
});

describe("parsePageLinks", () => {
  it("reads next and last page numbers", () => {
    const header =
      '<https://api.github.com/user/1/events?per_page=100&page=2>; rel="next", ' +
      '<https://api.github.com/user/1/events?per_page=100&page=4>; rel="last"';
    expect(parsePageLinks(header)).toEqual({ nextPage: 2, lastPage: 4 });
  });

  it("ignores other relations and missing headers", () => {
    expect(parsePageLinks('<https://api.github.com/user/1/events?page=1>; rel="first"')).toEqual({});
    expect(parsePageLinks(undefined)).toEqual({});
  });
});

describe("GithubActivityClient", () => {
  it("fetches a page of events with its links", async () => {
    const events = await loadFixture("events.json");
    const listUserEvents = vi.fn(async () => ({
      events,
      link: '<https://api.github.com/user/1/events?page=2>; rel="next", <https://api.github.com/user/1/events?page=3>; rel="last"'
    }));
    const client = new GithubActivityClient({ api: createApi({ listUserEvents }) });

    const page = await client.fetchEventPage("octocat", 0);

    expect(listUserEvents).toHaveBeenCalledWith({ username: "octocat", page: 0, perPage: 100 });
    expect(page.page).toBe(0);
    expect(page.nextPage).toBe(2);
    expect(page.lastPage).toBe(3);
    expect(page.events).toHaveLength(6);
  });

  it("drops events outside the window before validating them", async () => {
    const listUserEvents = vi.fn(async () => ({
      events: [
        {
          id: "301",
          type: "IssuesEvent",
          repo: { name: "a/b" },
          created_at: "2026-02-10T10:00:00Z",
          payload: { action: "closed", issue: { number: 3, title: "Flaky test", html_url: "https://github.com/a/b/issues/3" } }
        },
        { id: "302", type: "IssuesEvent", repo: { name: "a/b" }, created_at: "2026-01-02T10:00:00Z", payload: { issue: 7 } },
        { id: "303", type: "IssuesEvent", created_at: null, payload: null }
      ]
    }));
    const client = new GithubActivityClient({ api: createApi({ listUserEvents }) });

    const page = await client.fetchEventPage("octocat", 0, {
      start: new Date("2026-02-07T00:00:00Z"),
      end: new Date("2026-02-14T00:00:00Z")
    });

    expect(page.events.map((event) => event.id)).toEqual(["301"]);
    expect(page.events[0]?.payload).toEqual({
      kind: "Issues",
      action: "closed",
      issue: { number: 3, title: "Flaky test", url: "https://github.com/a/b/issues/3", isPullRequest: false }
    });
  });

  it("looks up pull requests by repository and number", async () => {
    const getPullRequest = vi.fn(
      async (): Promise<GithubPullRequest> => ({
        number: 9,
        title: "Refactor cache",
        html_url: "https://github.com/a/b/pull/9",
        state: "closed",
        merged: false
      })
    );
    const client = new GithubActivityClient({ api: createApi({ getPullRequest }) });

    await expect(client.getPullRequest("a/b", 9)).resolves.toEqual({
      number: 9,
      title: "Refactor cache",
      url: "https://github.com/a/b/pull/9",
      merged: false
    });
    expect(getPullRequest).toHaveBeenCalledWith({ owner: "a", repo: "b", pullNumber: 9 });
  });

  it("wraps authentication failures", async () => {
    const client = new GithubActivityClient({
      api: createApi({
        listUserEvents: async () => {
          throw httpError(401, "Bad credentials");
        }
      })
    });

    const failure = client.fetchEventPage("octocat", 0);
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrowError(
      "GitHub authentication failed for events of user octocat. Check the token value."
    );
  });

  it("explains rate limiting", async () => {
    const client = new GithubActivityClient({
      api: createApi({
        listUserEvents: async () => {
          throw httpError(403, "API rate limit exceeded for 127.0.0.1.");
        }
      })
    });

    await expect(client.fetchEventPage("octocat", 0)).rejects.toMatchObject({
      status: 403,
      message:
        "GitHub rate limit reached for events of user octocat. Retry later or provide a token with -token or $GITHUB_TOKEN."
    });
  });

  it("reports missing pull requests", async () => {
    const client = new GithubActivityClient({
      api: createApi({
        getPullRequest: async () => {
          throw httpError(404, "Not Found");
        }
      })
    });

    await expect(client.getPullRequest("a/b", 9)).rejects.toThrowError("GitHub could not find a/b#9.");
  });

  it("rejects repository names that are not owner/repo", async () => {
    const client = new GithubActivityClient({ api: createApi() });
    await expect(client.getPullRequest("not-a-repo", 1)).rejects.toBeInstanceOf(MalformedEventError);
  });
});
