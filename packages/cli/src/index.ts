import {
  formatError,
  resolveTimeWindow,
  runPipeline,
  type BucketStats,
  type EventPage,
  type PullRequest,
  type TimeWindow,
  type TimeWindowOptions
} from "@weekreport/core";
import { GithubActivityClient } from "@weekreport/provider-github";
import { renderActivityReport } from "@weekreport/renderer-markdown";
import { resolveToken, resolveUsername, type Env } from "./auth.js";
import { FLAGS, parseArgs, parseOptions, type WeekreportOptions } from "./config.js";

export interface CliIO {
  /** Standard output: carries the report only. */
  log: (message: string) => void;
  /** Standard error: progress notices and failures. */
  error: (message: string) => void;
}

export interface GithubClientLike {
  fetchEventPage: (username: string, page: number, window?: TimeWindow) => Promise<EventPage>;
  getPullRequest: (repoName: string, number: number) => Promise<PullRequest>;
  getAuthenticatedLogin: () => Promise<string>;
}

export interface CliRuntimeOptions {
  io?: CliIO;
  env?: Env;
  now?: Date;
  signal?: AbortSignal;
  createGithubClient?: (token: string | undefined) => GithubClientLike;
}

function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function createDefaultClient(token: string | undefined): GithubClientLike {
  return new GithubActivityClient(token ? { token } : {});
}

function toTimeWindowOptions(options: WeekreportOptions, now: Date | undefined): TimeWindowOptions {
  return {
    startOfWeek: options.startOfWeek,
    weeksBack: options.weeksBack,
    ...(options.startDate ? { startDate: options.startDate } : {}),
    ...(options.endDate ? { endDate: options.endDate } : {}),
    ...(options.timezone ? { timezone: options.timezone } : {}),
    ...(now ? { now } : {})
  };
}

export function formatStatsLine(stats: BucketStats): string {
  return (
    `Stats: opened_issues=${stats.openedIssues}, closed_issues=${stats.closedIssues}, ` +
    `commented_issues=${stats.commentedIssues}, opened_prs=${stats.openedPullRequests}, ` +
    `closed_prs=${stats.closedPullRequests}, code_reviews=${stats.reviewedPullRequests}`
  );
}

function printHelp(io: CliIO): void {
  io.log("weekreport: summarize a GitHub user's activity for one week");
  io.log("Usage: weekreport [-user <login>] [-token <token>] [options]");
  io.log("Options:");
  for (const [name, spec] of Object.entries(FLAGS)) {
    io.log(`  -${name.padEnd(15)} ${spec.description}`);
  }
  io.log("Environment:");
  io.log("  GITHUB_TOKEN      used when -token is not given");
  io.log("  GITHUB_USERNAME   used when -user is not given");
  io.log("When both -start_date and -end_date are set they replace the week options;");
  io.log("-end_date should be the day after the last day wanted.");
}

async function runReport(argv: string[], runtimeOptions: CliRuntimeOptions, io: CliIO): Promise<number> {
  const parsedArgs = parseArgs(argv);
  if (parsedArgs.help) {
    printHelp(io);
    return 0;
  }

  const options = parseOptions(parsedArgs.values);
  const window = resolveTimeWindow(toTimeWindowOptions(options, runtimeOptions.now));
  const env = runtimeOptions.env ?? process.env;
  const logger = { error: io.error };

  const { token } = resolveToken(options, env, logger);
  const client = (runtimeOptions.createGithubClient ?? createDefaultClient)(token);
  const { username } = await resolveUsername(options, env, token ? client : undefined, logger);

  io.error(`Pulling contributions from ${window.start.toISOString()} to ${window.end.toISOString()}...`);

  const result = await runPipeline(
    {
      fetchPage: (page) => client.fetchEventPage(username, page, window),
      pullRequests: client,
      render: (buckets) => renderActivityReport(buckets)
    },
    {
      window,
      username,
      ...(runtimeOptions.signal ? { signal: runtimeOptions.signal } : {})
    },
    {
      onPage: (page) => io.error(`Fetched page ${page.page} (${page.events.length} events)`)
    }
  );

  if (result.output.length > 0) {
    io.log(result.output.trimEnd());
  } else {
    io.error("No activity found in this window.");
  }
  io.error(formatStatsLine(result.stats));
  return 0;
}

export async function runCli(argv: string[], runtimeOptions: CliRuntimeOptions = {}): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  try {
    return await runReport(argv, runtimeOptions, io);
  } catch (error: unknown) {
    io.error(formatError(error));
    return 1;
  }
}
