import { throwIfCancelled } from "./errors.js";
import { iterateEventPages, type EventPageFetcher } from "./pagination.js";
import { classifyEvents, countBuckets, createBucketSet } from "./rules/event-classifier.js";
import type { BucketSet, BucketStats, EventPage, PipelineContext, PullRequestLookup } from "./types.js";

export interface PipelineSteps<TRenderResult> {
  fetchPage: EventPageFetcher;
  pullRequests: PullRequestLookup;
  render: (buckets: BucketSet, ctx: PipelineContext) => Promise<TRenderResult> | TRenderResult;
}

export interface PipelineHooks {
  onPage?: (page: EventPage) => void;
}

export interface PipelineRunResult<TRenderResult> {
  buckets: BucketSet;
  stats: BucketStats;
  output: TRenderResult;
}

export async function runPipeline<TRenderResult>(
  steps: PipelineSteps<TRenderResult>,
  ctx: PipelineContext,
  hooks: PipelineHooks = {}
): Promise<PipelineRunResult<TRenderResult>> {
  const buckets = createBucketSet();
  const classifyContext = {
    window: ctx.window,
    username: ctx.username,
    pullRequests: steps.pullRequests,
    ...(ctx.signal ? { signal: ctx.signal } : {})
  };

  const pages = iterateEventPages(steps.fetchPage, ctx.signal ? { signal: ctx.signal } : {});
  for await (const page of pages) {
    hooks.onPage?.(page);
    await classifyEvents(page.events, classifyContext, buckets);
  }

  // Nothing is rendered once the run has been interrupted.
  throwIfCancelled(ctx.signal);
  const output = await steps.render(buckets, ctx);
  return { buckets, stats: countBuckets(buckets), output };
}
