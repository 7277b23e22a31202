import type { Logger } from "pino";
import type { GitHubClient } from "../github/client.ts";
import type { Commit, IssueEvent, MungeObject, PullRequest } from "../github/types.ts";
import { EnrichmentError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { fixedDelayPolicy, sleep as defaultSleep, type RetryPolicy } from "../lib/retry-policy.ts";
import { DEFAULT_MERGEABILITY_DELAY_MS } from "../config.ts";
import type { MungerRegistry } from "./registry.ts";

/**
 * Result of one processing attempt.
 *
 * `lookup-failed` is deliberately not an error: when resolving the pull
 * request fails, the item is skipped for this cycle exactly as if it were a
 * plain issue. It is reported separately so callers can tell the two apart.
 */
export type ProcessOutcome =
  | { status: "lookup-failed"; issueNumber: number; error: unknown }
  | { status: "not-a-pr"; issueNumber: number }
  | { status: "merged"; issueNumber: number }
  | { status: "dispatched"; issueNumber: number; mergeable: boolean | null; mungerCount: number };

export interface ItemProcessor {
  /**
   * Resolve, wait for mergeability, enrich and dispatch a single item.
   * Rejects with EnrichmentError when commits or events cannot be fetched.
   */
  processItem(client: GitHubClient, obj: MungeObject): Promise<ProcessOutcome>;
}

export function createItemProcessor(deps: {
  registry: MungerRegistry;
  logger: Logger;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}): ItemProcessor {
  const { registry, logger } = deps;
  const retryPolicy = deps.retryPolicy ?? fixedDelayPolicy(DEFAULT_MERGEABILITY_DELAY_MS, 1);
  const sleep = deps.sleep ?? defaultSleep;

  async function awaitMergeability(
    client: GitHubClient,
    obj: MungeObject,
    initial: PullRequest,
    itemLogger: Logger,
  ): Promise<PullRequest> {
    let pr = initial;
    for (let attempt = 1; pr.mergeable === null && attempt <= retryPolicy.maxRetries; attempt++) {
      const delayMs = retryPolicy.delayMs(attempt);
      itemLogger.debug({ title: pr.title, attempt, delayMs }, "Waiting for mergeability");
      await sleep(delayMs);

      try {
        const refreshed = await client.getPR(obj.issue);
        if (refreshed) {
          pr = refreshed;
        } else {
          itemLogger.warn({ attempt }, "Pull request vanished on mergeability re-check, keeping last known state");
        }
      } catch (err) {
        itemLogger.warn({ err, attempt }, "Mergeability re-check failed, keeping last known state");
      }
    }

    if (pr.mergeable === null) {
      itemLogger.info(
        { retries: retryPolicy.maxRetries },
        `No mergeability for PR ${pr.number} after pause. Maybe increase pause time?`,
      );
    }
    return pr;
  }

  return {
    async processItem(client: GitHubClient, obj: MungeObject): Promise<ProcessOutcome> {
      const issueNumber = obj.issue.number;
      const itemLogger = createChildLogger(logger, { issueNumber });

      let pr: PullRequest | null;
      try {
        pr = await client.getPR(obj.issue);
      } catch (err) {
        itemLogger.warn({ err }, "Pull request lookup failed, skipping item this cycle");
        return { status: "lookup-failed", issueNumber, error: err };
      }

      if (!pr) {
        itemLogger.debug(`Issue ${issueNumber} is not a PR, skipping`);
        return { status: "not-a-pr", issueNumber };
      }

      if (pr.merged) {
        itemLogger.debug(`PR ${issueNumber} was merged, may want to reduce the per-page size so this happens less often`);
        return { status: "merged", issueNumber };
      }

      if (pr.mergeable === null) {
        pr = await awaitMergeability(client, obj, pr, itemLogger);
      }

      let commits: Commit[];
      try {
        commits = await client.getFilledCommits(obj.issue);
      } catch (err) {
        throw new EnrichmentError("commits", issueNumber, err);
      }

      let events: IssueEvent[];
      try {
        events = await client.getAllEventsForPR(obj.issue);
      } catch (err) {
        throw new EnrichmentError("events", issueNumber, err);
      }

      const mungers = registry.getActive();
      await registry.mungeAll(client, { issue: obj.issue, pr, commits, events });

      itemLogger.debug({ mungerCount: mungers.length, mergeable: pr.mergeable }, "Dispatched pull request to mungers");
      return { status: "dispatched", issueNumber, mergeable: pr.mergeable, mungerCount: mungers.length };
    },
  };
}
