import PQueue from "p-queue";
import type { Logger } from "pino";
import type { GitHubClient } from "../github/client.ts";
import type { Issue } from "../github/types.ts";
import { EachLoopError } from "../lib/errors.ts";
import { createChildLogger } from "../lib/logger.ts";
import { sleep as defaultSleep } from "../lib/retry-policy.ts";
import type { ItemProcessor, ProcessOutcome } from "../mungers/processor.ts";
import type { MungerRegistry } from "../mungers/registry.ts";

export interface CycleSummary {
  cycle: number;
  /** True when a cycle hook failed or issues could not be listed; no item was processed */
  aborted: boolean;
  total: number;
  counts: Record<ProcessOutcome["status"], number>;
  failed: number;
}

export interface Poller {
  runCycle(): Promise<CycleSummary>;
  /** Run cycles until `once` is set or the signal aborts. */
  run(options?: { once?: boolean; signal?: AbortSignal }): Promise<void>;
}

function emptyCounts(): CycleSummary["counts"] {
  return { "lookup-failed": 0, "not-a-pr": 0, merged: 0, dispatched: 0 };
}

/**
 * Outer polling loop. Each cycle runs the munger cycle hooks, lists open
 * issues and processes them through a PQueue. Items are independent: one
 * item's failure is logged and counted, never propagated.
 */
export function createPoller(deps: {
  registry: MungerRegistry;
  processor: ItemProcessor;
  client: GitHubClient;
  logger: Logger;
  concurrency?: number;
  periodMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}): Poller {
  const { registry, processor, client, logger, periodMs } = deps;
  const concurrency = deps.concurrency ?? 1;
  const sleep = deps.sleep ?? defaultSleep;
  let cycle = 0;

  async function runCycle(): Promise<CycleSummary> {
    cycle++;
    const cycleLogger = createChildLogger(logger, { cycle });
    const startedAt = Date.now();
    const summary: CycleSummary = { cycle, aborted: false, total: 0, counts: emptyCounts(), failed: 0 };

    try {
      await registry.runEachLoop(client);
    } catch (err) {
      if (err instanceof EachLoopError) {
        cycleLogger.error({ err, munger: err.mungerName }, "Cycle hook failed, skipping this cycle");
        summary.aborted = true;
        return summary;
      }
      throw err;
    }

    let issues: Issue[];
    try {
      issues = await client.listOpenIssues();
    } catch (err) {
      cycleLogger.error({ err }, "Failed to list open issues, skipping this cycle");
      summary.aborted = true;
      return summary;
    }
    summary.total = issues.length;
    cycleLogger.info({ org: client.org, project: client.project, total: issues.length }, "Cycle started");

    const queue = new PQueue({ concurrency });
    for (const issue of issues) {
      queue
        .add(async () => {
          try {
            const outcome = await processor.processItem(client, { issue });
            summary.counts[outcome.status]++;
          } catch (err) {
            summary.failed++;
            cycleLogger.error({ err, issueNumber: issue.number }, "Item processing failed");
          }
        })
        .catch((err: unknown) => {
          cycleLogger.error({ err, issueNumber: issue.number }, "Queue rejected item");
        });
    }
    await queue.onIdle();

    cycleLogger.info(
      { ...summary.counts, failed: summary.failed, durationMs: Date.now() - startedAt },
      "Cycle completed",
    );
    return summary;
  }

  return {
    runCycle,

    async run(options: { once?: boolean; signal?: AbortSignal } = {}): Promise<void> {
      const { once = false, signal } = options;
      while (!signal?.aborted) {
        await runCycle();
        if (once || signal?.aborted) break;
        logger.debug({ periodMs }, "Sleeping until next cycle");
        await sleep(periodMs, signal);
      }
      logger.info({ cycles: cycle }, "Polling loop stopped");
    },
  };
}
