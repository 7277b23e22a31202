import type { Logger } from "pino";
import type { FlagSet } from "../cli/flags.ts";
import type { GitHubClient } from "../github/client.ts";
import type { Commit, IssueEvent, PullRequestObject } from "../github/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { PRMunger } from "./types.ts";

export const LGTM_AFTER_COMMIT_MUNGER = "lgtm-after-commit";
export const DEFAULT_LGTM_LABEL = "lgtm";

function toTime(value: string | null): number {
  if (value === null) return Number.NEGATIVE_INFINITY;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/** Most recent time the label was applied, or null when it never was. */
export function lastLabeledAt(events: IssueEvent[], label: string): number | null {
  let latest: number | null = null;
  for (const event of events) {
    if (event.event !== "labeled" || event.label !== label) continue;
    const at = toTime(event.createdAt);
    if (latest === null || at > latest) latest = at;
  }
  return latest;
}

export function lastCommittedAt(commits: Commit[]): number | null {
  let latest: number | null = null;
  for (const commit of commits) {
    const at = toTime(commit.committedAt);
    if (at === Number.NEGATIVE_INFINITY) continue;
    if (latest === null || at > latest) latest = at;
  }
  return latest;
}

/**
 * Removes the lgtm label from pull requests that received commits after
 * the label was applied.
 */
export function createLgtmAfterCommitMunger(deps: { logger: Logger }): PRMunger {
  let logger = deps.logger;
  let label = (): string => DEFAULT_LGTM_LABEL;
  let removedThisCycle = 0;

  return {
    name: LGTM_AFTER_COMMIT_MUNGER,

    addFlags(flags: FlagSet): void {
      label = flags.string("lgtm-label", DEFAULT_LGTM_LABEL, "Label that marks a PR as approved");
    },

    async initialize(): Promise<void> {
      logger = createChildLogger(deps.logger, { munger: LGTM_AFTER_COMMIT_MUNGER });
      logger.debug({ label: label() }, "lgtm-after-commit munger initialized");
    },

    async eachLoop(): Promise<void> {
      if (removedThisCycle > 0) {
        logger.info({ removed: removedThisCycle }, "Removed stale approvals in previous cycle");
      }
      removedThisCycle = 0;
    },

    async mungePullRequest(client: GitHubClient, obj: PullRequestObject): Promise<void> {
      const name = label();
      const issueNumber = obj.issue.number;
      if (!obj.issue.labels.includes(name)) return;

      const labeledAt = lastLabeledAt(obj.events, name);
      const committedAt = lastCommittedAt(obj.commits);
      if (labeledAt === null || committedAt === null || committedAt <= labeledAt) return;

      try {
        await client.removeLabel(issueNumber, name);
        await client.writeComment(
          issueNumber,
          `The \`${name}\` label was removed because new commits were pushed after it was applied. Please review again.`,
        );
        removedThisCycle++;
        logger.info({ issueNumber, label: name }, "Removed approval applied before latest commit");
      } catch (err) {
        logger.warn({ err, issueNumber }, "Failed to remove stale approval");
      }
    },
  };
}
