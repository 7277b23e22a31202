import type { Logger } from "pino";
import type { FlagSet } from "../cli/flags.ts";
import type { GitHubClient } from "../github/client.ts";
import type { PullRequestObject } from "../github/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { PRMunger } from "./types.ts";

export const NEEDS_REBASE_MUNGER = "needs-rebase";
export const DEFAULT_NEEDS_REBASE_LABEL = "needs-rebase";

/**
 * Labels pull requests that no longer merge cleanly and clears the label once
 * they do. Unknown mergeability leaves the labels untouched.
 */
export function createNeedsRebaseMunger(deps: { logger: Logger }): PRMunger {
  let logger = deps.logger;
  let label = (): string => DEFAULT_NEEDS_REBASE_LABEL;

  return {
    name: NEEDS_REBASE_MUNGER,

    addFlags(flags: FlagSet): void {
      label = flags.string("needs-rebase-label", DEFAULT_NEEDS_REBASE_LABEL, "Label applied to PRs with merge conflicts");
    },

    async initialize(): Promise<void> {
      logger = createChildLogger(deps.logger, { munger: NEEDS_REBASE_MUNGER });
      logger.debug({ label: label() }, "needs-rebase munger initialized");
    },

    async eachLoop(): Promise<void> {},

    async mungePullRequest(client: GitHubClient, obj: PullRequestObject): Promise<void> {
      const name = label();
      const issueNumber = obj.issue.number;
      const hasLabel = obj.issue.labels.includes(name);

      try {
        if (obj.pr.mergeable === false && !hasLabel) {
          await client.addLabels(issueNumber, [name]);
          logger.info({ issueNumber, label: name }, "PR has conflicts, added label");
        } else if (obj.pr.mergeable === true && hasLabel) {
          await client.removeLabel(issueNumber, name);
          logger.info({ issueNumber, label: name }, "PR merges cleanly again, removed label");
        }
      } catch (err) {
        logger.warn({ err, issueNumber }, "Failed to update needs-rebase label");
      }
    },
  };
}
