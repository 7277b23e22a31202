import type { Logger } from "pino";
import type { FlagSet } from "../cli/flags.ts";
import type { GitHubClient } from "../github/client.ts";
import type { PullRequestObject } from "../github/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { PRMunger } from "./types.ts";

export const SIZE_MUNGER = "size";
export const DEFAULT_SIZE_LABEL_PREFIX = "size/";

/** Upper bounds (exclusive) of changed lines for each size, smallest first. */
const SIZE_THRESHOLDS: ReadonlyArray<readonly [limit: number, size: string]> = [
  [10, "XS"],
  [30, "S"],
  [100, "M"],
  [500, "L"],
  [1000, "XL"],
];

export function computeSize(changedLines: number): string {
  for (const [limit, size] of SIZE_THRESHOLDS) {
    if (changedLines < limit) return size;
  }
  return "XXL";
}

export function createSizeMunger(deps: { logger: Logger }): PRMunger {
  let logger = deps.logger;
  let prefix = (): string => DEFAULT_SIZE_LABEL_PREFIX;

  return {
    name: SIZE_MUNGER,

    addFlags(flags: FlagSet): void {
      prefix = flags.string("size-label-prefix", DEFAULT_SIZE_LABEL_PREFIX, "Prefix of PR size labels");
    },

    async initialize(): Promise<void> {
      logger = createChildLogger(deps.logger, { munger: SIZE_MUNGER });
      // An empty prefix would match, and strip, every label on the PR
      if (prefix() === "") {
        throw new Error("--size-label-prefix must not be empty");
      }
      logger.debug({ prefix: prefix() }, "size munger initialized");
    },

    async eachLoop(): Promise<void> {},

    async mungePullRequest(client: GitHubClient, obj: PullRequestObject): Promise<void> {
      const issueNumber = obj.issue.number;
      const changedLines = obj.pr.additions + obj.pr.deletions;
      const wanted = `${prefix()}${computeSize(changedLines)}`;

      try {
        for (const existing of obj.issue.labels) {
          if (existing.startsWith(prefix()) && existing !== wanted) {
            await client.removeLabel(issueNumber, existing);
          }
        }
        if (!obj.issue.labels.includes(wanted)) {
          await client.addLabels(issueNumber, [wanted]);
          logger.info({ issueNumber, label: wanted, changedLines }, "Applied size label");
        }
      } catch (err) {
        logger.warn({ err, issueNumber }, "Failed to update size label");
      }
    },
  };
}
