import type { FlagSet } from "../cli/flags.ts";
import type { GitHubClient } from "../github/client.ts";
import type { PullRequestObject } from "../github/types.ts";

/**
 * Contract every munger implements to be registered.
 *
 * `mungePullRequest` receives the pull request together with its issue
 * (GitHub keeps labels on the issue with the same number), its commits with
 * changed files, and its events. Failures inside it are the munger's to
 * report; the pipeline logs anything that escapes and moves on.
 */
export interface PRMunger {
  readonly name: string;
  addFlags(flags: FlagSet): void;
  initialize(client: GitHubClient): Promise<void>;
  eachLoop(client: GitHubClient): Promise<void>;
  mungePullRequest(client: GitHubClient, obj: PullRequestObject): Promise<void>;
}
