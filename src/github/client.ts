import type { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import type { Commit, Issue, IssueEvent, PullRequest } from "./types.ts";

/**
 * Remote collaborator for the munge pipeline. Reads are used by the item
 * processor; writes are used by mungers and become logged no-ops in dry-run.
 */
export interface GitHubClient {
  readonly org: string;
  readonly project: string;
  readonly dryRun: boolean;

  listOpenIssues(): Promise<Issue[]>;
  /** Resolve an issue to its pull request, or `null` when it is a plain issue. */
  getPR(issue: Issue): Promise<PullRequest | null>;
  /** Commits of the pull request, each with its changed files. */
  getFilledCommits(issue: Issue): Promise<Commit[]>;
  getAllEventsForPR(issue: Issue): Promise<IssueEvent[]>;

  addLabels(issueNumber: number, labels: string[]): Promise<void>;
  removeLabel(issueNumber: number, label: string): Promise<void>;
  writeComment(issueNumber: number, body: string): Promise<void>;
}

export interface GitHubClientOptions {
  octokit: Octokit;
  org: string;
  project: string;
  logger: Logger;
  dryRun?: boolean;
  perPage?: number;
  minPrNumber?: number;
  maxPrNumber?: number;
}

function hasStatusCode(error: unknown, statusCode: number): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === statusCode;
}

function labelName(label: string | { name?: string }): string | undefined {
  return typeof label === "string" ? label : label.name;
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const { octokit, org, project, logger } = options;
  const dryRun = options.dryRun ?? true;
  const perPage = options.perPage ?? 100;
  const minPrNumber = options.minPrNumber ?? 0;
  const maxPrNumber = options.maxPrNumber ?? Number.MAX_SAFE_INTEGER;
  const repo = { owner: org, repo: project };

  return {
    org,
    project,
    dryRun,

    async listOpenIssues(): Promise<Issue[]> {
      const items = await octokit.paginate(octokit.rest.issues.listForRepo, {
        ...repo,
        state: "open",
        per_page: perPage,
      });

      const issues: Issue[] = [];
      for (const item of items) {
        if (item.number < minPrNumber || item.number > maxPrNumber) continue;
        issues.push({
          number: item.number,
          title: item.title,
          labels: item.labels
            .map(labelName)
            .filter((name): name is string => typeof name === "string" && name.length > 0),
          author: item.user?.login ?? null,
          isPullRequest: item.pull_request !== undefined && item.pull_request !== null,
        });
      }

      logger.debug({ org, project, count: issues.length }, "Listed open issues");
      return issues;
    },

    async getPR(issue: Issue): Promise<PullRequest | null> {
      if (!issue.isPullRequest) return null;

      const { data } = await octokit.rest.pulls.get({ ...repo, pull_number: issue.number });
      return {
        number: data.number,
        title: data.title,
        merged: data.merged,
        mergeable: data.mergeable,
        additions: data.additions,
        deletions: data.deletions,
        headSha: data.head.sha,
      };
    },

    async getFilledCommits(issue: Issue): Promise<Commit[]> {
      const listed = await octokit.paginate(octokit.rest.pulls.listCommits, {
        ...repo,
        pull_number: issue.number,
        per_page: perPage,
      });

      // The list endpoint omits changed files, so fetch each commit in full.
      const commits: Commit[] = [];
      for (const entry of listed) {
        const { data } = await octokit.rest.repos.getCommit({ ...repo, ref: entry.sha });
        commits.push({
          sha: data.sha,
          message: data.commit.message,
          author: data.author?.login ?? null,
          committedAt: data.commit.committer?.date ?? null,
          files: (data.files ?? []).map((file) => ({
            filename: file.filename,
            additions: file.additions,
            deletions: file.deletions,
          })),
        });
      }
      return commits;
    },

    async getAllEventsForPR(issue: Issue): Promise<IssueEvent[]> {
      const listed = await octokit.paginate(octokit.rest.issues.listEvents, {
        ...repo,
        issue_number: issue.number,
        per_page: perPage,
      });

      return listed.map((entry) => ({
        id: entry.id,
        event: entry.event,
        actor: entry.actor?.login ?? null,
        label: "label" in entry && entry.label ? entry.label.name : null,
        createdAt: entry.created_at,
      }));
    },

    async addLabels(issueNumber: number, labels: string[]): Promise<void> {
      if (dryRun) {
        logger.info({ issueNumber, labels }, "Dry run: would add labels");
        return;
      }
      await octokit.rest.issues.addLabels({ ...repo, issue_number: issueNumber, labels });
    },

    async removeLabel(issueNumber: number, label: string): Promise<void> {
      if (dryRun) {
        logger.info({ issueNumber, label }, "Dry run: would remove label");
        return;
      }
      try {
        await octokit.rest.issues.removeLabel({ ...repo, issue_number: issueNumber, name: label });
      } catch (err) {
        // Already gone
        if (hasStatusCode(err, 404)) {
          logger.debug({ issueNumber, label }, "Label not present, nothing to remove");
          return;
        }
        throw err;
      }
    },

    async writeComment(issueNumber: number, body: string): Promise<void> {
      if (dryRun) {
        logger.info({ issueNumber, body }, "Dry run: would write comment");
        return;
      }
      await octokit.rest.issues.createComment({ ...repo, issue_number: issueNumber, body });
    },
  };
}
