/** Issue as listed from the repository. Pull requests are issues too. */
export interface Issue {
  number: number;
  title: string;
  labels: string[];
  author: string | null;
  /** Set when GitHub links this issue to a pull request */
  isPullRequest: boolean;
}

export interface PullRequest {
  number: number;
  title: string;
  merged: boolean;
  /** `null` while GitHub is still computing mergeability */
  mergeable: boolean | null;
  additions: number;
  deletions: number;
  headSha: string;
}

export interface CommitFile {
  filename: string;
  additions: number;
  deletions: number;
}

export interface Commit {
  sha: string;
  message: string;
  author: string | null;
  /** ISO timestamp of the committer date */
  committedAt: string | null;
  files: CommitFile[];
}

export interface IssueEvent {
  id: number;
  /** e.g. "labeled", "unlabeled", "closed" */
  event: string;
  actor: string | null;
  label: string | null;
  createdAt: string;
}

/** One unit of work for a cycle, created fresh for each processing attempt. */
export interface MungeObject {
  issue: Issue;
}

/** A munge object that passed PR resolution and enrichment. Only mungers see this shape. */
export interface PullRequestObject extends MungeObject {
  pr: PullRequest;
  commits: Commit[];
  events: IssueEvent[];
}
