// Abstraction over the GitHub API used by the analysis pipeline

export type RepositoryVisibility = 'public' | 'private' | 'internal';

export interface GithubRepositoryDTO {
  owner: string; // organization login
  name: string;
  description: string | null;
  language: string | null;
  htmlUrl: string;
  defaultBranch: string;
  createdAt: Date;
  updatedAt: Date;
  sizeKb: number;
  stars: number;
  forks: number;
  openIssues: number;
  hasWiki: boolean;
  archived: boolean;
  visibility: RepositoryVisibility;
  licenseName: string | null;
  raw: unknown;
}

export interface GithubContributorDTO {
  login: string | null; // null for anonymous contributors
  contributions: number;
  raw: unknown;
}

export interface GithubBranchDTO {
  name: string;
  protected: boolean;
  raw: unknown;
}

export interface RepoRef {
  owner: string;
  repo: string;
}

// The interface consumed by the analyzer and the pipeline.
// Implementations do not catch API errors; callers decide what to tolerate.
export interface GithubClient {
  listOrganizationRepos(params: { org: string }): Promise<GithubRepositoryDTO[]>;
  listContributors(params: RepoRef): Promise<GithubContributorDTO[]>;
  listBranches(params: RepoRef): Promise<GithubBranchDTO[]>;
  listTopics(params: RepoRef): Promise<string[]>;

  close(): Promise<void>;
}
