import { Inject, Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';

import { ANALYZER_CONFIG } from '../config/analyzer-config.js';
import type { AnalyzerConfig } from '../config/analyzer-config.js';
import type {
  GithubClient,
  GithubRepositoryDTO,
  GithubContributorDTO,
  GithubBranchDTO,
  RepoRef,
  RepositoryVisibility,
} from './github-client-interface.js';

// ---------- PARAM TYPES ----------
type OrgRepoParams =
  RestEndpointMethodTypes['repos']['listForOrg']['parameters'];

type OrgRepoItem =
  RestEndpointMethodTypes['repos']['listForOrg']['response']['data'][number];

type ContributorParams =
  RestEndpointMethodTypes['repos']['listContributors']['parameters'];

type BranchParams =
  RestEndpointMethodTypes['repos']['listBranches']['parameters'];

const VISIBILITIES: readonly RepositoryVisibility[] = [
  'public',
  'private',
  'internal',
];

function toVisibility(
  value: string | undefined,
  isPrivate: boolean,
): RepositoryVisibility {
  const found = VISIBILITIES.find((v) => v === value);
  return found ?? (isPrivate ? 'private' : 'public');
}

function toDate(iso: string | null | undefined): Date {
  return new Date(iso ?? 0);
}

export function mapOrgRepo(it: OrgRepoItem): GithubRepositoryDTO {
  return {
    owner: it.owner?.login ?? '',
    name: it.name,
    description: it.description ?? null,
    language: it.language ?? null,
    htmlUrl: it.html_url,
    defaultBranch: it.default_branch ?? '',
    createdAt: toDate(it.created_at),
    updatedAt: toDate(it.updated_at),
    sizeKb: it.size ?? 0,
    stars: it.stargazers_count ?? 0,
    forks: it.forks_count ?? 0,
    openIssues: it.open_issues_count ?? 0,
    hasWiki: Boolean(it.has_wiki),
    archived: Boolean(it.archived),
    visibility: toVisibility(it.visibility, it.private),
    licenseName: it.license?.name ?? null,
    raw: it,
  };
}

@Injectable()
export class OctokitClient implements GithubClient {
  private readonly logger = new Logger(OctokitClient.name);
  private readonly octokit: Octokit;
  private closed = false;

  constructor(@Inject(ANALYZER_CONFIG) config: AnalyzerConfig) {
    // No request timeout: an unresponsive API blocks the run.
    this.octokit = new Octokit({
      auth: config.token,
      userAgent: 'org-repo-insights/1.0',
      ...(config.apiUrl ? { baseUrl: config.apiUrl } : {}),
      log: {
        debug: (message: string) => this.logger.debug(message),
        info: (message: string) => this.logger.verbose(message),
        warn: (message: string) => this.logger.warn(message),
        error: (message: string) => this.logger.error(message),
      },
    });
  }

  // ---------- REPOS ----------
  async listOrganizationRepos(params: {
    org: string;
  }): Promise<GithubRepositoryDTO[]> {
    this.assertOpen();

    const items = await this.octokit.paginate(this.octokit.rest.repos.listForOrg, {
      org: params.org,
      type: 'all',
      per_page: 100,
    } satisfies OrgRepoParams);

    return items.map(mapOrgRepo);
  }

  // ---------- CONTRIBUTORS ----------
  async listContributors(params: RepoRef): Promise<GithubContributorDTO[]> {
    this.assertOpen();

    const items = await this.octokit.paginate(
      this.octokit.rest.repos.listContributors,
      {
        owner: params.owner,
        repo: params.repo,
        per_page: 100,
      } satisfies ContributorParams,
    );

    return items.map((c) => ({
      login: c.login ?? null,
      contributions: c.contributions,
      raw: c,
    }));
  }

  // ---------- BRANCHES ----------
  async listBranches(params: RepoRef): Promise<GithubBranchDTO[]> {
    this.assertOpen();

    const items = await this.octokit.paginate(
      this.octokit.rest.repos.listBranches,
      {
        owner: params.owner,
        repo: params.repo,
        per_page: 100,
      } satisfies BranchParams,
    );

    return items.map((b) => ({
      name: b.name,
      protected: Boolean(b.protected),
      raw: b,
    }));
  }

  // ---------- TOPICS ----------
  async listTopics(params: RepoRef): Promise<string[]> {
    this.assertOpen();

    const { data } = await this.octokit.rest.repos.getAllTopics({
      owner: params.owner,
      repo: params.repo,
    });

    return Array.isArray(data.names) ? data.names : [];
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.debug('GitHub client closed');
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('GitHub client has been closed');
    }
  }
}
