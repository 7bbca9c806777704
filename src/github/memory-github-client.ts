import { Injectable } from '@nestjs/common';
import type {
  GithubClient,
  GithubRepositoryDTO,
  GithubContributorDTO,
  GithubBranchDTO,
  RepoRef,
} from './github-client-interface.js';

export interface MemoryRepoFixture {
  repo: GithubRepositoryDTO;
  contributors?: string[];
  branches?: string[];
  topics?: string[];
  /** Errors thrown by the matching call instead of returning data. */
  failures?: Partial<Record<'contributors' | 'branches' | 'topics', Error>>;
}

/**
 * GithubClient over fixtures held in memory. Records every call so tests can
 * assert on ordering and on what was requested.
 */
@Injectable()
export class InMemoryGithubClient implements GithubClient {
  readonly calls: string[] = [];
  private readonly byOrg = new Map<string, MemoryRepoFixture[]>();
  private closed = false;

  addOrganization(org: string, fixtures: MemoryRepoFixture[]): this {
    this.byOrg.set(org, fixtures);
    return this;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async listOrganizationRepos(params: {
    org: string;
  }): Promise<GithubRepositoryDTO[]> {
    this.record(`repos:${params.org}`);
    const fixtures = this.byOrg.get(params.org);
    if (!fixtures) {
      throw new Error(`Organization not found: ${params.org}`);
    }
    return fixtures.map((f) => f.repo);
  }

  async listContributors(params: RepoRef): Promise<GithubContributorDTO[]> {
    const fixture = this.fixtureFor(params, 'contributors');
    return (fixture.contributors ?? []).map((login) => ({
      login,
      contributions: 1,
      raw: { login },
    }));
  }

  async listBranches(params: RepoRef): Promise<GithubBranchDTO[]> {
    const fixture = this.fixtureFor(params, 'branches');
    return (fixture.branches ?? []).map((name) => ({
      name,
      protected: false,
      raw: { name },
    }));
  }

  async listTopics(params: RepoRef): Promise<string[]> {
    const fixture = this.fixtureFor(params, 'topics');
    return [...(fixture.topics ?? [])];
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private fixtureFor(
    params: RepoRef,
    kind: 'contributors' | 'branches' | 'topics',
  ): MemoryRepoFixture {
    this.record(`${kind}:${params.owner}/${params.repo}`);
    const fixture = this.byOrg
      .get(params.owner)
      ?.find((f) => f.repo.name === params.repo);
    if (!fixture) {
      throw new Error(`Repository not found: ${params.owner}/${params.repo}`);
    }
    const failure = fixture.failures?.[kind];
    if (failure) throw failure;
    return fixture;
  }

  private record(call: string): void {
    if (this.closed) {
      throw new Error('GitHub client has been closed');
    }
    this.calls.push(call);
  }
}
