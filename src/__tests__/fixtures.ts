import type { GithubRepositoryDTO } from '../github/github-client-interface.js';
import type { RepositoryAnalysis } from '../analysis/types.js';

export function buildRepo(
  overrides: Partial<GithubRepositoryDTO> = {},
): GithubRepositoryDTO {
  const name = overrides.name ?? 'sample';
  return {
    owner: 'acme',
    name,
    description: null,
    language: null,
    htmlUrl: `https://github.com/acme/${name}`,
    defaultBranch: 'main',
    createdAt: new Date('2023-01-15T08:00:00Z'),
    updatedAt: new Date('2024-02-20T18:30:00Z'),
    sizeKb: 0,
    stars: 0,
    forks: 0,
    openIssues: 0,
    hasWiki: false,
    archived: false,
    visibility: 'public',
    licenseName: null,
    raw: {},
    ...overrides,
  };
}

export function buildAnalysis(
  overrides: Partial<RepositoryAnalysis> = {},
): RepositoryAnalysis {
  const name = overrides.name ?? 'sample';
  return {
    name,
    url: `https://github.com/acme/${name}`,
    defaultBranch: 'main',
    description: null,
    language: null,
    topics: [],
    license: null,
    createdAt: new Date('2023-01-15T08:00:00Z'),
    updatedAt: new Date('2024-02-20T18:30:00Z'),
    sizeKb: 0,
    stars: 0,
    forks: 0,
    openIssues: 0,
    branchCount: 1,
    contributorsCount: 0,
    hasWiki: false,
    archived: false,
    visibility: 'public',
    ...overrides,
  };
}
