import type { RepositoryVisibility } from '../github/github-client-interface.js';
import type { FrequencyTable } from './frequency-counter.js';

/** Per-repository analysis record, built once by the analyzer. */
export interface RepositoryAnalysis {
  readonly name: string;
  readonly url: string;
  readonly defaultBranch: string;

  readonly description: string | null;
  readonly language: string | null;
  readonly topics: readonly string[];
  readonly license: string | null;  // license display name

  readonly createdAt: Date;
  readonly updatedAt: Date;

  readonly sizeKb: number;
  readonly stars: number;
  readonly forks: number;
  readonly openIssues: number;
  readonly branchCount: number;
  readonly contributorsCount: number; // 0 when contributors could not be listed

  readonly hasWiki: boolean;
  readonly archived: boolean;
  readonly visibility: RepositoryVisibility;
}

/** Organization-wide fold over every RepositoryAnalysis of a run. */
export interface OrganizationStats {
  readonly totalRepos: number;
  readonly activeRepos: number;
  readonly archivedRepos: number;
  readonly totalSizeKb: number;

  readonly languages: FrequencyTable;
  readonly topics: FrequencyTable;
  readonly licenses: FrequencyTable;

  readonly contributors: number;
  readonly forks: number;
  readonly stars: number;
}
