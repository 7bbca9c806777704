import { Inject, Injectable, Logger } from '@nestjs/common';
import { RequestError } from '@octokit/request-error';

import { GITHUB_CLIENT } from '../github/github-client.token.js';
import type {
  GithubClient,
  GithubRepositoryDTO,
} from '../github/github-client-interface.js';
import type { AnalysisProgress } from './progress.js';
import type { RepositoryAnalysis } from './types.js';

@Injectable()
export class RepositoryAnalyzerService {
  private readonly logger = new Logger(RepositoryAnalyzerService.name);

  constructor(@Inject(GITHUB_CLIENT) private readonly github: GithubClient) {}

  /**
   * Builds the analysis record of one repository. Only the contributor listing
   * is allowed to fail; topic and branch errors propagate to the caller.
   */
  async analyze(
    repo: GithubRepositoryDTO,
    progress?: AnalysisProgress,
  ): Promise<RepositoryAnalysis> {
    progress?.describe(repo.name);

    const ref = { owner: repo.owner, repo: repo.name };
    const contributorsCount = await this.countContributors(repo);
    const topics = await this.github.listTopics(ref);
    const branches = await this.github.listBranches(ref);

    const analysis: RepositoryAnalysis = {
      name: repo.name,
      url: repo.htmlUrl,
      defaultBranch: repo.defaultBranch,
      description: repo.description,
      language: repo.language,
      topics: Object.freeze([...topics]),
      license: repo.licenseName,
      createdAt: repo.createdAt,
      updatedAt: repo.updatedAt,
      sizeKb: repo.sizeKb,
      stars: repo.stars,
      forks: repo.forks,
      openIssues: repo.openIssues,
      branchCount: branches.length,
      contributorsCount,
      hasWiki: repo.hasWiki,
      archived: repo.archived,
      visibility: repo.visibility,
    };

    progress?.advance();
    return analysis;
  }

  private async countContributors(repo: GithubRepositoryDTO): Promise<number> {
    try {
      const contributors = await this.github.listContributors({
        owner: repo.owner,
        repo: repo.name,
      });
      return contributors.length;
    } catch (error: unknown) {
      const status = error instanceof RequestError ? ` (${error.status})` : '';
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Contributors unavailable for ${repo.name}${status}, counting 0: ${message}`,
      );
      return 0;
    }
  }
}
