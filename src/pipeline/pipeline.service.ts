import { Inject, Injectable, Logger } from '@nestjs/common';
import { ANALYZER_CONFIG } from '../config/analyzer-config.js';
import type { AnalyzerConfig } from '../config/analyzer-config.js';
import { GITHUB_CLIENT } from '../github/github-client.token.js';
import type { GithubClient } from '../github/github-client-interface.js';
import { RepositoryAnalyzerService } from '../analysis/repository-analyzer.service.js';
import { OrganizationAggregatorService } from '../analysis/organization-aggregator.service.js';
import { LoggerProgress } from '../analysis/progress.js';
import type { OrganizationStats, RepositoryAnalysis } from '../analysis/types.js';
import { MarkdownReportService } from '../report/markdown-report.service.js';
import { ReportWriterService } from '../report/report-writer.service.js';

export interface AnalysisRunResult {
  reportPath: string;
  stats: OrganizationStats;
  analyses: RepositoryAnalysis[];
}

/** Human-readable lines printed once a run has finished. */
export function formatSummary(stats: OrganizationStats): string[] {
  const lines = [
    '📊 Quick Summary:',
    `- Total Repositories: ${stats.totalRepos}`,
    `- Active Repositories: ${stats.activeRepos}`,
    `- Total Contributors: ${stats.contributors}`,
  ];
  const [top] = stats.languages.mostCommon(1);
  if (top) lines.push(`- Most Used Language: ${top[0]}`);
  return lines;
}

@Injectable()
export class AnalysisPipelineService {
  private readonly logger = new Logger(AnalysisPipelineService.name);

  constructor(
    @Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig,
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
    private readonly analyzer: RepositoryAnalyzerService,
    private readonly aggregator: OrganizationAggregatorService,
    private readonly renderer: MarkdownReportService,
    private readonly writer: ReportWriterService,
  ) {}

  /**
   * Fetch -> analyze -> aggregate -> render -> write, strictly in sequence.
   * Any failure rejects before the report file is written.
   */
  async run(now: () => Date = () => new Date()): Promise<AnalysisRunResult> {
    const org = this.config.organization;
    this.logger.log(`📊 Starting analysis for organization: ${org}`);

    this.logger.log('🔍 Fetching repositories...');
    const repos = await this.github.listOrganizationRepos({ org });
    this.logger.log(`Found ${repos.length} repositories`);

    const progress = new LoggerProgress(repos.length, this.logger);
    const analyses: RepositoryAnalysis[] = [];
    for (const repo of repos) {
      analyses.push(await this.analyzer.analyze(repo, progress));
    }

    this.logger.log('📈 Calculating organization statistics...');
    const stats = this.aggregator.aggregate(analyses);

    this.logger.log('📝 Generating report...');
    const generatedAt = now();
    const markdown = this.renderer.render(analyses, stats, {
      organization: org,
      generatedAt,
      activeSort: this.config.activeRepoSort,
    });

    const reportPath = await this.writer.write(org, markdown, generatedAt);
    this.logger.log(`✅ Analysis complete! Report saved to: ${reportPath}`);

    return { reportPath, stats, analyses };
  }
}
