import { Module } from '@nestjs/common';
import { GithubModule } from '../github/github.module.js';
import { RepositoryAnalyzerService } from './repository-analyzer.service.js';
import { OrganizationAggregatorService } from './organization-aggregator.service.js';

@Module({
  imports: [GithubModule],
  providers: [RepositoryAnalyzerService, OrganizationAggregatorService],
  exports: [RepositoryAnalyzerService, OrganizationAggregatorService],
})
export class AnalysisModule {}
