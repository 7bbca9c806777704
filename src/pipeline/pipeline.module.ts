import { Module } from '@nestjs/common';
import { AnalysisPipelineService } from './pipeline.service.js';
import { GithubModule } from '../github/github.module.js';
import { AnalysisModule } from '../analysis/analysis.module.js';
import { ReportModule } from '../report/report.module.js';

@Module({
  imports: [GithubModule, AnalysisModule, ReportModule],
  providers: [AnalysisPipelineService],
  exports: [AnalysisPipelineService],
})
export class PipelineModule {}
