// src/app.module.ts
import { Module } from '@nestjs/common';
import type { DynamicModule } from '@nestjs/common';

import type { AnalyzerConfig } from './config/analyzer-config.js';
import { AnalyzerConfigModule } from './config/config.module.js';
import { GithubModule } from './github/github.module.js';
import { AnalysisModule } from './analysis/analysis.module.js';
import { ReportModule } from './report/report.module.js';
import { PipelineModule } from './pipeline/pipeline.module.js';

@Module({})
export class AppModule {
  static forConfig(config: AnalyzerConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        AnalyzerConfigModule.forRoot(config),
        GithubModule,
        AnalysisModule,
        ReportModule,
        PipelineModule,
      ],
    };
  }
}
