import { Global, Module } from '@nestjs/common';
import type { DynamicModule } from '@nestjs/common';
import { ANALYZER_CONFIG } from './analyzer-config.js';
import type { AnalyzerConfig } from './analyzer-config.js';

@Global()
@Module({})
export class AnalyzerConfigModule {
  /** Binds settings already validated by `loadAnalyzerConfig`. */
  static forRoot(config: AnalyzerConfig): DynamicModule {
    return {
      module: AnalyzerConfigModule,
      providers: [{ provide: ANALYZER_CONFIG, useValue: config }],
      exports: [ANALYZER_CONFIG],
    };
  }
}
