import { Inject, Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ANALYZER_CONFIG } from '../config/analyzer-config.js';
import type { AnalyzerConfig } from '../config/analyzer-config.js';
import { fileTimestamp } from './format.js';

@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);

  constructor(@Inject(ANALYZER_CONFIG) private readonly config: AnalyzerConfig) {}

  reportPath(organization: string, generatedAt: Date): string {
    return join(
      this.config.outputDir,
      `${organization}_${fileTimestamp(generatedAt)}.md`,
    );
  }

  /** Writes the report as UTF-8 and returns its path. */
  async write(
    organization: string,
    markdown: string,
    generatedAt: Date,
  ): Promise<string> {
    const path = this.reportPath(organization, generatedAt);
    await writeFile(path, markdown, 'utf-8');
    this.logger.debug(`wrote ${Buffer.byteLength(markdown, 'utf-8')} bytes to ${path}`);
    return path;
  }
}
