import { Logger } from '@nestjs/common';

/**
 * Observer notified by the analyzer around each repository. Purely
 * informational; nothing downstream reads it.
 */
export interface AnalysisProgress {
  describe(repoName: string): void;
  advance(): void;
}

export class LoggerProgress implements AnalysisProgress {
  private completed = 0;

  constructor(
    private readonly total: number,
    private readonly logger = new Logger('Progress'),
  ) {}

  describe(repoName: string): void {
    this.logger.log(`[${this.completed + 1}/${this.total}] Analyzing ${repoName}`);
  }

  advance(): void {
    this.completed += 1;
    if (this.completed === this.total) {
      this.logger.log(`Analyzed ${this.total} repositories`);
    }
  }
}
