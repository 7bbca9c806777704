import { Module } from '@nestjs/common';
import { MarkdownReportService } from './markdown-report.service.js';
import { ReportWriterService } from './report-writer.service.js';

@Module({
  providers: [MarkdownReportService, ReportWriterService],
  exports: [MarkdownReportService, ReportWriterService],
})
export class ReportModule {}
