import { Injectable } from '@nestjs/common';
import type { ActiveRepoSort } from '../config/analyzer-config.js';
import type { OrganizationStats, RepositoryAnalysis } from '../analysis/types.js';
import { isoDate, kbToMb, localDateTime, percentage } from './format.js';

export interface RenderOptions {
  organization: string;
  generatedAt: Date;
  activeSort?: ActiveRepoSort;
}

const TOP_TOPICS = 10;

type Comparator = (a: RepositoryAnalysis, b: RepositoryAnalysis) => number;

const byName: Comparator = (a, b) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

const byUpdatedDesc: Comparator = (a, b) =>
  b.updatedAt.getTime() - a.updatedAt.getTime();

const ACTIVE_SORTS: Record<ActiveRepoSort, Comparator> = {
  name: byName,
  updated: byUpdatedDesc,
};

/**
 * Renders the organization report. Blocks are separated by a blank line and
 * the output depends only on its arguments.
 */
@Injectable()
export class MarkdownReportService {
  render(
    analyses: readonly RepositoryAnalysis[],
    stats: OrganizationStats,
    options: RenderOptions,
  ): string {
    const blocks: string[][] = [
      [`# ${options.organization} / GitHub Repositories Insights Report`],
      this.overview(stats),
      ...this.distributions(stats),
      ...this.activeRepositories(analyses, options.activeSort ?? 'name'),
      ...this.archivedRepositories(analyses, stats),
      ['---', `*Report generated on: ${localDateTime(options.generatedAt)}*`],
    ];

    return blocks.map((lines) => lines.join('\n')).join('\n\n') + '\n';
  }

  private overview(stats: OrganizationStats): string[] {
    return [
      '## Organization Overview',
      `- Total Repositories: ${stats.totalRepos}`,
      `- Active Repositories: ${stats.activeRepos}`,
      `- Archived Repositories: ${stats.archivedRepos}`,
      `- Total Size: ${kbToMb(stats.totalSizeKb)} MB`,
      `- Total Contributors: ${stats.contributors}`,
      `- Total Stars: ${stats.stars}`,
      `- Total Forks: ${stats.forks}`,
    ];
  }

  private distributions(stats: OrganizationStats): string[][] {
    const blocks: string[][] = [];

    if (stats.languages.size > 0) {
      blocks.push([
        '## Language Distribution',
        ...stats.languages
          .mostCommon()
          .map(
            ([lang, count]) =>
              `- ${lang}: ${count} repos (${percentage(count, stats.totalRepos)}%)`,
          ),
      ]);
    }

    if (stats.topics.size > 0) {
      blocks.push([
        '## Popular Topics',
        ...stats.topics
          .mostCommon(TOP_TOPICS)
          .map(([topic, count]) => `- ${topic}: ${count} repos`),
      ]);
    }

    if (stats.licenses.size > 0) {
      blocks.push([
        '## License Distribution',
        ...stats.licenses
          .mostCommon()
          .map(([license, count]) => `- ${license}: ${count} repos`),
      ]);
    }

    return blocks;
  }

  private activeRepositories(
    analyses: readonly RepositoryAnalysis[],
    sort: ActiveRepoSort,
  ): string[][] {
    const active = analyses.filter((a) => !a.archived).sort(ACTIVE_SORTS[sort]);
    if (active.length === 0) return [];

    return [
      ['## Active Repositories'],
      ...active.map((a) => [
        `### [${a.name}](${a.url})`,
        `**Description:** ${a.description || 'N/A'}`,
        `**Language:** ${a.language || 'N/A'}`,
        ...(a.topics.length > 0 ? [`**Topics:** ${a.topics.join(', ')}`] : []),
        '**Statistics:**',
        `- Stars: ${a.stars}`,
        `- Forks: ${a.forks}`,
        `- Contributors: ${a.contributorsCount}`,
        `- Open Issues: ${a.openIssues}`,
        `- Size: ${kbToMb(a.sizeKb)} MB`,
        `- Branches: ${a.branchCount}`,
        `- License: ${a.license || 'N/A'}`,
        `**Created:** ${isoDate(a.createdAt)}`,
        `**Last Updated:** ${isoDate(a.updatedAt)}`,
      ]),
    ];
  }

  private archivedRepositories(
    analyses: readonly RepositoryAnalysis[],
    stats: OrganizationStats,
  ): string[][] {
    if (stats.archivedRepos === 0) return [];

    const archived = analyses.filter((a) => a.archived).sort(byUpdatedDesc);
    return [
      ['## Archived Repositories'],
      ...archived.map((a) => [
        `### [${a.name}](${a.url})`,
        `- Language: ${a.language || 'N/A'}`,
        `- Last Updated: ${isoDate(a.updatedAt)}`,
        ...(a.description ? [`- Description: ${a.description}`] : []),
      ]),
    ];
  }
}
