import { MarkdownReportService } from '../markdown-report.service.js';
import { OrganizationAggregatorService } from '../../analysis/organization-aggregator.service.js';
import type { RepositoryAnalysis } from '../../analysis/types.js';
import { buildAnalysis } from '../../__tests__/fixtures.js';

const renderer = new MarkdownReportService();
const aggregator = new OrganizationAggregatorService();

// local time, so the footer does not depend on the machine's time zone
const generatedAt = new Date(2024, 4, 1, 12, 0, 0);

const render = (
  analyses: RepositoryAnalysis[],
  activeSort?: 'name' | 'updated',
  at = generatedAt,
) =>
  renderer.render(analyses, aggregator.aggregate(analyses), {
    organization: 'acme',
    generatedAt: at,
    activeSort,
  });

const headings = (markdown: string) =>
  markdown.split('\n').filter((line) => line.startsWith('### '));

describe('MarkdownReportService', () => {
  it('renders one active and one archived repository', () => {
    const markdown = render([
      buildAnalysis({ name: 'A', language: 'Go', stars: 5 }),
      buildAnalysis({
        name: 'B',
        language: 'Go',
        stars: 2,
        archived: true,
        description: 'Old service',
      }),
    ]);

    expect(markdown).toBe(
      [
        '# acme / GitHub Repositories Insights Report',
        '',
        '## Organization Overview',
        '- Total Repositories: 2',
        '- Active Repositories: 1',
        '- Archived Repositories: 1',
        '- Total Size: 0.00 MB',
        '- Total Contributors: 0',
        '- Total Stars: 7',
        '- Total Forks: 0',
        '',
        '## Language Distribution',
        '- Go: 2 repos (100.0%)',
        '',
        '## Active Repositories',
        '',
        '### [A](https://github.com/acme/A)',
        '**Description:** N/A',
        '**Language:** Go',
        '**Statistics:**',
        '- Stars: 5',
        '- Forks: 0',
        '- Contributors: 0',
        '- Open Issues: 0',
        '- Size: 0.00 MB',
        '- Branches: 1',
        '- License: N/A',
        '**Created:** 2023-01-15',
        '**Last Updated:** 2024-02-20',
        '',
        '## Archived Repositories',
        '',
        '### [B](https://github.com/acme/B)',
        '- Language: Go',
        '- Last Updated: 2024-02-20',
        '- Description: Old service',
        '',
        '---',
        '*Report generated on: 2024-05-01 12:00:00*',
        '',
      ].join('\n'),
    );
  });

  it('renders repository details, topics and licenses', () => {
    const markdown = render([
      buildAnalysis({
        name: 'widgets',
        description: 'Widget factory',
        language: 'TypeScript',
        topics: ['cli', 'reports'],
        license: 'MIT License',
        stars: 12,
        forks: 3,
        contributorsCount: 4,
        openIssues: 6,
        sizeKb: 1536,
        branchCount: 5,
      }),
    ]);

    expect(markdown).toContain(
      [
        '## Popular Topics',
        '- cli: 1 repos',
        '- reports: 1 repos',
        '',
        '## License Distribution',
        '- MIT License: 1 repos',
      ].join('\n'),
    );
    expect(markdown).toContain(
      [
        '### [widgets](https://github.com/acme/widgets)',
        '**Description:** Widget factory',
        '**Language:** TypeScript',
        '**Topics:** cli, reports',
        '**Statistics:**',
        '- Stars: 12',
        '- Forks: 3',
        '- Contributors: 4',
        '- Open Issues: 6',
        '- Size: 1.50 MB',
        '- Branches: 5',
        '- License: MIT License',
      ].join('\n'),
    );
    expect(markdown).toContain('- Total Size: 1.50 MB');
    expect(markdown).not.toContain('## Archived Repositories');
  });

  it('renders an empty organization without distribution or repository sections', () => {
    expect(render([])).toBe(
      [
        '# acme / GitHub Repositories Insights Report',
        '',
        '## Organization Overview',
        '- Total Repositories: 0',
        '- Active Repositories: 0',
        '- Archived Repositories: 0',
        '- Total Size: 0.00 MB',
        '- Total Contributors: 0',
        '- Total Stars: 0',
        '- Total Forks: 0',
        '',
        '---',
        '*Report generated on: 2024-05-01 12:00:00*',
        '',
      ].join('\n'),
    );
  });

  it('sorts active repositories by name by default', () => {
    const analyses = [
      buildAnalysis({ name: 'zeta', updatedAt: new Date('2024-05-01T00:00:00Z') }),
      buildAnalysis({ name: 'Alpha', updatedAt: new Date('2022-01-01T00:00:00Z') }),
      buildAnalysis({ name: 'beta', updatedAt: new Date('2023-01-01T00:00:00Z') }),
    ];

    expect(headings(render(analyses))).toEqual([
      '### [Alpha](https://github.com/acme/Alpha)',
      '### [beta](https://github.com/acme/beta)',
      '### [zeta](https://github.com/acme/zeta)',
    ]);
    expect(headings(render(analyses, 'updated'))).toEqual([
      '### [zeta](https://github.com/acme/zeta)',
      '### [beta](https://github.com/acme/beta)',
      '### [Alpha](https://github.com/acme/Alpha)',
    ]);
  });

  it('sorts archived repositories by last update, newest first', () => {
    const markdown = render([
      buildAnalysis({
        name: 'older',
        archived: true,
        updatedAt: new Date('2021-06-01T00:00:00Z'),
      }),
      buildAnalysis({
        name: 'newer',
        archived: true,
        updatedAt: new Date('2023-06-01T00:00:00Z'),
      }),
    ]);

    expect(headings(markdown)).toEqual([
      '### [newer](https://github.com/acme/newer)',
      '### [older](https://github.com/acme/older)',
    ]);
    expect(markdown).not.toContain('## Active Repositories');
    expect(markdown).not.toContain('- Description:');
  });

  it('lists at most ten topics, most common first', () => {
    const topics = Array.from({ length: 12 }, (_, i) => `topic-${i + 1}`);
    const markdown = render([
      buildAnalysis({ name: 'one', topics }),
      buildAnalysis({ name: 'two', topics: ['topic-12'] }),
    ]);

    const topicLines = markdown
      .split('## Popular Topics\n')[1]
      .split('\n\n')[0]
      .split('\n');

    expect(topicLines).toHaveLength(10);
    expect(topicLines[0]).toBe('- topic-12: 2 repos');
    expect(topicLines[1]).toBe('- topic-1: 1 repos');
    expect(topicLines[9]).toBe('- topic-9: 1 repos');
  });

  it('language percentages add up to 100 when every repository has one', () => {
    const markdown = render([
      buildAnalysis({ name: 'a', language: 'Rust' }),
      buildAnalysis({ name: 'b', language: 'Go' }),
      buildAnalysis({ name: 'c', language: 'Rust' }),
    ]);

    const percentages = [...markdown.matchAll(/repos \((\d+\.\d)%\)/g)].map(
      (m) => Number(m[1]),
    );

    expect(percentages).toEqual([66.7, 33.3]);
    expect(percentages.reduce((sum, p) => sum + p, 0)).toBeCloseTo(100, 1);
  });

  it('is deterministic apart from the generation timestamp', () => {
    const analyses = [
      buildAnalysis({ name: 'a', language: 'Go', topics: ['x'] }),
      buildAnalysis({ name: 'b', archived: true }),
    ];

    const first = render(analyses);
    const second = render(analyses);
    const later = render(analyses, 'name', new Date(2024, 4, 2, 8, 30, 5));

    expect(second).toBe(first);

    const firstLines = first.split('\n');
    const laterLines = later.split('\n');
    const footer = firstLines.length - 2;
    expect(laterLines.slice(0, footer)).toEqual(firstLines.slice(0, footer));
    expect(laterLines[footer]).toBe('*Report generated on: 2024-05-02 08:30:05*');
  });
});
