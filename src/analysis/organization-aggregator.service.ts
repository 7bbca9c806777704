import { Injectable } from '@nestjs/common';
import { FrequencyCounter } from './frequency-counter.js';
import type { OrganizationStats, RepositoryAnalysis } from './types.js';

@Injectable()
export class OrganizationAggregatorService {
  /** Single pass over the analyses; any input, including none, is valid. */
  aggregate(analyses: readonly RepositoryAnalysis[]): OrganizationStats {
    const languages = new FrequencyCounter();
    const topics = new FrequencyCounter();
    const licenses = new FrequencyCounter();

    let contributors = 0;
    let forks = 0;
    let stars = 0;
    let totalSizeKb = 0;
    let archivedRepos = 0;

    for (const a of analyses) {
      if (a.language) languages.increment(a.language);
      for (const topic of a.topics) {
        if (topic) topics.increment(topic);
      }
      if (a.license) licenses.increment(a.license);

      contributors += a.contributorsCount;
      forks += a.forks;
      stars += a.stars;
      totalSizeKb += a.sizeKb;
      if (a.archived) archivedRepos += 1;
    }

    return {
      totalRepos: analyses.length,
      activeRepos: analyses.length - archivedRepos,
      archivedRepos,
      totalSizeKb,
      languages,
      topics,
      licenses,
      contributors,
      forks,
      stars,
    };
  }
}
