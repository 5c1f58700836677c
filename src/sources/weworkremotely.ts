import Parser from 'rss-parser';
import type { JobSource } from './base';
import type { HttpClient } from '../utils/http';
import type { JobFilter } from '../filters/job-filter';
import {
  createJobRecord,
  NO_SKILLS,
  NOT_SPECIFIED,
  UNKNOWN_COMPANY,
  type JobRecord,
} from '../types/job';
import { describeError, logger } from '../utils/logger';

interface WwrItem {
  region?: string;
}

/**
 * Splits "Company: Job Title". Falls back to the whole string as the title.
 */
export function splitFeedTitle(raw: string): { company: string; title: string } {
  const colonMatch = raw.match(/^(.+?):\s*(.+)$/);
  if (colonMatch) {
    return { company: colonMatch[1].trim(), title: colonMatch[2].trim() };
  }
  return { company: UNKNOWN_COMPANY, title: raw.trim() };
}

/**
 * WeWorkRemotely RSS adapter
 * RSS Feed: https://weworkremotely.com/categories/remote-programming-jobs.rss
 */
export class WeWorkRemotelySource implements JobSource {
  readonly name = 'weworkremotely';
  private readonly rssUrl = 'https://weworkremotely.com/categories/remote-programming-jobs.rss';
  private readonly parser: Parser<Record<string, unknown>, WwrItem>;

  constructor(
    private readonly http: HttpClient,
    private readonly filter: JobFilter
  ) {
    this.parser = new Parser<Record<string, unknown>, WwrItem>({
      customFields: {
        item: ['region'],
      },
    });
  }

  async fetchJobs(): Promise<JobRecord[]> {
    try {
      logger.info(`Fetching jobs from ${this.name}`);

      const xml = await this.http.getText(this.rssUrl);
      const feed = await this.parser.parseString(xml);
      const items = feed.items ?? [];

      const jobs: JobRecord[] = [];
      let skippedFiltered = 0;
      let skippedInvalid = 0;

      for (const item of items) {
        if (!item.title || !item.link) {
          skippedInvalid++;
          continue;
        }

        const { company, title } = splitFeedTitle(item.title);
        const region = item.region?.trim();
        // Every listing on this board is remote
        const location = region ? `Remote - ${region}` : 'Remote';

        if (
          !this.filter.matchesRole(title, item.contentSnippet) ||
          !this.filter.matchesLocation(location) ||
          !this.filter.withinWindow(item.isoDate)
        ) {
          skippedFiltered++;
          continue;
        }

        const job = createJobRecord({
          title,
          company,
          location,
          employmentType: 'Remote',
          experienceLevel: NOT_SPECIFIED,
          skills: item.categories?.join(', ') || NO_SKILLS,
          postingUrl: item.link,
          sourceName: this.name,
        });
        if (job) jobs.push(job);
      }

      logger.info(`Fetched ${jobs.length} jobs from ${this.name}`, {
        totalItems: items.length,
        kept: jobs.length,
        skippedFiltered,
        skippedInvalid,
      });
      return jobs;
    } catch (error) {
      logger.warn(`Source ${this.name} failed`, {
        source: this.name,
        ...describeError(error),
      });
      return [];
    }
  }
}
