import type { JobSource } from './base';
import type { ScrapeContract } from './scrape-contracts';
import type { HttpClient } from '../utils/http';
import type { JobFilter } from '../filters/job-filter';
import {
  createJobRecord,
  NO_SKILLS,
  NOT_SPECIFIED,
  UNKNOWN_COMPANY,
  type JobRecord,
} from '../types/job';
import {
  collapseWhitespace,
  decodeEntities,
  stripTags,
  unescapeJsonString,
} from '../utils/text';
import { describeError, logger } from '../utils/logger';

export interface ScrapedListing {
  title: string;
  company: string;
  postingUrl: string;
}

function cleanCapture(raw: string, contract: ScrapeContract): string {
  const text = contract.captureFormat === 'json-string' ? unescapeJsonString(raw) : raw;
  return collapseWhitespace(decodeEntities(stripTags(text)));
}

function captures(body: string, pattern: RegExp, contract: ScrapeContract): string[] {
  return Array.from(body.matchAll(pattern), match => cleanCapture(match[1] ?? '', contract));
}

/**
 * Runs a contract's patterns over a page and pairs the captures by position.
 * The result is as long as the shortest capture list.
 */
export function extractListings(body: string, contract: ScrapeContract): ScrapedListing[] {
  const titles = captures(body, contract.patterns.title, contract);
  const companies = captures(body, contract.patterns.company, contract);
  const links = captures(body, contract.patterns.link, contract);
  const count = Math.min(titles.length, companies.length, links.length);

  if (count !== Math.max(titles.length, companies.length, links.length)) {
    logger.debug(`Uneven captures for ${contract.name}`, {
      version: contract.version,
      titles: titles.length,
      companies: companies.length,
      links: links.length,
    });
  }

  const listings: ScrapedListing[] = [];
  for (let i = 0; i < count; i++) {
    listings.push({
      title: titles[i],
      company: companies[i],
      postingUrl: links[i] ? contract.toPostingUrl(links[i]) : '',
    });
  }
  return listings;
}

/**
 * Search-page adapter: one request per configured keyword, fields pulled out
 * of the raw page by the contract's patterns. Only the role filter applies,
 * since result pages carry no usable location or date per listing.
 */
export class PatternScrapeSource implements JobSource {
  readonly name: string;

  constructor(
    private readonly contract: ScrapeContract,
    private readonly http: HttpClient,
    private readonly filter: JobFilter,
    private readonly keywords: readonly string[],
    private readonly location: string
  ) {
    this.name = contract.name;
  }

  async fetchJobs(): Promise<JobRecord[]> {
    const jobs: JobRecord[] = [];

    for (const keyword of this.keywords) {
      try {
        const url = this.contract.searchUrl(keyword, this.location);
        logger.info(`Fetching jobs from ${this.name}`, { keyword });

        const body = await this.http.getText(url);
        const listings = extractListings(body, this.contract);
        let kept = 0;

        for (const listing of listings) {
          if (!this.filter.matchesRole(listing.title)) continue;

          const job = createJobRecord({
            title: listing.title,
            company: listing.company || UNKNOWN_COMPANY,
            location: this.location,
            employmentType: 'Unknown',
            experienceLevel: NOT_SPECIFIED,
            skills: NO_SKILLS,
            postingUrl: listing.postingUrl,
            sourceName: this.name,
          });
          if (job) {
            jobs.push(job);
            kept++;
          }
        }

        logger.info(`Fetched ${kept} jobs from ${this.name}`, {
          keyword,
          extracted: listings.length,
          kept,
          contractVersion: this.contract.version,
        });
      } catch (error) {
        logger.warn(`Source ${this.name} failed`, {
          source: this.name,
          keyword,
          ...describeError(error),
        });
      }
    }

    return jobs;
  }
}
