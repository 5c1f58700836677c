import type { JobSource } from './base';
import type { HttpClient } from '../utils/http';
import type { JobFilter } from '../filters/job-filter';
import { applyFieldTable, type FieldLookup, type FieldTable } from './mapping';
import {
  createJobRecord,
  NO_SKILLS,
  NOT_SPECIFIED,
  UNKNOWN_COMPANY,
  type EmploymentType,
  type JobRecord,
} from '../types/job';
import { describeError, logger } from '../utils/logger';

export type JobField =
  | 'title'
  | 'description'
  | 'company'
  | 'location'
  | 'postedAt'
  | 'skills'
  | 'experience'
  | 'url';

export interface Endpoint {
  url: string;
  label: string;
  /** Used when the item itself carries no company name */
  company?: string;
}

interface SkipCounts {
  role: number;
  location: number;
  window: number;
  noUrl: number;
}

/**
 * Shared flow for JSON APIs: one GET per endpoint, items mapped through the
 * source's field table, then role, location and recency filters.
 * An endpoint that fails is logged and skipped; the other endpoints still run.
 */
export abstract class JsonApiSource implements JobSource {
  abstract readonly name: string;
  protected abstract readonly fields: FieldTable<JobField>;

  constructor(
    protected readonly http: HttpClient,
    protected readonly filter: JobFilter
  ) {}

  protected abstract endpoints(): Endpoint[];

  /**
   * Pulls the item list out of a response body. Throws ShapeError on an unexpected body.
   */
  protected abstract extractItems(body: unknown): unknown[];

  protected abstract employmentType(raw: unknown, field: FieldLookup<JobField>): EmploymentType;

  protected experienceLevel(field: FieldLookup<JobField>): string {
    return field('experience') || NOT_SPECIFIED;
  }

  async fetchJobs(): Promise<JobRecord[]> {
    const jobs: JobRecord[] = [];

    for (const endpoint of this.endpoints()) {
      try {
        logger.info(`Fetching jobs from ${this.name}`, { endpoint: endpoint.label });

        const body = await this.http.getJson(endpoint.url);
        const items = this.extractItems(body);
        const skipped: SkipCounts = { role: 0, location: 0, window: 0, noUrl: 0 };
        let kept = 0;

        for (const item of items) {
          const job = this.toJob(item, endpoint, skipped);
          if (job) {
            jobs.push(job);
            kept++;
          }
        }

        logger.info(`Fetched ${kept} jobs from ${this.name}`, {
          endpoint: endpoint.label,
          totalItems: items.length,
          kept,
          skipped,
        });
      } catch (error) {
        logger.warn(`Source ${this.name} failed`, {
          source: this.name,
          endpoint: endpoint.label,
          ...describeError(error),
        });
      }
    }

    return jobs;
  }

  private toJob(raw: unknown, endpoint: Endpoint, skipped: SkipCounts): JobRecord | undefined {
    const field = applyFieldTable(raw, this.fields);
    const title = field('title');
    const location = field('location');

    if (!this.filter.matchesRole(title, field('description'))) {
      skipped.role++;
      return undefined;
    }
    if (!this.filter.matchesLocation(location)) {
      skipped.location++;
      return undefined;
    }
    if (!this.filter.withinWindow(field('postedAt'))) {
      skipped.window++;
      return undefined;
    }

    const job = createJobRecord({
      title,
      company: field('company') || endpoint.company || UNKNOWN_COMPANY,
      location,
      employmentType: this.employmentType(raw, field),
      experienceLevel: this.experienceLevel(field),
      skills: field('skills') || NO_SKILLS,
      postingUrl: field('url'),
      sourceName: this.name,
    });

    if (!job) {
      skipped.noUrl++;
      logger.debug(`Job without posting URL dropped`, { source: this.name, title });
    }
    return job;
  }
}
