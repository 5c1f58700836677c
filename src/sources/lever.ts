import { JsonApiSource, type Endpoint, type JobField } from './json-api';
import { epochToIso, isRecord, type FieldTable } from './mapping';
import type { EmploymentType } from '../types/job';
import type { HttpClient } from '../utils/http';
import type { JobFilter } from '../filters/job-filter';
import { ShapeError } from '../utils/http';

/**
 * Lever public postings adapter, one request per company account
 * API Documentation: https://github.com/lever/postings-api
 */
export class LeverSource extends JsonApiSource {
  readonly name = 'lever';

  protected readonly fields: FieldTable<JobField> = {
    title: { path: 'text', fallback: '' },
    description: { path: 'descriptionPlain', fallback: '' },
    company: { path: null },
    location: { path: 'categories.location', fallback: '' },
    // createdAt is a unix timestamp in milliseconds
    postedAt: { path: 'createdAt', format: epochToIso('milliseconds') },
    skills: { path: 'categories.team' },
    experience: { path: 'categories.level' },
    url: { path: 'hostedUrl' },
  };

  constructor(
    http: HttpClient,
    filter: JobFilter,
    private readonly companies: readonly string[]
  ) {
    super(http, filter);
  }

  protected endpoints(): Endpoint[] {
    return this.companies.map(company => ({
      url: `https://api.lever.co/v0/postings/${encodeURIComponent(company)}?mode=json`,
      label: company,
      company,
    }));
  }

  protected extractItems(body: unknown): unknown[] {
    if (!Array.isArray(body)) {
      throw new ShapeError(`Lever API returned non-array data: ${typeof body}`);
    }
    return body;
  }

  protected employmentType(raw: unknown): EmploymentType {
    const workplace = isRecord(raw) && typeof raw.workplaceType === 'string'
      ? raw.workplaceType.toLowerCase()
      : '';
    if (workplace === 'remote') return 'Remote';
    if (workplace === 'hybrid' || workplace === 'onsite') return 'Hybrid/OnSite';
    return 'Unknown';
  }
}
