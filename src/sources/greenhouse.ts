import { JsonApiSource, type Endpoint, type JobField } from './json-api';
import { isRecord, type FieldLookup, type FieldTable } from './mapping';
import type { EmploymentType } from '../types/job';
import type { HttpClient } from '../utils/http';
import type { JobFilter } from '../filters/job-filter';
import { ShapeError } from '../utils/http';

function departmentNames(value: unknown): string | undefined {
  if (!Array.isArray(value)) return undefined;
  return value
    .map(department => (isRecord(department) && typeof department.name === 'string' ? department.name.trim() : ''))
    .filter(name => name.length > 0)
    .join(', ');
}

/**
 * Greenhouse job board adapter, one request per board token
 * API Documentation: https://developers.greenhouse.io/job-board.html
 */
export class GreenhouseSource extends JsonApiSource {
  readonly name = 'greenhouse';

  protected readonly fields: FieldTable<JobField> = {
    title: { path: 'title', fallback: '' },
    description: { path: 'content', fallback: '' },
    company: { path: 'company_name' },
    location: { path: 'location.name', fallback: '' },
    // updated_at moves on every edit; only the first publication date counts
    postedAt: { path: 'first_published' },
    skills: { path: 'departments', format: departmentNames },
    experience: { path: null },
    url: { path: 'absolute_url' },
  };

  constructor(
    http: HttpClient,
    filter: JobFilter,
    private readonly boards: readonly string[]
  ) {
    super(http, filter);
  }

  protected endpoints(): Endpoint[] {
    return this.boards.map(board => ({
      url: `https://boards-api.greenhouse.io/v1/boards/${encodeURIComponent(board)}/jobs?content=true`,
      label: board,
      company: board,
    }));
  }

  protected extractItems(body: unknown): unknown[] {
    const jobs = isRecord(body) ? body.jobs : undefined;
    if (!Array.isArray(jobs)) {
      throw new ShapeError('Greenhouse response has no jobs array');
    }
    return jobs;
  }

  protected employmentType(_raw: unknown, field: FieldLookup<JobField>): EmploymentType {
    return field('location').toLowerCase().includes('remote') ? 'Remote' : 'Hybrid/OnSite';
  }
}
