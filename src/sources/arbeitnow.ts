import { JsonApiSource, type Endpoint, type JobField } from './json-api';
import { epochToIso, isRecord, type FieldTable } from './mapping';
import type { EmploymentType } from '../types/job';
import { ShapeError } from '../utils/http';

/**
 * ArbeitNow job board API adapter
 * API Documentation: https://www.arbeitnow.com/api/job-board-api
 */
export class ArbeitNowSource extends JsonApiSource {
  readonly name = 'arbeitnow';
  private readonly apiUrl = 'https://www.arbeitnow.com/api/job-board-api';

  protected readonly fields: FieldTable<JobField> = {
    title: { path: 'title', fallback: '' },
    description: { path: 'description', fallback: '' },
    company: { path: 'company_name' },
    location: { path: 'location', fallback: '' },
    // created_at is a unix timestamp in seconds
    postedAt: { path: 'created_at', format: epochToIso('seconds') },
    skills: { path: 'tags' },
    experience: { path: 'experience_level' },
    url: { path: 'url' },
  };

  protected endpoints(): Endpoint[] {
    return [{ url: this.apiUrl, label: 'job-board-api' }];
  }

  protected extractItems(body: unknown): unknown[] {
    const data = isRecord(body) ? body.data : undefined;
    if (!Array.isArray(data)) {
      throw new ShapeError('ArbeitNow response has no data array');
    }
    return data;
  }

  protected employmentType(raw: unknown): EmploymentType {
    return isRecord(raw) && raw.remote === true ? 'Remote' : 'Hybrid/OnSite';
  }
}
