import { JsonApiSource, type Endpoint, type JobField } from './json-api';
import { isRecord, type FieldTable } from './mapping';
import type { EmploymentType } from '../types/job';
import { ShapeError } from '../utils/http';

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 */
export class RemoteOKSource extends JsonApiSource {
  readonly name = 'remoteok';
  private readonly apiUrl = 'https://remoteok.com/api';

  protected readonly fields: FieldTable<JobField> = {
    title: { path: 'position', fallback: '' },
    description: { path: 'description', fallback: '' },
    company: { path: 'company' },
    location: { path: 'location', fallback: 'Remote' },
    postedAt: { path: 'date' },
    skills: { path: 'tags' },
    experience: { path: null },
    url: { path: 'url' },
  };

  protected endpoints(): Endpoint[] {
    return [{ url: this.apiUrl, label: 'api' }];
  }

  /**
   * The first element is a legal notice; only objects with an id are jobs.
   */
  protected extractItems(body: unknown): unknown[] {
    if (!Array.isArray(body)) {
      throw new ShapeError(`RemoteOK API returned non-array data: ${typeof body}`);
    }
    return body.filter(item => isRecord(item) && item.id !== undefined && item.id !== null);
  }

  protected employmentType(): EmploymentType {
    return 'Remote';
  }
}
