import { JsonApiSource, type Endpoint, type JobField } from './json-api';
import { isRecord, type FieldLookup, type FieldTable } from './mapping';
import { NOT_SPECIFIED, type EmploymentType } from '../types/job';
import { ShapeError } from '../utils/http';

/**
 * Remotive API adapter
 * API Documentation: https://remotive.com/api/remote-jobs
 */
export class RemotiveSource extends JsonApiSource {
  readonly name = 'remotive';
  private readonly apiUrl = 'https://remotive.com/api/remote-jobs';

  protected readonly fields: FieldTable<JobField> = {
    title: { path: 'title', fallback: '' },
    description: { path: 'description', fallback: '' },
    company: { path: 'company_name' },
    location: { path: 'candidate_required_location', fallback: '' },
    postedAt: { path: 'publication_date' },
    skills: { path: 'tags' },
    experience: { path: null },
    url: { path: 'url' },
  };

  protected endpoints(): Endpoint[] {
    return [{ url: this.apiUrl, label: 'remote-jobs' }];
  }

  protected extractItems(body: unknown): unknown[] {
    const jobs = isRecord(body) ? body.jobs : undefined;
    if (!Array.isArray(jobs)) {
      throw new ShapeError('Remotive response has no jobs array');
    }
    return jobs;
  }

  protected employmentType(): EmploymentType {
    return 'Remote';
  }

  // Remotive has no experience field; label entry-level postings from their title
  protected experienceLevel(field: FieldLookup<JobField>): string {
    return this.filter.matchesExperience(field('title'))
      ? 'Entry-level'
      : NOT_SPECIFIED;
  }
}
