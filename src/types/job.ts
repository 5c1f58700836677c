export type EmploymentType = 'Remote' | 'Hybrid/OnSite' | 'Unknown';

/**
 * Normalized job schema
 * All job sources must be normalized to this structure
 */
export interface JobRecord {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly employmentType: EmploymentType;
  readonly experienceLevel: string;
  readonly skills: string;
  readonly postingUrl: string;
  readonly sourceName: string;
}

export const UNKNOWN_COMPANY = 'Unknown Company';
export const NOT_SPECIFIED = 'Not specified';
export const NO_SKILLS = 'N/A';

/**
 * Builds a frozen job record.
 * Returns undefined when there is no posting URL to link to.
 */
export function createJobRecord(fields: JobRecord): JobRecord | undefined {
  const postingUrl = fields.postingUrl.trim();
  if (!postingUrl) {
    return undefined;
  }

  return Object.freeze({ ...fields, postingUrl });
}
