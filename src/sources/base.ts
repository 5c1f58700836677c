import type { JobRecord } from '../types/job';

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Fetches jobs that pass the source's filters.
   * Failures are logged by the source and yield an empty (or partial) list; this never rejects.
   */
  fetchJobs(): Promise<JobRecord[]>;
}
