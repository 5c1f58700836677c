import type { JobSource } from '../sources/base';
import type { JobRecord } from '../types/job';
import { describeError, logger } from '../utils/logger';

export interface SourceStats {
  fetched: number;
  errors: number;
}

export interface AggregationResult {
  jobs: JobRecord[];
  stats: Record<string, SourceStats>;
}

/**
 * Orchestrates job fetching from all sources
 */
export class JobAggregator {
  constructor(private readonly sources: readonly JobSource[]) {}

  /**
   * Runs every source one after another, in registration order,
   * and concatenates what they return. No deduplication, no cap.
   */
  async collect(): Promise<AggregationResult> {
    const stats: Record<string, SourceStats> = {};
    const allJobs: JobRecord[] = [];

    for (const source of this.sources) {
      const sourceStats: SourceStats = { fetched: 0, errors: 0 };

      try {
        logger.info(`Fetching from source: ${source.name}`);

        const jobs = await source.fetchJobs();
        sourceStats.fetched = jobs.length;
        allJobs.push(...jobs);

        logger.info(`Source ${source.name} completed`, { fetched: jobs.length });
      } catch (error) {
        // Sources handle their own failures; this only catches one that breaks that contract
        sourceStats.errors = 1;
        logger.error(`Source ${source.name} failed`, error, {
          source: source.name,
          errorClass: describeError(error).errorClass,
        });
      }

      stats[source.name] = sourceStats;
    }

    return { jobs: allJobs, stats };
  }
}
