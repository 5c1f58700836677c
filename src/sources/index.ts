import type { JobSource } from './base';
import type { Config } from '../config';
import type { HttpClient } from '../utils/http';
import { JobFilter } from '../filters/job-filter';
import { RemotiveSource } from './remotive';
import { ArbeitNowSource } from './arbeitnow';
import { RemoteOKSource } from './remoteok';
import { WeWorkRemotelySource } from './weworkremotely';
import { GreenhouseSource } from './greenhouse';
import { LeverSource } from './lever';
import { PatternScrapeSource } from './html-scrape';
import { indeedContract, linkedInContract } from './scrape-contracts';

/**
 * Factory function to create enabled job sources based on configuration.
 * The order of the returned list is the order jobs appear in the digest.
 */
export function createJobSources(
  config: Config,
  http: HttpClient,
  filter: JobFilter = new JobFilter(config.filters)
): JobSource[] {
  const sources: JobSource[] = [];

  if (config.enableRemotive) {
    sources.push(new RemotiveSource(http, filter));
  }

  if (config.enableArbeitNow) {
    sources.push(new ArbeitNowSource(http, filter));
  }

  if (config.enableRemoteOK) {
    sources.push(new RemoteOKSource(http, filter));
  }

  if (config.enableWWR) {
    sources.push(new WeWorkRemotelySource(http, filter));
  }

  if (config.greenhouseBoards.length > 0) {
    sources.push(new GreenhouseSource(http, filter, config.greenhouseBoards));
  }

  if (config.leverCompanies.length > 0) {
    sources.push(new LeverSource(http, filter, config.leverCompanies));
  }

  if (config.enableLinkedIn) {
    sources.push(
      new PatternScrapeSource(linkedInContract, http, filter, config.scrapeKeywords, config.scrapeLocation)
    );
  }

  if (config.enableIndeed) {
    sources.push(
      new PatternScrapeSource(indeedContract, http, filter, config.scrapeKeywords, config.scrapeLocation)
    );
  }

  return sources;
}
