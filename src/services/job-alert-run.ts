import type { Config } from '../config';
import type { JobSource } from '../sources/base';
import type { HttpClient } from '../utils/http';
import { FetchHttpClient } from '../utils/http';
import { JobFilter } from '../filters/job-filter';
import { createJobSources } from '../sources';
import { JobAggregator, type SourceStats } from './job-aggregator';
import { PresentationBuilder } from './presentation';
import { NotificationDispatcher, type DeliveryReport, type NotificationChannel } from './notification-dispatcher';
import { TelegramChannel } from './telegram-channel';
import { logger } from '../utils/logger';

export interface RunDependencies {
  http?: HttpClient;
  sources?: JobSource[];
  /** null forces delivery to be skipped */
  channel?: NotificationChannel | null;
  clock?: () => Date;
}

export interface RunSummary {
  jobsFound: number;
  jobsShown: number;
  sourceStats: Record<string, SourceStats>;
  delivery: DeliveryReport;
  durationMs: number;
}

function defaultChannel(config: Config): NotificationChannel | null {
  return config.telegram ? TelegramChannel.fromConfig(config.telegram) : null;
}

/**
 * One aggregation-and-delivery pass
 */
export async function runJobAlerts(config: Config, deps: RunDependencies = {}): Promise<RunSummary> {
  const startTime = Date.now();

  const http = deps.http ?? new FetchHttpClient(config.requestTimeoutMs);
  const filter = new JobFilter(config.filters, deps.clock);
  const sources = deps.sources ?? createJobSources(config, http, filter);
  const channel = deps.channel === undefined ? defaultChannel(config) : deps.channel;

  logger.info(`Initialized ${sources.length} job source(s)`, {
    sourceNames: sources.map(s => s.name),
    windowHours: config.filters.windowHours,
    channelConfigured: channel !== null,
  });

  // Step 1: Fetch jobs from all sources
  const { jobs, stats } = await new JobAggregator(sources).collect();
  logger.info(`Fetched ${jobs.length} jobs total`, { stats });

  // Step 2: Render
  const presentation = new PresentationBuilder({
    maxJobs: config.maxJobsInDigest,
    alertLabel: config.alertLabel,
    windowHours: config.filters.windowHours,
  });
  const fragments = presentation.buildFragments(jobs);

  // Step 3: Deliver
  const dispatcher = new NotificationDispatcher(channel, config.deliveryPageSize);
  const delivery = await dispatcher.deliver({
    total: jobs.length,
    header: presentation.formatHeader(jobs.length),
    emptyText: presentation.formatEmpty(),
    fragments,
  });

  const summary: RunSummary = {
    jobsFound: jobs.length,
    jobsShown: Math.min(jobs.length, config.maxJobsInDigest),
    sourceStats: stats,
    delivery,
    durationMs: Date.now() - startTime,
  };

  logger.info('Job alert run completed', {
    jobsFound: summary.jobsFound,
    jobsShown: summary.jobsShown,
    delivery: delivery.outcome,
    duration: `${summary.durationMs}ms`,
  });

  return summary;
}
