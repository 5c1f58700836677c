import { loadConfig } from '../config';
import { runJobAlerts } from '../services/job-alert-run';
import { logger } from '../utils/logger';

/**
 * One-shot job alert run, meant for an external scheduler.
 * Exits 0 whatever the sources or the channel did; the log tells the story.
 */
async function runOnce(): Promise<void> {
  try {
    logger.info('Job alert run started');

    const config = loadConfig();
    const summary = await runJobAlerts(config);

    logger.info('Job alert run finished', {
      jobsFound: summary.jobsFound,
      delivery: summary.delivery,
    });
  } catch (error) {
    logger.error('Job alert run crashed', error);
  }
  process.exit(0);
}

void runOnce();
