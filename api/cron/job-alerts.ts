import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { runJobAlerts } from '../../src/services/job-alert-run';
import { logger } from '../../src/utils/logger';

/**
 * Job alert cron endpoint
 * Runs one aggregation-and-delivery pass per invocation (Vercel Cron)
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  // CRON_SECRET, when set, must arrive as a bearer token
  const authHeader = req.headers.authorization;
  const cronSecret = process.env.CRON_SECRET;

  if (cronSecret && authHeader !== `Bearer ${cronSecret}`) {
    logger.warn('Unauthorized cron request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  try {
    const config = loadConfig();
    const summary = await runJobAlerts(config);

    res.status(200).json({
      success: true,
      stats: {
        jobsFound: summary.jobsFound,
        jobsShown: summary.jobsShown,
        duration: `${summary.durationMs}ms`,
      },
      sourceStats: summary.sourceStats,
      delivery: summary.delivery,
    });
  } catch (error) {
    logger.error('Job alert cron failed', error);

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
