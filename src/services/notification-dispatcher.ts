import type { Fragment } from './presentation';
import { FRAGMENTS_PER_JOB } from './presentation';
import { describeError, logger } from '../utils/logger';

/**
 * Outbound channel. sendText returns the id later pages attach to.
 */
export interface NotificationChannel {
  sendText(text: string): Promise<string>;
  sendFragments(fragments: readonly Fragment[], contextId: string): Promise<void>;
}

export interface DigestContent {
  total: number;
  header: string;
  emptyText: string;
  fragments: readonly Fragment[];
}

export type DeliveryOutcome = 'skipped' | 'empty' | 'failed' | 'header_failed' | 'delivered';

export interface DeliveryReport {
  outcome: DeliveryOutcome;
  contextId?: string;
  pagesSent: number;
  pagesFailed: number;
}

type DeliveryState =
  | { status: 'unopened' }
  | { status: 'open'; contextId: string };

export function paginate<T>(items: readonly T[], pageSize: number): T[][] {
  const pages: T[][] = [];
  for (let i = 0; i < items.length; i += pageSize) {
    pages.push(items.slice(i, i + pageSize));
  }
  return pages;
}

/**
 * Sends the digest: a header message first, then the fragments in fixed-size
 * pages replying to it. Nothing is paged unless the header went through.
 * Each message is attempted once.
 */
export class NotificationDispatcher {
  private readonly fragmentsPerPage: number;

  constructor(
    private readonly channel: NotificationChannel | null,
    jobsPerPage: number = 8
  ) {
    this.fragmentsPerPage = Math.max(1, jobsPerPage) * FRAGMENTS_PER_JOB;
  }

  async deliver(content: DigestContent): Promise<DeliveryReport> {
    const channel = this.channel;
    if (!channel) {
      logger.warn('Notification channel not configured, skipping delivery', {
        required: ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID'],
        jobs: content.total,
      });
      return { outcome: 'skipped', pagesSent: 0, pagesFailed: 0 };
    }

    if (content.total === 0) {
      return await this.sendEmpty(channel, content.emptyText);
    }

    const state = await this.open(channel, content.header);
    if (state.status !== 'open') {
      return { outcome: 'header_failed', pagesSent: 0, pagesFailed: 0 };
    }

    const pages = paginate(content.fragments, this.fragmentsPerPage);
    let pagesSent = 0;
    let pagesFailed = 0;

    for (const [index, page] of pages.entries()) {
      try {
        await channel.sendFragments(page, state.contextId);
        pagesSent++;
      } catch (error) {
        pagesFailed++;
        logger.error(`Failed to send page ${index + 1}/${pages.length}`, error, {
          contextId: state.contextId,
          errorClass: describeError(error).errorClass,
        });
        // Continue with the next page - partial failures are acceptable
      }
    }

    logger.info(`Sent ${pagesSent} of ${pages.length} pages`, {
      contextId: state.contextId,
      pagesFailed,
    });

    return { outcome: 'delivered', contextId: state.contextId, pagesSent, pagesFailed };
  }

  /**
   * Unopened -> Open on a successful header send; stays Unopened otherwise.
   */
  private async open(channel: NotificationChannel, header: string): Promise<DeliveryState> {
    try {
      const contextId = await channel.sendText(header);
      logger.info('Digest header sent', { contextId });
      return { status: 'open', contextId };
    } catch (error) {
      logger.error('Failed to send digest header, no pages will be sent', error, {
        errorClass: describeError(error).errorClass,
      });
      return { status: 'unopened' };
    }
  }

  private async sendEmpty(channel: NotificationChannel, text: string): Promise<DeliveryReport> {
    try {
      await channel.sendText(text);
      logger.info('Sent empty digest notice');
      return { outcome: 'empty', pagesSent: 0, pagesFailed: 0 };
    } catch (error) {
      logger.error('Failed to send empty digest notice', error, {
        errorClass: describeError(error).errorClass,
      });
      return { outcome: 'failed', pagesSent: 0, pagesFailed: 0 };
    }
  }
}
