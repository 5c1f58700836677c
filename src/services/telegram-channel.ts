import TelegramBot from 'node-telegram-bot-api';
import type { TelegramConfig } from '../config';
import type { Fragment } from './presentation';
import type { NotificationChannel } from './notification-dispatcher';
import { escapeHtml } from '../utils/text';

type MessageSender = Pick<TelegramBot, 'sendMessage'>;

const DIVIDER = '──────────────';

/** sendMessage text limit */
export const MESSAGE_LIMIT = 4096;

export function renderFragment(fragment: Fragment): string {
  switch (fragment.kind) {
    case 'summary':
      return [
        `🔍 <b>${escapeHtml(fragment.title)}</b>`,
        `🏢 ${escapeHtml(fragment.company)}`,
        `📍 ${escapeHtml(fragment.location)} | ${escapeHtml(fragment.employmentType)}`,
        `🧪 ${escapeHtml(fragment.experience)}`,
        `⭐ ${escapeHtml(fragment.skills)}`,
        `🌐 <i>${escapeHtml(fragment.source)}</i>`,
      ].join('\n');
    case 'action':
      return `🔗 <a href="${escapeHtml(fragment.url)}">${escapeHtml(fragment.label)}</a>`;
    case 'divider':
      return DIVIDER;
  }
}

/**
 * Packs rendered fragments into message texts of at most `limit` characters.
 * Breaks only after a divider, so one job never spans two messages; a single job
 * longer than the limit still goes out on its own.
 */
export function splitPage(fragments: readonly Fragment[], limit: number = MESSAGE_LIMIT): string[] {
  const groups: string[] = [];
  let group: string[] = [];
  for (const fragment of fragments) {
    group.push(renderFragment(fragment));
    if (fragment.kind === 'divider') {
      groups.push(group.join('\n'));
      group = [];
    }
  }
  if (group.length > 0) groups.push(group.join('\n'));

  const messages: string[] = [];
  let current = '';
  for (const text of groups) {
    if (current && current.length + 1 + text.length > limit) {
      messages.push(current);
      current = text;
    } else {
      current = current ? `${current}\n${text}` : text;
    }
  }
  if (current) messages.push(current);
  return messages;
}

/**
 * Plain texts go out with their first line in bold.
 */
export function renderText(text: string): string {
  const [first = '', ...rest] = text.split('\n');
  return [`<b>${escapeHtml(first)}</b>`, ...rest.map(escapeHtml)].join('\n');
}

/**
 * Delivers digest messages to one Telegram chat.
 * The header's message id is the context; pages are sent as replies to it.
 */
export class TelegramChannel implements NotificationChannel {
  constructor(
    private readonly bot: MessageSender,
    private readonly chatId: string
  ) {}

  static fromConfig(config: TelegramConfig): TelegramChannel {
    return new TelegramChannel(new TelegramBot(config.botToken, { polling: false }), config.chatId);
  }

  async sendText(text: string): Promise<string> {
    const message = await this.bot.sendMessage(this.chatId, renderText(text), {
      parse_mode: 'HTML',
    });
    return String(message.message_id);
  }

  /**
   * A page that renders past the message limit goes out as several replies, in order.
   */
  async sendFragments(fragments: readonly Fragment[], contextId: string): Promise<void> {
    const replyTo = parseInt(contextId, 10);

    for (const text of splitPage(fragments)) {
      await this.bot.sendMessage(this.chatId, text, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
        reply_to_message_id: isNaN(replyTo) ? undefined : replyTo,
      });
    }
  }
}
