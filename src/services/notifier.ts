import TelegramBot from 'node-telegram-bot-api';
import { Config } from '../config';
import { TransientIOError, errorMessage } from '../utils/errors';
import { Logger, logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

/**
 * Delivers daily reports to the user
 */
export interface Notifier {
  notify(subject: string, body: string): Promise<void>;
}

/**
 * Writes reports to the log; used when no delivery channel is configured
 */
export class LogNotifier implements Notifier {
  constructor(private log: Logger = logger.child('report')) {}

  async notify(subject: string, body: string): Promise<void> {
    this.log.info(`${subject}\n${body}`);
  }
}

export type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

const TELEGRAM_MESSAGE_LIMIT = 4096;
const TELEGRAM_TIMEOUT_MS = 15000;

/**
 * Sends reports to one Telegram chat
 */
export class TelegramNotifier implements Notifier {
  private bot: TelegramSender;

  constructor(
    private chatId: string,
    bot: TelegramSender | string
  ) {
    this.bot = typeof bot === 'string' ? new TelegramBot(bot, { polling: false }) : bot;
  }

  async notify(subject: string, body: string): Promise<void> {
    const message = this.formatMessage(subject, body);
    try {
      await withTimeout(
        this.bot.sendMessage(this.chatId, message, {
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        TELEGRAM_TIMEOUT_MS,
        'Telegram sendMessage'
      );
    } catch (error) {
      throw new TransientIOError(`Telegram delivery failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  formatMessage(subject: string, body: string): string {
    const header = `<b>${this.escapeHtml(subject)}</b>\n\n`;
    const text = this.escapeHtml(body);
    if (header.length + text.length <= TELEGRAM_MESSAGE_LIMIT) {
      return header + text;
    }
    // Cut before any entity the limit would split
    const room = TELEGRAM_MESSAGE_LIMIT - header.length - 1;
    return `${header}${text.slice(0, room).replace(/&[a-z#0-9]*$/, '')}…`;
  }

  private escapeHtml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#039;');
  }
}

export function createNotifier(config: Config): Notifier {
  return config.telegram
    ? new TelegramNotifier(config.telegram.chatId, config.telegram.botToken)
    : new LogNotifier();
}
