/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { TimeOfDay, parseTimeOfDay } from '../utils/dates';
import { ValidationError } from '../utils/errors';

export interface Config {
  // Database
  databaseUrl: string;
  databaseSsl: boolean;

  // Scheduler
  scheduler: {
    runTime: TimeOfDay;
    tickIntervalMs: number;
  };

  // Feed polling
  feeds: {
    urls: string[];
    keywords: string[];
    timeoutMs: number;
    maxItemsPerFeed: number;
  };

  // Daily reports
  digest: {
    aiTimeoutMs: number;
    staleOpportunityDays: number;
    waitingOnDays: number;
  };

  // Optional Telegram delivery of daily reports
  telegram: {
    botToken: string;
    chatId: string;
  } | null;
}

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, separator: RegExp = /,/): string[] {
  if (!value) return [];
  return value.split(separator).map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parsePositiveInt(name: string, value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseFeedUrls(value: string | undefined): string[] {
  const urls = parseStringArray(value, /[,\n]/);
  for (const candidate of urls) {
    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch {
      throw new ValidationError(`FEED_URLS contains a malformed URL: "${candidate}"`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError(`FEED_URLS only accepts http(s) URLs: "${candidate}"`);
    }
  }
  return urls;
}

function parseTelegram(env: Env): Config['telegram'] {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  if (!botToken && !chatId) {
    return null;
  }
  if (!botToken || !chatId) {
    throw new ValidationError('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together');
  }
  return { botToken, chatId };
}

export function loadConfig(env: Env = process.env): Config {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new ValidationError('Missing required environment variable: DATABASE_URL');
  }

  return {
    databaseUrl,
    databaseSsl: parseBoolean(env.DATABASE_SSL, false),
    scheduler: {
      runTime: parseTimeOfDay(env.SCHEDULER_RUN_TIME || '08:00'),
      tickIntervalMs: parsePositiveInt('SCHEDULER_TICK_SECONDS', env.SCHEDULER_TICK_SECONDS, 60) * 1000,
    },
    feeds: {
      urls: parseFeedUrls(env.FEED_URLS),
      keywords: parseStringArray(env.FEED_KEYWORDS),
      timeoutMs: parsePositiveInt('FEED_TIMEOUT_MS', env.FEED_TIMEOUT_MS, 15000),
      maxItemsPerFeed: parsePositiveInt('FEED_MAX_ITEMS', env.FEED_MAX_ITEMS, 100),
    },
    digest: {
      aiTimeoutMs: parsePositiveInt('AI_TIMEOUT_MS', env.AI_TIMEOUT_MS, 60000),
      staleOpportunityDays: parsePositiveInt('STALE_OPPORTUNITY_DAYS', env.STALE_OPPORTUNITY_DAYS, 7),
      waitingOnDays: parsePositiveInt('WAITING_ON_DAYS', env.WAITING_ON_DAYS, 2),
    },
    telegram: parseTelegram(env),
  };
}
