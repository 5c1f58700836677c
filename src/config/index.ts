/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export interface FilterConfig {
  readonly roleKeywords: readonly string[];
  readonly locationKeywords: readonly string[];
  readonly experienceKeywords: readonly string[];
  readonly windowHours: number;
}

export interface TelegramConfig {
  readonly botToken: string;
  readonly chatId: string;
}

export interface Config {
  // Telegram (absent when credentials are not set)
  readonly telegram?: TelegramConfig;

  readonly filters: FilterConfig;
  readonly alertLabel: string;

  // Platform Toggles
  readonly enableRemotive: boolean;
  readonly enableArbeitNow: boolean;
  readonly enableRemoteOK: boolean;
  readonly enableWWR: boolean;
  readonly enableLinkedIn: boolean;
  readonly enableIndeed: boolean;

  // Company boards
  readonly greenhouseBoards: readonly string[];
  readonly leverCompanies: readonly string[];

  // Search pages
  readonly scrapeKeywords: readonly string[];
  readonly scrapeLocation: string;

  // Limits
  readonly requestTimeoutMs: number;
  readonly maxJobsInDigest: number;
  readonly deliveryPageSize: number;
}

export const DEFAULT_ROLE_KEYWORDS = [
  'aws cloud engineer',
  'cloud engineer',
  'devops engineer',
  'cloud support',
  'cloud operations',
  'infrastructure engineer',
  'cloud associate',
  'aws associate',
];

export const DEFAULT_LOCATION_KEYWORDS = [
  'remote',
  'bengaluru',
  'bangalore',
  'mysore',
  'chennai',
  'coimbatore',
  'kochi',
  'calicut',
  'kozhikode',
];

export const DEFAULT_EXPERIENCE_KEYWORDS = [
  '0-1',
  'entry',
  'junior',
  'fresher',
  '0 years',
  '1 year',
  '0 to 1',
];

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseKeywords(value: string | undefined, defaultValue: string[]): readonly string[] {
  return Object.freeze(parseStringArray(value, defaultValue).map(k => k.toLowerCase()));
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

export function loadFilterConfig(env: Env = process.env): FilterConfig {
  return Object.freeze({
    roleKeywords: parseKeywords(env.ROLE_KEYWORDS, DEFAULT_ROLE_KEYWORDS),
    locationKeywords: parseKeywords(env.LOCATION_KEYWORDS, DEFAULT_LOCATION_KEYWORDS),
    experienceKeywords: parseKeywords(env.EXPERIENCE_KEYWORDS, DEFAULT_EXPERIENCE_KEYWORDS),
    windowHours: parseNumber(env.JOB_WINDOW_HOURS, 48),
  });
}

export function loadConfig(env: Env = process.env): Config {
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  const chatId = env.TELEGRAM_CHAT_ID?.trim();

  return Object.freeze({
    telegram: botToken && chatId ? Object.freeze({ botToken, chatId }) : undefined,
    filters: loadFilterConfig(env),
    alertLabel: env.ALERT_LABEL?.trim() || 'Cloud / DevOps',
    enableRemotive: parseBoolean(env.ENABLE_REMOTIVE, true),
    enableArbeitNow: parseBoolean(env.ENABLE_ARBEITNOW, true),
    enableRemoteOK: parseBoolean(env.ENABLE_REMOTEOK, true),
    enableWWR: parseBoolean(env.ENABLE_WWR, true),
    enableLinkedIn: parseBoolean(env.ENABLE_LINKEDIN, true),
    enableIndeed: parseBoolean(env.ENABLE_INDEED, true),
    greenhouseBoards: Object.freeze(parseStringArray(env.GREENHOUSE_BOARDS)),
    leverCompanies: Object.freeze(parseStringArray(env.LEVER_COMPANIES)),
    scrapeKeywords: Object.freeze(
      parseStringArray(env.SCRAPE_KEYWORDS, ['cloud engineer', 'devops engineer'])
    ),
    scrapeLocation: env.SCRAPE_LOCATION?.trim() || 'India',
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 20000),
    maxJobsInDigest: parseNumber(env.MAX_JOBS_IN_DIGEST, 40),
    deliveryPageSize: parseNumber(env.DELIVERY_PAGE_SIZE, 8),
  });
}
