import { IANAZone } from 'luxon';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { DEFAULT_SYNC_SETTINGS, SyncSettings } from '../types';

/**
 * Options as commander hands them over. Every value is optional:
 * a flag that was not given falls back to the environment, then to the default.
 */
export interface CliOptions {
  ics?: string;
  categoryId?: string;
  siteTz?: string;
  staticTags?: string;
  uidTag?: boolean;
  timeout?: string;
  maxAttempts?: string;
}

type Env = Record<string, string | undefined>;

// Where each setting comes from, used to point ConfigError messages at the right knob
const SOURCES: Record<keyof SyncSettings, string> = {
  feedUrl: '--ics / ICS_FEED_URL',
  forumBaseUrl: 'DISCOURSE_BASE_URL',
  apiKey: 'DISCOURSE_API_KEY',
  apiUsername: 'DISCOURSE_API_USERNAME',
  category: '--category-id / DISCOURSE_CATEGORY_ID',
  defaultTags: 'DISCOURSE_DEFAULT_TAGS',
  staticTags: '--static-tags / ICS_STATIC_TAGS',
  enableUidTag: '--[no-]uid-tag / ICS_ENABLE_UID_TAG',
  siteTimezone: '--site-tz / SITE_TZ',
  httpTimeoutMs: '--timeout / HTTP_TIMEOUT_MS',
  maxAttempts: '--max-attempts / API_MAX_ATTEMPTS',
};

const requiredString = (what: string) =>
  z.string({ required_error: `${what} is required` }).trim().min(1, `${what} is required`);

const positiveInt = (what: string) =>
  z.union([z.number(), z.string()], { errorMap: () => ({ message: `${what} is required` }) })
    .transform((value, ctx) => {
      const text = String(value).trim();
      const parsed = /^\d+$/.test(text) ? Number(text) : NaN;
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${what} must be a positive integer, got '${text}'` });
        return z.NEVER;
      }
      return parsed;
    });

const tagList = z.union([z.array(z.string()), z.string()]).transform(splitTags);

const TRUE_WORDS = ['true', '1', 'yes'];
const FALSE_WORDS = ['false', '0', 'no'];

const flag = z.union([z.boolean(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'boolean') return value;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got '${value}'` });
  return z.NEVER;
});

const settingsSchema = z.object({
  feedUrl: requiredString('feed source'),
  forumBaseUrl: requiredString('forum base URL')
    .pipe(z.string().url('forum base URL must be an absolute URL'))
    .transform(url => url.replace(/\/+$/, '')),
  apiKey: requiredString('API key'),
  apiUsername: requiredString('API username'),
  category: positiveInt('category id'),
  defaultTags: tagList,
  staticTags: tagList,
  enableUidTag: flag,
  siteTimezone: requiredString('site timezone')
    .refine(zone => IANAZone.isValidZone(zone), zone => ({ message: `unknown timezone '${zone}'` })),
  httpTimeoutMs: positiveInt('timeout'),
  maxAttempts: positiveInt('max attempts'),
});

function isSettingKey(key: unknown): key is keyof SyncSettings {
  return typeof key === 'string' && Object.prototype.hasOwnProperty.call(SOURCES, key);
}

/**
 * Split a comma separated tag list, dropping blanks and duplicates.
 */
export function splitTags(value: string | string[]): string[] {
  const parts = Array.isArray(value) ? value : value.split(',');
  const tags = parts.map(tag => tag.trim()).filter(tag => tag !== '');
  return [...new Set(tags)];
}

/**
 * Build the settings for one run. CLI flags win over the environment,
 * the environment wins over DEFAULT_SYNC_SETTINGS.
 *
 * Throws ConfigError listing every problem found, so a run never starts half-configured.
 */
export function loadSettings(cli: CliOptions, env: Env): SyncSettings {
  const raw = {
    feedUrl: cli.ics ?? env.ICS_FEED_URL,
    forumBaseUrl: env.DISCOURSE_BASE_URL,
    apiKey: env.DISCOURSE_API_KEY,
    apiUsername: env.DISCOURSE_API_USERNAME ?? DEFAULT_SYNC_SETTINGS.apiUsername,
    category: cli.categoryId ?? env.DISCOURSE_CATEGORY_ID,
    defaultTags: env.DISCOURSE_DEFAULT_TAGS ?? DEFAULT_SYNC_SETTINGS.defaultTags,
    staticTags: cli.staticTags ?? env.ICS_STATIC_TAGS ?? DEFAULT_SYNC_SETTINGS.staticTags,
    enableUidTag: cli.uidTag ?? env.ICS_ENABLE_UID_TAG ?? DEFAULT_SYNC_SETTINGS.enableUidTag,
    siteTimezone: cli.siteTz ?? env.SITE_TZ ?? DEFAULT_SYNC_SETTINGS.siteTimezone,
    httpTimeoutMs: cli.timeout ?? env.HTTP_TIMEOUT_MS ?? DEFAULT_SYNC_SETTINGS.httpTimeoutMs,
    maxAttempts: cli.maxAttempts ?? env.API_MAX_ATTEMPTS ?? DEFAULT_SYNC_SETTINGS.maxAttempts,
  };

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => {
      const key = issue.path[0];
      const source = isSettingKey(key) ? SOURCES[key] : String(key);
      return `${source}: ${issue.message}`;
    });
    throw new ConfigError(problems);
  }

  return parsed.data;
}
