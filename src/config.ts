import 'dotenv/config';
import is from '@sindresorhus/is';

/**
 * A regular expression, or the source text of one.
 */
export type Pattern = string | RegExp;

/**
 * Everything that controls how links are resolved. Values are passed to the
 * resolver explicitly; nothing here is global.
 */
export interface LinkResolverConfig {
  /**
   * Resolved URLs matching any of these are marked as ignored and never
   * classified or downloaded. The first match wins.
   */
  ignoreUrls: Pattern[],

  /**
   * Query parameters whose names match any of these are stripped from
   * resolved URLs.
   */
  removeParams: Pattern[],

  /**
   * Follow `<meta http-equiv="refresh">` redirects in HTML destinations.
   */
  followHtmlRedirects: boolean,

  /**
   * Collect `<meta>` property and name tags from HTML destinations.
   */
  parseHtmlMetaData: boolean,

  /**
   * Save non-HTML destinations to disk and sniff their real file type.
   */
  downloadAttachments: boolean,

  /**
   * Directory for downloaded attachments; the system temp directory is used
   * when it isn't set.
   */
  attachmentStoragePath?: string,

  /**
   * The longest chain of HTML redirects that will be followed before giving up.
   */
  maxHtmlRedirects: number,

  /**
   * Milliseconds before an HTTP request is abandoned.
   */
  timeout: number,

  userAgent: string,
}

export function defaultConfig(): LinkResolverConfig {
  return {
    ignoreUrls: ['^https://twitter.com/(.*?)/status/(.*)$', 'https://t.co'],
    removeParams: ['^utm_'],
    followHtmlRedirects: true,
    parseHtmlMetaData: true,
    downloadAttachments: false,
    attachmentStoragePath: undefined,
    maxHtmlRedirects: 20,
    timeout: 10_000,
    userAgent: 'link-resolver',
  };
}

export function makeConfig(overrides: Partial<LinkResolverConfig> = {}): LinkResolverConfig {
  const config = defaultConfig();
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }
  return config;
}

type Env = Record<string, string | undefined>;

/**
 * Reads configuration from environment variables (and a `.env` file, if
 * present), falling back to the defaults for anything unset.
 */
export function configFromEnv(env: Env = process.env): LinkResolverConfig {
  return makeConfig({
    ignoreUrls: patterns(env, 'LINK_IGNORE_URLS'),
    removeParams: patterns(env, 'LINK_REMOVE_PARAMS'),
    followHtmlRedirects: flag(env, 'LINK_FOLLOW_HTML_REDIRECTS'),
    parseHtmlMetaData: flag(env, 'LINK_PARSE_HTML_META'),
    downloadAttachments: flag(env, 'LINK_DOWNLOAD_ATTACHMENTS'),
    attachmentStoragePath: text(env, 'LINK_ATTACHMENT_PATH'),
    maxHtmlRedirects: count(env, 'LINK_MAX_HTML_REDIRECTS'),
    timeout: count(env, 'LINK_TIMEOUT'),
    userAgent: text(env, 'LINK_USER_AGENT'),
  });
}

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return is.nonEmptyString(value) ? value : undefined;
}

function patterns(env: Env, name: string): string[] | undefined {
  const value = text(env, name);
  if (value === undefined) return undefined;
  return value
    .split(/\r?\n|,/)
    .map(source => source.trim())
    .filter(source => source.length > 0)
    .map(source => {
      try {
        compilePattern(source);
        return source;
      } catch (err: unknown) {
        throw new TypeError(`${name} contains an invalid pattern: ${source}`, { cause: err });
      }
    });
}

export function compilePattern(pattern: Pattern): RegExp {
  return typeof pattern === 'string' ? new RegExp(pattern) : pattern;
}

/**
 * The pattern as it was written; `RegExp.source` escapes forward slashes,
 * which would otherwise leak into ignore and cleaning reasons.
 */
export function patternText(pattern: Pattern): string {
  return typeof pattern === 'string' ? pattern : pattern.source.replaceAll('\\/', '/');
}

const truthy = ['true', '1', 'yes', 'on'];
const falsy = ['false', '0', 'no', 'off'];

function flag(env: Env, name: string): boolean | undefined {
  const value = text(env, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (truthy.includes(value)) return true;
  if (falsy.includes(value)) return false;
  throw new TypeError(`${name} must be true or false, got '${value}'`);
}

function count(env: Env, name: string): number | undefined {
  const value = text(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!is.safeInteger(parsed) || parsed < 0) {
    throw new TypeError(`${name} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}
