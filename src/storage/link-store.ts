import { ResolvedLink } from '../link/resolved-link.js';
import { LinkResolver } from '../util/urls/url-resolver.js';
import { Logger, makeLogger } from '../util/log.js';

export interface FindResult {
  link?: ResolvedLink,
  found: boolean,
  expired: boolean,
}

export interface LinkStoreOptions {
  name?: string,
  logger?: Logger,
}

/**
 * Somewhere to keep resolved links so the same URL isn't fetched twice.
 */
export interface LinkStore {
  /**
   * Returns the stored link for a URL, resolving and storing it first if it
   * isn't there or has expired.
   */
  get(urlText: string): Promise<ResolvedLink>,
  find(urlText: string): Promise<FindResult>,

  /**
   * Stores a link under the URL its redirect chain started from. A `ttl` of
   * zero or less means it never expires.
   */
  save(link: ResolvedLink, ttl?: number): Promise<void>,
  delete(link: ResolvedLink): Promise<void>,
  close(): Promise<void>,
}

/**
 * The read-through behavior every store shares; subclasses only deal with
 * keeping and finding records.
 */
export abstract class BaseLinkStore implements LinkStore {
  protected log: Logger;

  constructor(protected resolver: LinkResolver, options: LinkStoreOptions = {}) {
    this.log = makeLogger(options.name ?? 'link-store', options.logger);
  }

  async get(urlText: string): Promise<ResolvedLink> {
    const { link, found, expired } = await this.find(urlText);
    if (link && found && !expired) return link;

    if (expired) this.log(`${urlText} has expired; resolving again.`);
    const resolved = await this.resolver.resolve(urlText);
    await this.save(resolved);
    return resolved;
  }

  abstract find(urlText: string): Promise<FindResult>;
  abstract save(link: ResolvedLink, ttl?: number): Promise<void>;
  abstract delete(link: ResolvedLink): Promise<void>;

  async close(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * When a record with a given TTL stops being fresh; undefined means never.
 */
export function expiryFor(ttl?: number, now = Date.now()): Date | undefined {
  if (ttl === undefined || ttl <= 0) return undefined;
  return new Date(now + ttl);
}
