import { ResolvedLink } from '../link/resolved-link.js';
import { hashText } from '../util/keys.js';
import { BaseLinkStore, FindResult, expiryFor } from './link-store.js';

interface MemoryEntry {
  link: ResolvedLink,
  expiresAt?: Date,
}

/**
 * Keeps resolved links in a Map for the life of the process.
 */
export class MemoryLinkStore extends BaseLinkStore {
  protected known = new Map<string, MemoryEntry>();

  async find(urlText: string): Promise<FindResult> {
    const entry = this.known.get(hashText(urlText));
    if (entry === undefined) return { found: false, expired: false };
    const expired = entry.expiresAt !== undefined && entry.expiresAt.getTime() <= Date.now();
    return { link: entry.link, found: true, expired };
  }

  async save(link: ResolvedLink, ttl?: number): Promise<void> {
    this.known.set(hashText(link.origin().originalText), { link, expiresAt: expiryFor(ttl) });
  }

  async delete(link: ResolvedLink): Promise<void> {
    this.known.delete(hashText(link.origin().originalText));
  }

  values() {
    return [...this.known.values()].map(entry => entry.link);
  }
}

/**
 * Stores nothing; every `get()` resolves the link from scratch.
 */
export class NullLinkStore extends BaseLinkStore {
  async find(): Promise<FindResult> {
    return { found: false, expired: false };
  }

  async save(): Promise<void> {
    return Promise.resolve();
  }

  async delete(): Promise<void> {
    return Promise.resolve();
  }
}
