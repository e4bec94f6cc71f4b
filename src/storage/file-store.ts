import os from 'os';
import path from 'path';
import is from '@sindresorhus/is';
import fpkg from 'fs-extra';
const { readJson, writeJson, pathExists, ensureDir, mkdtemp, remove } = fpkg;

import { ResolvedLink } from '../link/resolved-link.js';
import { LinkResolver } from '../util/urls/url-resolver.js';
import { hashText } from '../util/keys.js';
import { errorMessage } from '../util/issues.js';
import { BaseLinkStore, FindResult, LinkStoreOptions, expiryFor } from './link-store.js';

export interface FileLinkStoreOptions extends LinkStoreOptions {
  /**
   * Create the directory if it doesn't exist yet.
   */
  create?: boolean,

  /**
   * Pretty-print the stored JSON.
   */
  readableOutput?: boolean,
}

/**
 * Keeps one JSON document per resolved link in a directory, named for a hash
 * of the URL the link was requested with.
 */
export class FileLinkStore extends BaseLinkStore {
  static extension = '.json';
  readonly directory: string;
  readableOutput: boolean;
  protected options: FileLinkStoreOptions;

  constructor(directory: string, resolver: LinkResolver, options: FileLinkStoreOptions = {}) {
    super(resolver, { name: 'file-link-store', ...options });
    this.directory = directory;
    this.options = options;
    this.readableOutput = options.readableOutput ?? true;
  }

  /**
   * Makes sure the store's directory is there; rejects if it's missing and the
   * store wasn't asked to create it.
   */
  async open(): Promise<this> {
    if (this.options.create) {
      await ensureDir(this.directory);
    } else if (!(await pathExists(this.directory))) {
      throw new Error(`Link store directory does not exist: ${this.directory}`);
    }
    return this;
  }

  pathFor(urlText: string): string {
    return path.join(this.directory, hashText(urlText) + FileLinkStore.extension);
  }

  async find(urlText: string): Promise<FindResult> {
    const file = this.pathFor(urlText);
    if (!(await pathExists(file))) return { found: false, expired: false };

    let link: ResolvedLink;
    let expiresAt: unknown;
    try {
      const raw: unknown = await readJson(file);
      expiresAt = is.plainObject(raw) ? raw['expiresAt'] : undefined;
      link = ResolvedLink.fromJSON(raw);
    } catch (err: unknown) {
      this.log(`Ignoring unreadable record ${file}: ${errorMessage(err)}`);
      return { found: false, expired: false };
    }

    const expired = is.string(expiresAt) && Date.parse(expiresAt) <= Date.now();
    return { link, found: true, expired };
  }

  async save(link: ResolvedLink, ttl?: number): Promise<void> {
    await ensureDir(this.directory);
    const expiresAt = expiryFor(ttl);
    const doc = expiresAt ? { ...link.toJSON(), expiresAt: expiresAt.toISOString() } : link.toJSON();
    return writeJson(this.pathFor(link.origin().originalText), doc, this.readableOutput ? { spaces: 2 } : {});
  }

  async delete(link: ResolvedLink): Promise<void> {
    return remove(this.pathFor(link.origin().originalText));
  }
}

export interface TempLinkStoreOptions extends FileLinkStoreOptions {
  /**
   * Delete the directory and everything in it when the store is closed.
   */
  removeOnClose?: boolean,
}

/**
 * A `FileLinkStore` in a fresh temporary directory.
 */
export class TempLinkStore extends FileLinkStore {
  protected removeOnClose: boolean;

  protected constructor(directory: string, resolver: LinkResolver, options: TempLinkStoreOptions) {
    super(directory, resolver, { name: 'temp-link-store', ...options, create: true });
    this.removeOnClose = options.removeOnClose ?? false;
  }

  static async create(resolver: LinkResolver, options: TempLinkStoreOptions = {}): Promise<TempLinkStore> {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'links-'));
    return new TempLinkStore(directory, resolver, options);
  }

  async close(): Promise<void> {
    if (this.removeOnClose) await remove(this.directory);
  }
}
