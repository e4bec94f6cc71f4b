import { Content } from './content.js';
import { LinkIssue } from '../util/issues.js';
import { linkKey } from '../util/keys.js';
import { ResolvedLinkDocument, parseDocument } from './serialize.js';

export type FinalUrlResult =
  | { ok: true, url: URL }
  | { ok: false, issue: LinkIssue };

/**
 * One attempt to resolve a URL, from the text it started as to the cleaned
 * destination it ended at.
 *
 * When the destination turned out to be an HTML redirect, the record for the
 * page that redirected is kept as `previous`; following `previous` walks the
 * chain back to the link that was originally requested.
 */
export class ResolvedLink {
  readonly resolvedAt: Date;
  previous?: ResolvedLink;

  urlStructureValid = false;
  destinationValid = false;
  httpStatusCode = 0;

  ignored = false;
  ignoreReason = '';

  /**
   * Why the link is ignored or invalid, when it is.
   */
  issue?: LinkIssue;

  paramsCleaned = false;
  resolvedURL?: URL;
  cleanedURL?: URL;
  finalizedURL?: URL;

  /**
   * HTTP-level redirects followed while fetching `originalText`.
   */
  redirects: string[] = [];
  content?: Content;

  /**
   * Set when an HTML redirect found on this page was not followed because it
   * would have looped, or the chain was already too long.
   */
  redirectError?: LinkIssue;

  constructor(readonly originalText: string, resolvedAt = new Date()) {
    this.resolvedAt = resolvedAt;
  }

  get uniqueKey(): string {
    return linkKey(this);
  }

  /**
   * The fully resolved URL, or the reason there isn't one.
   */
  finalURL(): FinalUrlResult {
    if (this.issue && (this.ignored || !this.urlStructureValid || !this.destinationValid)) {
      return { ok: false, issue: this.issue };
    }
    if (this.finalizedURL === undefined || this.finalizedURL.href.length === 0) {
      return {
        ok: false,
        issue: { code: 'url-structure-invalid', message: `No finalized URL for ${this.originalText}` },
      };
    }
    return { ok: true, url: this.finalizedURL };
  }

  htmlRedirect(): { isRedirect: boolean, target: string } {
    return this.content?.redirect() ?? { isRedirect: false, target: '' };
  }

  /**
   * This record followed by each record that redirected to it, most recent
   * first.
   */
  chain(): ResolvedLink[] {
    const links: ResolvedLink[] = [];
    for (let link: ResolvedLink | undefined = this; link; link = link.previous) {
      links.push(link);
    }
    return links;
  }

  /**
   * The first record in the chain: the link as it was originally requested.
   */
  origin(): ResolvedLink {
    let link: ResolvedLink = this;
    while (link.previous) link = link.previous;
    return link;
  }

  toJSON(): ResolvedLinkDocument {
    return {
      resolvedOn: this.resolvedAt.toISOString(),
      origURLtext: this.originalText,
      origLink: this.previous?.toJSON() ?? null,
      isURLValid: this.urlStructureValid,
      isDestValid: this.destinationValid,
      httpStatusCode: this.httpStatusCode,
      isURLIgnored: this.ignored,
      ignoreReason: this.ignoreReason,
      areURLParamsCleaned: this.paramsCleaned,
      resolvedURL: this.resolvedURL?.href ?? null,
      cleanedURL: this.cleanedURL?.href ?? null,
      finalizedURL: this.finalizedURL?.href ?? null,
      redirects: this.redirects,
      content: this.content?.toJSON() ?? null,
      issue: this.issue ?? null,
      redirectError: this.redirectError ?? null,
    };
  }

  /**
   * Rebuilds a record from its stored JSON form; throws if the document
   * doesn't have the expected shape.
   */
  static fromJSON(input: unknown): ResolvedLink {
    return fromDocument(parseDocument(input));
  }
}

function fromDocument(doc: ResolvedLinkDocument): ResolvedLink {
  const link = new ResolvedLink(doc.origURLtext, new Date(doc.resolvedOn));
  link.previous = doc.origLink ? fromDocument(doc.origLink) : undefined;
  link.urlStructureValid = doc.isURLValid;
  link.destinationValid = doc.isDestValid;
  link.httpStatusCode = doc.httpStatusCode;
  link.ignored = doc.isURLIgnored;
  link.ignoreReason = doc.ignoreReason;
  link.paramsCleaned = doc.areURLParamsCleaned;
  link.resolvedURL = doc.resolvedURL ? new URL(doc.resolvedURL) : undefined;
  link.cleanedURL = doc.cleanedURL ? new URL(doc.cleanedURL) : undefined;
  link.finalizedURL = doc.finalizedURL ? new URL(doc.finalizedURL) : undefined;
  link.redirects = doc.redirects;
  link.content = doc.content ? Content.fromJSON(doc.content) : undefined;
  link.issue = doc.issue ?? undefined;
  link.redirectError = doc.redirectError ?? undefined;
  return link;
}
