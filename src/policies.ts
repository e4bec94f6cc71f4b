import path from 'path';
import { LinkResolverConfig, compilePattern, patternText } from './config.js';
import { hashText } from './util/keys.js';

export interface IgnoreDecision {
  ignore: boolean,
  reason: string,
}

export interface RemoveParamDecision {
  remove: boolean,
  reason: string,
}

export interface DownloadDecision {
  download: boolean,

  /**
   * Where the attachment should be written; a temp file is used when empty.
   */
  destination?: string,
}

/**
 * Decides whether a resolved URL is worth classifying at all.
 */
export interface IgnorePolicy {
  ignoreLink(url: URL): IgnoreDecision,
}

/**
 * Decides which query parameters get stripped from a resolved URL.
 */
export interface CleanParamsPolicy {
  cleanLinkParams(url: URL): boolean,
  removeQueryParam(url: URL, paramName: string): RemoveParamDecision,
}

/**
 * Decides what happens to the content found at a resolved URL.
 */
export interface DestinationPolicy {
  followHtmlRedirects(url: URL): boolean,
  parseHtmlMetaData(url: URL): boolean,
  downloadAttachments(url: URL): DownloadDecision,
}

export type LinkPolicy = IgnorePolicy & CleanParamsPolicy & DestinationPolicy;

/**
 * The stock policy: regex lists for ignoring URLs and stripping parameters,
 * plain configuration flags for everything else.
 */
export class RegexPolicy implements LinkPolicy {
  protected ignoreRules: [RegExp, string][];
  protected removeRules: [RegExp, string][];

  constructor(protected config: LinkResolverConfig) {
    this.ignoreRules = config.ignoreUrls.map(p => [compilePattern(p), patternText(p)]);
    this.removeRules = config.removeParams.map(p => [compilePattern(p), patternText(p)]);
  }

  ignoreLink(url: URL): IgnoreDecision {
    for (const [rule, text] of this.ignoreRules) {
      if (test(rule, url.href)) {
        return { ignore: true, reason: `Matched Ignore Rule \`${text}\`` };
      }
    }
    return { ignore: false, reason: '' };
  }

  // Every URL is a candidate; individual parameters decide.
  cleanLinkParams(url: URL): boolean {
    return true;
  }

  removeQueryParam(url: URL, paramName: string): RemoveParamDecision {
    for (const [rule, text] of this.removeRules) {
      if (test(rule, paramName)) {
        return { remove: true, reason: `Matched cleaner rule \`${text}\`` };
      }
    }
    return { remove: false, reason: '' };
  }

  followHtmlRedirects(url: URL): boolean {
    return this.config.followHtmlRedirects;
  }

  parseHtmlMetaData(url: URL): boolean {
    return this.config.parseHtmlMetaData;
  }

  downloadAttachments(url: URL): DownloadDecision {
    if (!this.config.downloadAttachments) return { download: false };
    if (this.config.attachmentStoragePath) {
      return {
        download: true,
        destination: path.join(this.config.attachmentStoragePath, hashText(url.href)),
      };
    }
    return { download: true };
  }
}

// Global and sticky expressions carry lastIndex between calls.
function test(rule: RegExp, input: string) {
  rule.lastIndex = 0;
  return rule.test(input);
}
