import { LinkResolverConfig, makeConfig } from '../../config.js';
import { CleanParamsPolicy, DestinationPolicy, IgnorePolicy, RegexPolicy } from '../../policies.js';
import { ResolvedLink } from '../../link/resolved-link.js';
import { classifyContent } from '../../link/content.js';
import { Fetcher, FetchedResponse, createGotFetcher, discard } from './fetcher.js';
import { cleanParams } from './clean-params.js';
import { LinkIssue, errorMessage, issue } from '../issues.js';
import { Logger, makeLogger } from '../log.js';

export interface ResolverOptions {
  config?: Partial<LinkResolverConfig>,
  ignorePolicy?: IgnorePolicy,
  cleanPolicy?: CleanParamsPolicy,
  destinationPolicy?: DestinationPolicy,
  fetcher?: Fetcher,
  logger?: Logger,
}

/**
 * Turns the URLs found in tweets, emails and the like into the places they
 * actually lead.
 *
 * Each URL is fetched (following HTTP redirects), checked against the ignore
 * policy, stripped of tracking parameters, and classified. Pages that redirect
 * with a `<meta http-equiv="refresh">` tag are followed in turn, and the
 * record for the last page in the chain is what `resolve()` returns.
 *
 * Resolution never rejects; whatever went wrong is recorded on the returned
 * link.
 */
export class LinkResolver {
  readonly config: LinkResolverConfig;
  readonly ignorePolicy: IgnorePolicy;
  readonly cleanPolicy: CleanParamsPolicy;
  readonly destinationPolicy: DestinationPolicy;
  protected fetcher: Fetcher;
  protected log: Logger;

  constructor(options: ResolverOptions = {}) {
    this.config = makeConfig(options.config);
    const fallback = new RegexPolicy(this.config);
    this.ignorePolicy = options.ignorePolicy ?? fallback;
    this.cleanPolicy = options.cleanPolicy ?? fallback;
    this.destinationPolicy = options.destinationPolicy ?? fallback;
    this.fetcher = options.fetcher ?? createGotFetcher({
      timeout: this.config.timeout,
      userAgent: this.config.userAgent,
    });
    this.log = makeLogger('link-resolver', options.logger);
  }

  async resolve(urlText: string): Promise<ResolvedLink> {
    return this.follow(urlText);
  }

  protected async follow(urlText: string, previous?: ResolvedLink): Promise<ResolvedLink> {
    const link = await this.resolveSingle(urlText);
    link.previous = previous;

    if (link.content === undefined || link.finalizedURL === undefined) return link;
    if (!this.destinationPolicy.followHtmlRedirects(link.finalizedURL)) return link;

    const { isRedirect, target } = link.htmlRedirect();
    if (!isRedirect) return link;

    const problem = this.checkRedirect(link, target);
    if (problem) {
      this.log(problem.message);
      link.redirectError = problem;
      return link;
    }

    this.log(`${link.finalizedURL.href} redirects via HTML to ${target}`);
    return this.follow(target, link);
  }

  /**
   * Fetches and classifies a single URL, without following HTML redirects.
   */
  async resolveSingle(urlText: string): Promise<ResolvedLink> {
    const link = new ResolvedLink(urlText);
    this.log(`Fetching ${urlText}`);

    let response: FetchedResponse;
    try {
      response = await this.fetcher(urlText);
    } catch (err: unknown) {
      return this.reject(link, issue('url-structure-invalid', `Invalid URL ${JSON.stringify(urlText)} (${errorMessage(err)})`));
    }

    link.urlStructureValid = true;
    link.httpStatusCode = response.statusCode;
    link.redirects = response.redirects;

    if (response.statusCode !== 200) {
      discard(response);
      return this.reject(link, issue('destination-invalid', `Invalid HTTP Status Code ${response.statusCode}`));
    }

    let resolved: URL;
    try {
      resolved = new URL(response.url);
    } catch (err: unknown) {
      discard(response);
      link.urlStructureValid = false;
      return this.reject(link, issue('url-structure-invalid', `Invalid resolved URL ${JSON.stringify(response.url)} (${errorMessage(err)})`));
    }

    link.destinationValid = true;
    link.resolvedURL = resolved;
    link.finalizedURL = resolved;

    const { ignore, reason } = this.ignorePolicy.ignoreLink(resolved);
    if (ignore) {
      discard(response);
      this.log(`Ignoring ${resolved.href}: ${reason}`);
      return this.reject(link, issue('ignored', reason));
    }

    const cleaned = cleanParams(resolved, this.cleanPolicy);
    if (cleaned.changed) {
      link.paramsCleaned = true;
      link.cleanedURL = cleaned.url;
      link.finalizedURL = cleaned.url;
      this.log(`Cleaned ${cleaned.removed.map(r => r.name).join(', ')} from ${resolved.href}`);
    }

    link.content = await classifyContent(link.finalizedURL, response, this.destinationPolicy);
    if (link.content.attachment) {
      this.log(`Downloaded ${link.finalizedURL.href} to ${link.content.attachment.filePath}`);
    }
    return link;
  }

  /**
   * A redirect is refused when its target already appears in the chain that
   * led to it, or when the chain has reached the configured limit.
   */
  protected checkRedirect(link: ResolvedLink, target: string): LinkIssue | undefined {
    const chain = link.chain();
    if (chain.length > this.config.maxHtmlRedirects) {
      return issue('redirect-loop', `Not following HTML redirect to ${target}: more than ${this.config.maxHtmlRedirects} HTML redirects`);
    }

    const seen = new Set<string>();
    for (const l of chain) {
      seen.add(l.originalText);
      seen.add(normalize(l.originalText));
      for (const url of [l.resolvedURL, l.cleanedURL, l.finalizedURL]) {
        if (url) seen.add(url.href);
      }
    }
    if (seen.has(target) || seen.has(normalize(target))) {
      return issue('redirect-loop', `Not following HTML redirect to ${target}: already visited`);
    }
    return undefined;
  }

  protected reject(link: ResolvedLink, problem: LinkIssue): ResolvedLink {
    link.ignored = true;
    link.ignoreReason = problem.message;
    link.issue = problem;
    if (problem.code !== 'ignored') this.log(problem.message);
    return link;
  }
}

function normalize(urlText: string): string {
  try {
    return new URL(urlText).href;
  } catch {
    return urlText;
  }
}

/**
 * Resolves a single URL with a one-off resolver.
 */
export async function resolveLink(urlText: string, options: ResolverOptions = {}): Promise<ResolvedLink> {
  return new LinkResolver(options).resolve(urlText);
}
