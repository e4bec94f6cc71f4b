import { text } from 'stream/consumers';
import { parse as parseContentType } from 'content-type';

import { Attachment, AttachmentJson, downloadAttachment } from './attachment.js';
import { DestinationPolicy } from '../policies.js';
import { FetchedResponse, discard, headerValue } from '../util/urls/fetcher.js';
import { scanMetaTags } from '../util/cheerio/meta-tags.js';
import { LinkIssue, issueFromError } from '../util/issues.js';

export interface ContentJson {
  url: string,
  contentType: string,
  mediaType: string,
  mediaTypeParams: Record<string, string>,
  mediaTypeError: LinkIssue | null,
  htmlParsed: boolean,
  htmlParseError: LinkIssue | null,
  isHTMLRedirect: boolean,
  metaRefreshTagContentURLText: string,
  metaPropertyTags: Record<string, string>,
  attachment: AttachmentJson | null,
}

/**
 * What was found at a link's destination: its media type and, depending on
 * that type and the destination policy, either the page's meta tags or a
 * downloaded copy of the payload.
 */
export class Content {
  contentType = '';
  mediaType = '';
  mediaTypeParams: Record<string, string> = {};
  mediaTypeError?: LinkIssue;
  htmlParsed = false;
  htmlParseError?: LinkIssue;
  metaTags: Record<string, string> = {};

  /**
   * The target of a `<meta http-equiv="refresh">` redirect, verbatim.
   */
  htmlRedirect?: string;
  attachment?: Attachment;

  constructor(public url: URL) {}

  isHTML(): boolean {
    return this.mediaType === 'text/html';
  }

  isValid(): boolean {
    if (this.mediaTypeError) return false;
    if (this.attachment) return this.attachment.isValid();
    return true;
  }

  redirect(): { isRedirect: boolean, target: string } {
    return { isRedirect: this.htmlRedirect !== undefined, target: this.htmlRedirect ?? '' };
  }

  wasDownloaded(): boolean {
    return this.attachment !== undefined;
  }

  metaTag(key: string): string | undefined {
    return this.metaTags[key];
  }

  openGraphTag(key: string): string | undefined {
    return this.metaTag(`og:${key}`);
  }

  twitterTag(key: string): string | undefined {
    return this.metaTag(`twitter:${key}`);
  }

  toJSON(): ContentJson {
    return {
      url: this.url.href,
      contentType: this.contentType,
      mediaType: this.mediaType,
      mediaTypeParams: this.mediaTypeParams,
      mediaTypeError: this.mediaTypeError ?? null,
      htmlParsed: this.htmlParsed,
      htmlParseError: this.htmlParseError ?? null,
      isHTMLRedirect: this.htmlRedirect !== undefined,
      metaRefreshTagContentURLText: this.htmlRedirect ?? '',
      metaPropertyTags: this.metaTags,
      attachment: this.attachment?.toJSON() ?? null,
    };
  }

  static fromJSON(json: ContentJson): Content {
    const content = new Content(new URL(json.url));
    content.contentType = json.contentType;
    content.mediaType = json.mediaType;
    content.mediaTypeParams = json.mediaTypeParams;
    content.mediaTypeError = json.mediaTypeError ?? undefined;
    content.htmlParsed = json.htmlParsed;
    content.htmlParseError = json.htmlParseError ?? undefined;
    content.metaTags = json.metaPropertyTags;
    content.htmlRedirect = json.isHTMLRedirect ? json.metaRefreshTagContentURLText : undefined;
    content.attachment = json.attachment ? Attachment.fromJSON(json.attachment) : undefined;
    return content;
  }
}

/**
 * Works out what kind of content a response carries. HTML pages are scanned
 * for meta tags and refresh redirects when the policy cares about either;
 * everything else is downloaded if the policy asks for attachments.
 *
 * The response body is always consumed or discarded by the time this returns.
 */
export async function classifyContent(
  url: URL,
  response: FetchedResponse,
  policy: DestinationPolicy
): Promise<Content> {
  const content = new Content(url);
  content.contentType = headerValue(response, 'content-type') ?? '';

  if (content.contentType.length > 0) {
    try {
      // A trailing separator, as in `text/html; charset=utf-8;`, is not an error.
      const parsed = parseContentType(content.contentType.replace(/;\s*$/, ''));
      content.mediaType = parsed.type;
      content.mediaTypeParams = { ...parsed.parameters };
    } catch (err: unknown) {
      content.mediaTypeError = issueFromError('media-type-invalid', err);
      discard(response);
      return content;
    }

    if (content.isHTML() && (policy.followHtmlRedirects(url) || policy.parseHtmlMetaData(url))) {
      try {
        const scan = scanMetaTags(await text(response.body));
        content.metaTags = scan.metaTags;
        content.htmlRedirect = scan.htmlRedirect;
        content.htmlParsed = true;
      } catch (err: unknown) {
        content.htmlParseError = issueFromError('html-parse-failed', err);
        discard(response);
      }
      return content;
    }
  }

  const { download, destination } = policy.downloadAttachments(url);
  if (download) {
    content.attachment = await downloadAttachment(url, response, destination);
  } else {
    discard(response);
  }
  return content;
}
