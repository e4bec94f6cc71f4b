import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';

/**
 * Matches the `content` attribute of a meta refresh tag such as
 * `<meta http-equiv="refresh" content="2;url=https://example.com">`; the
 * second group is the redirect target.
 *
 * See http://redirectdetective.com/redirection-types.html
 */
export const metaRefreshPattern = /^(\d*)\s*;\s*url=(.*)$/i;

export interface MetaScan {
  /**
   * Every `<meta property>` and `<meta name>` value, keyed by the property or
   * name. Later tags overwrite earlier ones.
   */
  metaTags: Record<string, string>,

  /**
   * The target of a meta refresh redirect, exactly as written in the page.
   */
  htmlRedirect?: string,
}

/**
 * Walks every element of an HTML document in document order, collecting meta
 * tags once the `<head>` element has been entered.
 *
 * Collection never switches off again after `<head>`, so meta tags in the
 * body are picked up as well.
 */
export function scanMetaTags(html: string): MetaScan {
  const $ = cheerio.load(html);
  const result: MetaScan = { metaTags: {} };
  let inHead = false;

  for (const el of $<Element, '*'>('*').toArray()) {
    const tag = el.tagName.toLowerCase();
    if (tag === 'head') inHead = true;
    if (!inHead || tag !== 'meta') continue;

    const attrs = lowercaseKeys(el.attribs);
    const content = attrs['content'];
    if (content === undefined) continue;

    if (attrs['http-equiv']?.trim().toLowerCase() === 'refresh') {
      const match = metaRefreshPattern.exec(content.trim());
      if (match) result.htmlRedirect = match[2];
    }

    for (const key of [attrs['property'], attrs['name']]) {
      if (key !== undefined) result.metaTags[key] = content;
    }
  }

  return result;
}

function lowercaseKeys(attribs: Record<string, string>) {
  const output: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(attribs)) {
    output[key.toLowerCase()] = value;
  }
  return output;
}
