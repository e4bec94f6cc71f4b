import { createHash } from 'node:crypto';

/**
 * Hex-encoded SHA-1 of a piece of text; used to name stored links and
 * downloaded attachments.
 */
export function hashText(text: string): string {
  return createHash('sha1').update(text, 'utf8').digest('hex');
}

export interface KeyedLink {
  originalText: string,
  destinationValid: boolean,
  finalizedURL?: URL,
}

/**
 * The storage key for a link: its finalized URL when the destination was
 * reachable, and the text it started from otherwise.
 */
export function linkKey(link: KeyedLink): string {
  if (link.destinationValid && link.finalizedURL) {
    return hashText(link.finalizedURL.href);
  }
  return hashText(link.originalText);
}

const webPrefix = /^www\./;
const topLevelDomain = /\.[^.]+?$/;

/**
 * The URL's hostname without a leading `www.`
 */
export function simplifiedHostname(url: URL): string {
  return url.hostname.replace(webPrefix, '');
}

/**
 * The URL's hostname without a leading `www.` or its top-level domain; for
 * example, `www.example.com` becomes `example`.
 */
export function simplifiedHostnameWithoutTLD(url: URL): string {
  return simplifiedHostname(url).replace(topLevelDomain, '');
}
