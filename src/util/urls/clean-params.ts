import { CleanParamsPolicy } from '../../policies.js';

export interface RemovedParam {
  name: string,
  reason: string,
}

export type CleanResult =
  | { changed: false }
  | { changed: true, url: URL, removed: RemovedParam[] };

/**
 * Strips the query parameters a policy objects to (UTM tracking codes, for
 * example). The input URL is never modified; when something was removed, the
 * result carries a new URL with the surviving parameters in their original
 * order.
 */
export function cleanParams(url: URL, policy: CleanParamsPolicy): CleanResult {
  if (!policy.cleanLinkParams(url)) return { changed: false };

  const names = new Set(url.searchParams.keys());
  const removed: RemovedParam[] = [];
  for (const name of names) {
    const { remove, reason } = policy.removeQueryParam(url, name);
    if (remove) removed.push({ name, reason });
  }

  if (removed.length === 0) return { changed: false };

  const cleaned = new URL(url.href);
  for (const { name } of removed) {
    cleaned.searchParams.delete(name);
  }
  return { changed: true, url: cleaned, removed };
}
