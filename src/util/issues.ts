/**
 * Problems encountered while resolving a link are carried on the resulting
 * records as plain data, so they survive a round trip through JSON storage.
 */
export type IssueCode =
  | 'url-structure-invalid'
  | 'destination-invalid'
  | 'ignored'
  | 'media-type-invalid'
  | 'html-parse-failed'
  | 'download-failed'
  | 'type-sniff-failed'
  | 'redirect-loop';

export const issueCodes: readonly IssueCode[] = [
  'url-structure-invalid',
  'destination-invalid',
  'ignored',
  'media-type-invalid',
  'html-parse-failed',
  'download-failed',
  'type-sniff-failed',
  'redirect-loop',
];

export interface LinkIssue {
  code: IssueCode,
  message: string,
}

export function issue(code: IssueCode, message: string): LinkIssue {
  return { code, message };
}

export function issueFromError(code: IssueCode, err: unknown): LinkIssue {
  return issue(code, errorMessage(err));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
