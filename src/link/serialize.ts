import * as ss from 'superstruct';
import { issueCodes } from '../util/issues.js';
import { ContentJson } from './content.js';

const IssueSchema = ss.object({
  code: ss.enums(issueCodes),
  message: ss.string(),
});

const AttachmentSchema = ss.object({
  sourceURL: ss.string(),
  filePath: ss.string(),
  detectedType: ss.nullable(ss.object({ mime: ss.string(), ext: ss.string() })),
  downloadError: ss.nullable(IssueSchema),
  typeSniffError: ss.nullable(IssueSchema),
});

const ContentSchema = ss.object({
  url: ss.string(),
  contentType: ss.string(),
  mediaType: ss.string(),
  mediaTypeParams: ss.record(ss.string(), ss.string()),
  mediaTypeError: ss.nullable(IssueSchema),
  htmlParsed: ss.boolean(),
  htmlParseError: ss.nullable(IssueSchema),
  isHTMLRedirect: ss.boolean(),
  metaRefreshTagContentURLText: ss.string(),
  metaPropertyTags: ss.record(ss.string(), ss.string()),
  attachment: ss.nullable(AttachmentSchema),
});

// The previous link in a redirect chain is validated by recursing on it
// separately, rather than through a self-referencing schema.
const LinkSchema = ss.object({
  resolvedOn: ss.string(),
  origURLtext: ss.string(),
  origLink: ss.nullable(ss.unknown()),
  isURLValid: ss.boolean(),
  isDestValid: ss.boolean(),
  httpStatusCode: ss.integer(),
  isURLIgnored: ss.boolean(),
  ignoreReason: ss.string(),
  areURLParamsCleaned: ss.boolean(),
  resolvedURL: ss.nullable(ss.string()),
  cleanedURL: ss.nullable(ss.string()),
  finalizedURL: ss.nullable(ss.string()),
  redirects: ss.array(ss.string()),
  content: ss.nullable(ContentSchema),
  issue: ss.nullable(IssueSchema),
  redirectError: ss.nullable(IssueSchema),
});

type LinkFields = Omit<ss.Infer<typeof LinkSchema>, 'origLink' | 'content'>;

/**
 * The stored form of a `ResolvedLink`. Other tools read these documents, so
 * the property names are fixed.
 */
export interface ResolvedLinkDocument extends LinkFields {
  origLink: ResolvedLinkDocument | null,
  content: ContentJson | null,
}

/**
 * Validates a stored document, dropping any properties it doesn't recognize.
 */
export function parseDocument(input: unknown): ResolvedLinkDocument {
  const doc = ss.mask(input, LinkSchema);
  return {
    ...doc,
    origLink: doc.origLink === null || doc.origLink === undefined ? null : parseDocument(doc.origLink),
  };
}
