import os from 'os';
import path from 'path';
import { pipeline } from 'stream/promises';
import { fileTypeFromBuffer } from 'file-type';
import fpkg from 'fs-extra';
const { createWriteStream, open, read, close, rename, remove, ensureDir, pathExists } = fpkg;

import { FetchedResponse } from '../util/urls/fetcher.js';
import { LinkIssue, issue, issueFromError } from '../util/issues.js';
import { hashText } from '../util/keys.js';

/**
 * Magic-byte signatures never need more than this much of a file's head.
 */
export const sniffLength = 261;

export interface DetectedType {
  mime: string,
  ext: string,
}

export interface AttachmentJson {
  sourceURL: string,
  filePath: string,
  detectedType: DetectedType | null,
  downloadError: LinkIssue | null,
  typeSniffError: LinkIssue | null,
}

/**
 * A destination's content, saved to disk for inspection. The file stays put
 * until `delete()` is called; the record outlives it.
 */
export class Attachment {
  detectedType?: DetectedType;
  downloadError?: LinkIssue;
  typeSniffError?: LinkIssue;

  constructor(public sourceURL: URL, public filePath: string) {}

  isValid(): boolean {
    return this.downloadError === undefined && this.typeSniffError === undefined;
  }

  async exists(): Promise<boolean> {
    return pathExists(this.filePath);
  }

  async delete(): Promise<void> {
    return remove(this.filePath);
  }

  toJSON(): AttachmentJson {
    return {
      sourceURL: this.sourceURL.href,
      filePath: this.filePath,
      detectedType: this.detectedType ?? null,
      downloadError: this.downloadError ?? null,
      typeSniffError: this.typeSniffError ?? null,
    };
  }

  static fromJSON(json: AttachmentJson): Attachment {
    const attachment = new Attachment(new URL(json.sourceURL), json.filePath);
    attachment.detectedType = json.detectedType ?? undefined;
    attachment.downloadError = json.downloadError ?? undefined;
    attachment.typeSniffError = json.typeSniffError ?? undefined;
    return attachment;
  }
}

/**
 * Where an attachment goes when the policy doesn't name a destination.
 */
export function tempDestination(url: URL): string {
  return path.join(os.tmpdir(), `link-attachment-${hashText(url.href)}`);
}

/**
 * Streams a response body to disk, then sniffs the file's real type from its
 * first bytes and renames it to carry the matching extension.
 *
 * Failures are recorded on the returned attachment rather than thrown, and
 * partially written files are left where they are.
 */
export async function downloadAttachment(
  url: URL,
  response: FetchedResponse,
  destination?: string
): Promise<Attachment> {
  const attachment = new Attachment(url, destination ?? tempDestination(url));

  try {
    await ensureDir(path.dirname(attachment.filePath));
    await pipeline(response.body, createWriteStream(attachment.filePath));
  } catch (err: unknown) {
    attachment.downloadError = issueFromError('download-failed', err);
    return attachment;
  }

  try {
    const head = await readHead(attachment.filePath);
    const detected = await fileTypeFromBuffer(head);
    if (detected === undefined) {
      attachment.typeSniffError = issue('type-sniff-failed', `Unable to determine the file type of ${url.href}`);
      return attachment;
    }
    attachment.detectedType = { mime: detected.mime, ext: detected.ext };

    const renamed = withExtension(attachment.filePath, detected.ext);
    if (renamed !== attachment.filePath) {
      await rename(attachment.filePath, renamed);
      attachment.filePath = renamed;
    }
  } catch (err: unknown) {
    attachment.typeSniffError = issueFromError('type-sniff-failed', err);
  }

  return attachment;
}

async function readHead(filePath: string): Promise<Uint8Array> {
  const fd = await open(filePath, 'r');
  try {
    const { bytesRead, buffer } = await read(fd, Buffer.alloc(sniffLength), 0, sniffLength, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await close(fd);
  }
}

/**
 * Swaps whatever extension a path has (if any) for the given one.
 */
export function withExtension(filePath: string, ext: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}.${ext}`);
}
