import test from 'ava';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import fpkg from 'fs-extra';
const { mkdtemp, remove, pathExists } = fpkg;

import { Content, FetchedResponse, RegexPolicy, classifyContent, makeConfig } from '../src/index.js';
import { pdfBytes } from './helpers/fake-web.js';

function respond(contentType: string | undefined, body: string | Buffer): FetchedResponse {
  return {
    url: 'https://example.com/',
    statusCode: 200,
    headers: contentType === undefined ? {} : { 'content-type': contentType },
    redirects: [],
    body: Readable.from([Buffer.from(body)]),
  };
}

const url = new URL('https://example.com/');
const page = `<html><head>
  <meta property="og:title" content="Hello">
  <meta http-equiv="refresh" content="0;url=https://example.org/">
</head><body>hi</body></html>`;

test('html pages are scanned for meta tags', async t => {
  const content = await classifyContent(url, respond('text/html; charset=UTF-8', page), new RegexPolicy(makeConfig()));

  t.is(content.mediaType, 'text/html');
  t.deepEqual(content.mediaTypeParams, { charset: 'UTF-8' });
  t.true(content.isHTML());
  t.true(content.htmlParsed);
  t.true(content.isValid());
  t.is(content.openGraphTag('title'), 'Hello');
  t.deepEqual(content.redirect(), { isRedirect: true, target: 'https://example.org/' });
  t.false(content.wasDownloaded());
});

test('html is not parsed when nothing needs it', async t => {
  const policy = new RegexPolicy(makeConfig({ followHtmlRedirects: false, parseHtmlMetaData: false }));
  const response = respond('text/html', page);
  const content = await classifyContent(url, response, policy);

  t.true(content.isHTML());
  t.false(content.htmlParsed);
  t.deepEqual(content.metaTags, {});
  t.deepEqual(content.redirect(), { isRedirect: false, target: '' });
  t.is(content.attachment, undefined);
  t.true(response.body.destroyed);
});

test('trailing semicolons in the content type are tolerated', async t => {
  const content = await classifyContent(url, respond('text/html; charset=utf-8; ', page), new RegexPolicy(makeConfig()));

  t.is(content.contentType, 'text/html; charset=utf-8; ');
  t.is(content.mediaType, 'text/html');
  t.deepEqual(content.mediaTypeParams, { charset: 'utf-8' });
  t.is(content.mediaTypeError, undefined);
  t.true(content.htmlParsed);
  t.deepEqual(content.redirect(), { isRedirect: true, target: 'https://example.org/' });
});

test('malformed content type', async t => {
  const response = respond('text/html; charset', page);
  const content = await classifyContent(url, response, new RegexPolicy(makeConfig()));

  t.is(content.mediaTypeError?.code, 'media-type-invalid');
  t.false(content.isValid());
  t.false(content.htmlParsed);
  t.true(response.body.destroyed);
});

test('non-html content is downloaded when asked', async t => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'content-test-'));
  const policy = new RegexPolicy(makeConfig({ downloadAttachments: true, attachmentStoragePath: dir }));
  const content = await classifyContent(new URL('https://example.com/paper'), respond('application/octet-stream', pdfBytes), policy);

  t.false(content.isHTML());
  t.true(content.wasDownloaded());
  t.true(content.isValid());
  t.is(content.attachment?.detectedType?.mime, 'application/pdf');
  t.is(path.extname(content.attachment?.filePath ?? ''), '.pdf');
  await remove(dir);
});

test('missing content type goes straight to download', async t => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'content-test-'));
  const policy = new RegexPolicy(makeConfig({ downloadAttachments: true, attachmentStoragePath: dir }));
  const content = await classifyContent(url, respond(undefined, pdfBytes), policy);

  t.is(content.mediaType, '');
  t.is(content.attachment?.detectedType?.ext, 'pdf');
  t.true(await pathExists(content.attachment?.filePath ?? ''));
  await remove(dir);
});

test('invalid attachments make the content invalid', async t => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'content-test-'));
  const policy = new RegexPolicy(makeConfig({ downloadAttachments: true, attachmentStoragePath: dir }));
  const content = await classifyContent(url, respond('text/plain', 'just some plain words\n'), policy);

  t.is(content.attachment?.typeSniffError?.code, 'type-sniff-failed');
  t.false(content.isValid());
  await remove(dir);
});

test('json form round trips', t => {
  const content = new Content(url);
  content.contentType = 'text/html';
  content.mediaType = 'text/html';
  content.htmlParsed = true;
  content.metaTags = { 'twitter:card': 'summary' };
  content.htmlRedirect = 'https://example.org/';

  const json = content.toJSON();
  t.true(json.isHTMLRedirect);
  t.is(json.metaRefreshTagContentURLText, 'https://example.org/');

  const restored = Content.fromJSON(json);
  t.is(restored.twitterTag('card'), 'summary');
  t.deepEqual(restored.redirect(), { isRedirect: true, target: 'https://example.org/' });
  t.deepEqual(restored.toJSON(), json);
});
