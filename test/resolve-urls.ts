import test from 'ava';
import os from 'os';
import path from 'path';
import fpkg from 'fs-extra';
const { mkdtemp, remove } = fpkg;

import { LinkResolver, LinkResolverConfig, ResolvedLink, hashText, quietLogger, resolveLink } from '../src/index.js';
import { FakeWeb, metaRefresh, pdfBytes } from './helpers/fake-web.js';

function resolverFor(web: FakeWeb, config: Partial<LinkResolverConfig> = {}) {
  return new LinkResolver({ fetcher: web.fetcher, logger: quietLogger, config });
}

test('dead domains', async t => {
  const link = await resolverFor(new FakeWeb()).resolve('https://t');

  t.false(link.urlStructureValid);
  t.false(link.destinationValid);
  t.true(link.ignored);
  t.is(link.issue?.code, 'url-structure-invalid');
  t.is(link.ignoreReason, 'Invalid URL "https://t" (getaddrinfo ENOTFOUND t)');
  t.is(link.content, undefined);
  t.deepEqual(link.finalURL(), { ok: false, issue: link.issue });
});

test('http error statuses', async t => {
  const web = new FakeWeb().page('https://example.com/gone', { status: 404, contentType: 'text/html', body: 'nope' });
  const link = await resolverFor(web).resolve('https://example.com/gone');

  t.true(link.urlStructureValid);
  t.false(link.destinationValid);
  t.is(link.httpStatusCode, 404);
  t.true(link.ignored);
  t.is(link.ignoreReason, 'Invalid HTTP Status Code 404');
  t.is(link.content, undefined);
  t.true(web.bodies[0].destroyed);
});

test('ignored destinations', async t => {
  const web = new FakeWeb()
    .redirect('https://short.example/x', 'https://twitter.com/someone/status/1')
    .html('https://twitter.com/someone/status/1', '<html></html>');
  const link = await resolverFor(web).resolve('https://short.example/x');

  t.true(link.destinationValid);
  t.true(link.ignored);
  t.is(link.issue?.code, 'ignored');
  t.is(link.ignoreReason, 'Matched Ignore Rule `^https://twitter.com/(.*?)/status/(.*)$`');
  t.deepEqual(link.redirects, ['https://twitter.com/someone/status/1']);
  t.is(link.resolvedURL?.href, 'https://twitter.com/someone/status/1');
  t.is(link.content, undefined);
});

test('tracking params are cleaned', async t => {
  const web = new FakeWeb().html('https://example.com/?utm_source=feed&utm_medium=social', '<html><head><title>hi</title></head></html>');
  const link = await resolverFor(web).resolve('https://example.com/?utm_source=feed&utm_medium=social');

  t.true(link.destinationValid);
  t.false(link.ignored);
  t.true(link.paramsCleaned);
  t.is(link.resolvedURL?.href, 'https://example.com/?utm_source=feed&utm_medium=social');
  t.is(link.cleanedURL?.href, 'https://example.com/');
  t.is(link.finalizedURL?.href, 'https://example.com/');
  t.is(link.uniqueKey, hashText('https://example.com/'));
  t.true(link.content?.htmlParsed);
});

test('html redirects are followed', async t => {
  const web = new FakeWeb()
    .html('https://short.example/abc', metaRefresh('https://example.com/?utm_source=x'))
    .html('https://example.com/?utm_source=x', '<html><head><meta property="og:title" content="Landed"></head></html>');
  const link = await resolverFor(web).resolve('https://short.example/abc');

  t.is(link.originalText, 'https://example.com/?utm_source=x');
  t.is(link.cleanedURL?.href, 'https://example.com/');
  t.is(link.content?.openGraphTag('title'), 'Landed');
  t.is(link.previous?.originalText, 'https://short.example/abc');
  t.deepEqual(link.previous?.htmlRedirect(), { isRedirect: true, target: 'https://example.com/?utm_source=x' });
  t.is(link.origin().originalText, 'https://short.example/abc');
  t.deepEqual(link.chain().map(l => l.originalText), ['https://example.com/?utm_source=x', 'https://short.example/abc']);
  t.deepEqual(web.requests, ['https://short.example/abc', 'https://example.com/?utm_source=x']);
});

test('html redirects can be switched off', async t => {
  const web = new FakeWeb()
    .html('https://short.example/abc', metaRefresh('https://example.com/'))
    .html('https://example.com/', '<html></html>');
  const link = await resolverFor(web, { followHtmlRedirects: false }).resolve('https://short.example/abc');

  t.is(link.originalText, 'https://short.example/abc');
  t.is(link.previous, undefined);
  t.deepEqual(web.requests, ['https://short.example/abc']);
});

test('relative html redirects fail as url structure errors', async t => {
  const web = new FakeWeb().html('https://example.com/', metaRefresh('/elsewhere'));
  const link = await resolverFor(web).resolve('https://example.com/');

  t.is(link.originalText, '/elsewhere');
  t.false(link.urlStructureValid);
  t.is(link.issue?.code, 'url-structure-invalid');
  t.true(link.ignoreReason.startsWith('Invalid URL "/elsewhere"'));
  t.is(link.previous?.finalizedURL?.href, 'https://example.com/');
});

test('html redirect loops are broken', async t => {
  const web = new FakeWeb()
    .html('https://a.example/', metaRefresh('https://b.example/'))
    .html('https://b.example/', metaRefresh('https://a.example'));
  const link = await resolverFor(web).resolve('https://a.example/');

  t.is(link.originalText, 'https://b.example/');
  t.is(link.redirectError?.code, 'redirect-loop');
  t.is(link.redirectError?.message, 'Not following HTML redirect to https://a.example: already visited');
  t.false(link.ignored);
  t.deepEqual(web.requests, ['https://a.example/', 'https://b.example/']);
});

test('html redirect chains are capped', async t => {
  const web = new FakeWeb();
  for (let i = 1; i <= 5; i++) {
    web.html(`https://hop.example/${i}`, metaRefresh(`https://hop.example/${i + 1}`));
  }
  const link = await resolverFor(web, { maxHtmlRedirects: 2 }).resolve('https://hop.example/1');

  t.is(link.originalText, 'https://hop.example/3');
  t.is(link.chain().length, 3);
  t.is(link.redirectError?.message, 'Not following HTML redirect to https://hop.example/4: more than 2 HTML redirects');
});

test('attachments are downloaded and typed', async t => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'resolver-test-'));
  const web = new FakeWeb().page('https://example.com/paper', { contentType: 'application/pdf', body: pdfBytes });
  const link = await resolveLink('https://example.com/paper', {
    fetcher: web.fetcher,
    logger: quietLogger,
    config: { downloadAttachments: true, attachmentStoragePath: dir },
  });

  const attachment = link.content?.attachment;
  t.not(attachment, undefined);
  if (attachment === undefined) return;

  t.true(attachment.isValid());
  t.deepEqual(attachment.detectedType, { mime: 'application/pdf', ext: 'pdf' });
  t.is(attachment.filePath, path.join(dir, hashText('https://example.com/paper') + '.pdf'));
  t.true(await attachment.exists());

  await attachment.delete();
  t.false(await attachment.exists());
  await remove(dir);
});

test('attachments are skipped by default', async t => {
  const web = new FakeWeb().page('https://example.com/paper', { contentType: 'application/pdf', body: pdfBytes });
  const link = await resolverFor(web).resolve('https://example.com/paper');

  t.is(link.content?.mediaType, 'application/pdf');
  t.false(link.content?.wasDownloaded());
  t.true(web.bodies[0].destroyed);
});

test('records survive a json round trip', async t => {
  const web = new FakeWeb()
    .html('https://short.example/abc', metaRefresh('https://example.com/?utm_source=x'))
    .html('https://example.com/?utm_source=x', '<html></html>');
  const link = await resolverFor(web).resolve('https://short.example/abc');

  const restored = ResolvedLink.fromJSON(JSON.parse(JSON.stringify(link)));

  t.deepEqual(restored.toJSON(), link.toJSON());
  t.is(restored.previous?.originalText, 'https://short.example/abc');
  t.is(restored.resolvedAt.getTime(), link.resolvedAt.getTime());
});
