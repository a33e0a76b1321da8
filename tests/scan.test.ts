import { test, type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { main } from '../scripts/scan.js';
import { createLogger } from '../core/logger.js';
import type { FetchLike } from '../scripts/lib/fetch-page.js';
import { fakeResponse } from './helpers.js';

const logger = createLogger('silent');
const now = new Date(1_700_000_000_000);

async function tempDir(t: TestContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'a11y-lint-'));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}

test('scans a local file and writes json and csv', async (t) => {
  const dir = await tempDir(t);
  const file = path.join(dir, 'page.html');
  await fs.writeFile(file, '<html><body><img src="a.png"></body></html>');
  const out = path.join(dir, 'out');

  const { result, files } = await main(['--file', file, '--out', out, '--format', 'json,csv'], { logger, now });

  assert.equal(result.source, pathToFileURL(file).href);
  assert.deepEqual(result.findings.map((f) => f.kind), ['MissingAltText', 'NoHeadings']);
  assert.deepEqual(files.map((f) => path.basename(f)), [
    'results.json',
    'issues.json',
    'accessibility_report_local_1700000000.csv',
  ]);
  const issues = JSON.parse(await fs.readFile(path.join(out, 'issues.json'), 'utf-8'));
  assert.equal(issues[0].location, 'Image 1');
  const csv = await fs.readFile(path.join(out, 'accessibility_report_local_1700000000.csv'), 'utf-8');
  assert.equal(csv.split('\n').length, 4);
});

test('scans a fetched page and writes the html report', async (t) => {
  const dir = await tempDir(t);
  const fetchImpl: FetchLike = async () => fakeResponse('<h1>Hi</h1>');

  const { result, files } = await main(['--url', 'example.com', '--out', dir, '--format', 'html'], {
    logger,
    now,
    fetch: { fetchImpl },
  });

  assert.equal(result.source, 'https://example.com');
  assert.deepEqual(result.findings, []);
  assert.deepEqual(files, [path.join(dir, 'report.html')]);
  const html = await fs.readFile(files[0], 'utf-8');
  assert.ok(html.includes('No accessibility issues found.'));
});

test('respects disabled checks', async (t) => {
  const dir = await tempDir(t);
  const file = path.join(dir, 'page.html');
  await fs.writeFile(file, '<img src="a.png">');
  const { result } = await main(['--file', file, '--out', dir, '--format', 'json', '--no-headings'], { logger, now });
  assert.ok(!result.checks.includes('headings'));
  assert.deepEqual(result.findings.map((f) => f.kind), ['MissingAltText']);
});

test('requires an input', async () => {
  await assert.rejects(main(['--format', 'json'], { logger, now }), /Nothing to analyze/);
});
