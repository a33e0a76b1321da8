#!/usr/bin/env node
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { config as loadEnv } from 'dotenv';
import { loadConfig } from '../core/config.js';
import { getChecks } from '../core/registry.js';
import { analyze, severityCounts } from '../core/engine.js';
import { createLogger, toSink } from '../core/logger.js';
import { isScanError } from '../core/errors.js';
import type { AnalysisResult, ScanConfig } from '../core/types.js';
import { fetchPage, type FetchPageOptions } from './lib/fetch-page.js';
import { renderHtml, reportFilename, toCsv, toRows } from './lib/report.js';

export interface ScanOutput {
  result: AnalysisResult;
  files: string[];
}

async function readInput(config: ScanConfig, fetchOpts: FetchPageOptions): Promise<{ source: string; markup: string | Buffer }> {
  if (config.file) {
    const file = path.resolve(config.file);
    return { source: pathToFileURL(file).href, markup: await fs.readFile(file) };
  }
  if (config.url) {
    const page = await fetchPage(config.url, { timeoutMs: config.timeoutMs, userAgent: config.userAgent, ...fetchOpts });
    return { source: page.url, markup: page.markup };
  }
  throw new Error('Nothing to analyze: pass --url <address> or --file <path>');
}

async function writeReports(config: ScanConfig, result: AnalysisResult, now: Date): Promise<string[]> {
  const outDir = path.resolve(config.outDir);
  await fs.mkdir(outDir, { recursive: true });
  const files: string[] = [];
  const write = async (name: string, data: string) => {
    const file = path.join(outDir, name);
    await fs.writeFile(file, data, 'utf-8');
    files.push(file);
  };
  if (config.formats.includes('json')) {
    await write('results.json', JSON.stringify({ ...result, counts: severityCounts(result), date: now.toISOString() }, null, 2));
    await write('issues.json', JSON.stringify(result.findings, null, 2));
  }
  if (config.formats.includes('csv')) {
    await write(reportFilename(result.source, now), toCsv(toRows(result.findings)));
  }
  if (config.formats.includes('html')) {
    await write('report.html', renderHtml(result, now));
  }
  return files;
}

export async function main(
  argv: string[] = process.argv.slice(2),
  deps: { logger?: Logger; fetch?: FetchPageOptions; now?: Date } = {},
): Promise<ScanOutput> {
  const logger = deps.logger ?? createLogger();
  const config = await loadConfig(argv);
  const checks = getChecks([], config);
  const { source, markup } = await readInput(config, deps.fetch ?? {});

  const result = analyze(source, markup, { checks, log: toSink(logger) });
  const counts = severityCounts(result);
  logger.info({ source, checks: result.checks, ...counts }, `${result.findings.length} issue(s) found`);

  const files = await writeReports(config, result, deps.now ?? new Date());
  logger.info({ files }, 'reports written');
  return { result, files };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  loadEnv();
  const logger = createLogger();
  main(process.argv.slice(2), { logger }).catch((e: unknown) => {
    if (isScanError(e)) logger.error({ code: e.code }, e.message);
    else logger.error({ err: e }, 'scan failed');
    process.exit(1);
  });
}
