import { promises as fs } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { Ajv, type Schema } from 'ajv';
import { listSlugs } from './registry.js';
import type { ReportFormat, ScanConfig } from './types.js';

const defaultsUrl = new URL('../config/scan.defaults.json', import.meta.url);
const schemaUrl = new URL('../config/schemas/scan.defaults.schema.json', import.meta.url);

const FORMATS: readonly ReportFormat[] = ['json', 'csv', 'html'];

function isFormat(s: string): s is ReportFormat {
  return FORMATS.some((f) => f === s);
}

function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseTimeout(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError(`invalid timeout: ${value}`);
  return n;
}

function parseFormats(value: string): ReportFormat[] {
  const out: ReportFormat[] = [];
  for (const f of splitList(value)) {
    if (!isFormat(f)) throw new InvalidArgumentError(`unknown format: ${f}`);
    if (!out.includes(f)) out.push(f);
  }
  return out;
}

function camel(slug: string): string {
  return slug.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function onlyChecks(list: string[]): Record<string, boolean> {
  const checks: Record<string, boolean> = {};
  for (const slug of list) checks[slug] = true;
  return checks;
}

export async function loadDefaults(): Promise<ScanConfig> {
  const defaults: unknown = JSON.parse(await fs.readFile(defaultsUrl, 'utf-8'));
  const schema: Schema = JSON.parse(await fs.readFile(schemaUrl, 'utf-8'));
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<ScanConfig>(schema);
  if (!validate(defaults)) {
    throw new Error('Invalid defaults config: ' + ajv.errorsText(validate.errors));
  }
  return defaults;
}

/** defaults < environment (PROFILE, CHECKS, TIMEOUT_MS) < command line */
export async function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<ScanConfig> {
  const config = await loadDefaults();

  if (env.PROFILE) config.profile = env.PROFILE;
  if (env.CHECKS) {
    config.checks = onlyChecks(splitList(env.CHECKS));
    config.profiles = { ...config.profiles, [config.profile]: Object.keys(config.checks) };
  }
  if (env.TIMEOUT_MS) config.timeoutMs = parseTimeout(env.TIMEOUT_MS);

  const program = new Command();
  program
    .exitOverride()
    .allowUnknownOption(true)
    .option('--url <url>', 'address to fetch and analyze')
    .option('--file <path>', 'local HTML file to analyze')
    .option('--profile <profile>', 'named set of checks')
    .option('--checks <checks>', 'comma-separated check slugs', splitList)
    .option('--out <dir>', 'output directory')
    .option('--format <formats>', 'comma-separated report formats (json,csv,html)', parseFormats)
    .option('--timeout <ms>', 'fetch timeout in milliseconds', parseTimeout);
  for (const slug of listSlugs()) program.option(`--no-${slug}`, `skip the ${slug} check`);
  program.parse(argv, { from: 'user' });
  const opts = program.opts();

  if (typeof opts.url === 'string') config.url = opts.url;
  if (typeof opts.file === 'string') config.file = opts.file;
  if (typeof opts.profile === 'string') config.profile = opts.profile;
  if (Array.isArray(opts.checks)) {
    const list = opts.checks.filter((s): s is string => typeof s === 'string');
    config.checks = onlyChecks(list);
    config.profiles = { ...config.profiles, [config.profile]: list };
  }
  if (typeof opts.out === 'string') config.outDir = opts.out;
  if (Array.isArray(opts.format)) config.formats = opts.format.filter((s): s is ReportFormat => typeof s === 'string' && isFormat(s));
  if (typeof opts.timeout === 'number') config.timeoutMs = opts.timeout;
  for (const slug of listSlugs()) {
    if (opts[camel(slug)] === false) config.checks = { ...config.checks, [slug]: false };
  }

  if (!config.profiles[config.profile]) {
    throw new Error(`Unknown profile: ${config.profile}`);
  }
  return config;
}
