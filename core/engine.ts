import { performance } from 'node:perf_hooks';
import { DocumentModel } from './document.js';
import { CHECK_ORDER } from './registry.js';
import type { AnalysisResult, Check, Finding, LogSink, Severity } from './types.js';
import { SEVERITIES } from './types.js';

export interface AnalyzeOptions {
  checks?: readonly Check[];
  log?: LogSink;
}

/**
 * Builds the document once and runs every check against it in order. Throws
 * ParseError when the markup cannot be decoded; malformed HTML is recovered.
 */
export function analyze(
  sourceIdentifier: string,
  markup: string | Uint8Array,
  options: AnalyzeOptions = {},
): AnalysisResult {
  const checks = options.checks ?? CHECK_ORDER;
  const log: LogSink = options.log ?? (() => {});

  const doc = DocumentModel.parse(markup);
  log({ level: 'debug', url: sourceIdentifier, msg: `parsed ${doc.elements.length} elements` });

  const findings: Finding[] = [];
  for (const check of checks) {
    const started = performance.now();
    const res = check.run(doc);
    findings.push(...res);
    log({
      level: 'debug',
      check: check.slug,
      url: sourceIdentifier,
      msg: `${res.length} finding(s)`,
      elapsed: Math.round(performance.now() - started),
    });
  }

  return {
    source: sourceIdentifier,
    checks: Object.freeze(checks.map((c) => c.slug)),
    findings: Object.freeze(findings),
  };
}

export function findingsBySeverity(result: AnalysisResult, severity: Severity): Finding[] {
  return result.findings.filter((f) => f.severity === severity);
}

export function severityCounts(result: AnalysisResult): Record<Severity, number> {
  const counts = { High: 0, Medium: 0, Low: 0 };
  for (const s of SEVERITIES) counts[s] = findingsBySeverity(result, s).length;
  return counts;
}
