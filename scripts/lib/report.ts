import nunjucks from 'nunjucks';
import { fileURLToPath } from 'node:url';
import { kindTitle } from '../../core/findings.js';
import { severityCounts } from '../../core/engine.js';
import type { AnalysisResult, Finding, Severity } from '../../core/types.js';
import { SEVERITIES } from '../../core/types.js';

export const COLUMNS = ['Type', 'Severity', 'Location', 'Description', 'Impact', 'Solution'] as const;

export type ReportRow = Record<(typeof COLUMNS)[number], string>;

const templatesDir = fileURLToPath(new URL('../../reports/templates', import.meta.url));
const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templatesDir), { autoescape: true });

const SECTION_TEXT: Record<Severity, string> = {
  High: 'These issues create significant barriers for users with disabilities and should be fixed immediately.',
  Medium: 'These issues impact usability and should be addressed soon.',
  Low: 'These are minor improvements that enhance accessibility.',
};

export function toRows(findings: readonly Finding[]): ReportRow[] {
  return findings.map((f) => ({
    Type: kindTitle(f.kind),
    Severity: f.severity,
    Location: f.location,
    Description: f.description,
    Impact: f.impact,
    Solution: f.solution,
  }));
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(rows: readonly ReportRow[]): string {
  const lines = [COLUMNS.join(',')];
  for (const row of rows) lines.push(COLUMNS.map((c) => csvField(row[c])).join(','));
  return lines.join('\n') + '\n';
}

function hostOf(url: string): string {
  try {
    return new URL(url).host || 'local';
  } catch {
    return 'local';
  }
}

/** accessibility_report_{host}_{unixSeconds}.csv */
export function reportFilename(url: string, now: Date = new Date()): string {
  return `accessibility_report_${hostOf(url)}_${Math.floor(now.getTime() / 1000)}.csv`;
}

export function groupBySeverity(findings: readonly Finding[]): Record<Severity, Finding[]> {
  const groups: Record<Severity, Finding[]> = { High: [], Medium: [], Low: [] };
  for (const f of findings) groups[f.severity].push(f);
  return groups;
}

export function renderHtml(result: AnalysisResult, generatedAt: Date = new Date()): string {
  const groups = groupBySeverity(result.findings);
  return env.render('report.njk', {
    source: result.source,
    date: generatedAt.toISOString(),
    total: result.findings.length,
    counts: severityCounts(result),
    checks: result.checks,
    sections: SEVERITIES.map((severity) => ({
      severity,
      intro: SECTION_TEXT[severity],
      findings: groups[severity].map((f) => ({ ...f, title: kindTitle(f.kind) })),
    })),
    rows: toRows(result.findings),
    columns: COLUMNS,
  });
}
