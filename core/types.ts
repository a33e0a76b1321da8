import type { DocumentModel } from './document.js';

export type Severity = 'High' | 'Medium' | 'Low';

export const SEVERITIES: readonly Severity[] = ['High', 'Medium', 'Low'];

export type FindingKind =
  | 'MissingAltText'
  | 'EmptyAltText'
  | 'NoHeadings'
  | 'MissingH1'
  | 'MultipleH1'
  | 'HeadingLevelSkip'
  | 'UnlabeledInput'
  | 'NonSemanticClickable'
  | 'PotentialContrastIssue'
  | 'LinkWithoutHref'
  | 'EmptyLinkText'
  | 'TableWithoutHeaders'
  | 'TableWithoutCaption';

export interface Finding {
  readonly kind: FindingKind;
  readonly check: string;
  readonly severity: Severity;
  readonly elementSnippet: string;
  readonly description: string;
  readonly impact: string;
  readonly solution: string;
  readonly location: string;
}

export interface Check {
  slug: string;
  version: string;
  title: string;
  run(doc: DocumentModel): Finding[];
}

export interface AnalysisResult {
  source: string;
  checks: readonly string[];
  findings: readonly Finding[];
}

export interface LogEvent {
  level: 'debug' | 'info' | 'warn' | 'error';
  check?: string;
  url?: string;
  msg: string;
  elapsed?: number;
}

export type LogSink = (e: LogEvent) => void;

export type ReportFormat = 'json' | 'csv' | 'html';

export interface ScanConfig {
  profile: string;
  profiles: Record<string, string[]>;
  checks: Record<string, boolean>;
  timeoutMs: number;
  userAgent: string;
  outDir: string;
  formats: ReportFormat[];
  url?: string;
  file?: string;
}
