import type { Finding, FindingKind, Severity } from './types.js';

interface KindInfo {
  title: string;
  severity: Severity;
  description: string;
  impact: string;
  solution: string;
}

export const DOCUMENT_SNIPPET = 'Document';

export const CATALOG = {
  MissingAltText: {
    title: 'Missing Alt Text',
    severity: 'High',
    description: 'Image missing alt attribute',
    impact: 'Screen readers cannot describe this image to users',
    solution: 'Add descriptive alt text or alt="" for decorative images',
  },
  EmptyAltText: {
    title: 'Empty Alt Text',
    severity: 'Low',
    description: 'Image has empty alt attribute',
    impact: 'Marked as decorative - ensure this is intentional',
    solution: 'Verify if image is truly decorative or needs description',
  },
  NoHeadings: {
    title: 'No Headings',
    severity: 'High',
    description: 'No heading elements found',
    impact: 'Users cannot navigate page structure with assistive technology',
    solution: 'Add proper heading hierarchy starting with h1',
  },
  MissingH1: {
    title: 'Missing H1',
    severity: 'High',
    description: 'No h1 element found',
    impact: 'Page lacks main heading for screen readers',
    solution: 'Add one h1 element as the main page heading',
  },
  MultipleH1: {
    title: 'Multiple H1',
    severity: 'Medium',
    description: 'Found multiple h1 elements',
    impact: 'Multiple main headings can confuse navigation',
    solution: 'Use only one h1 per page',
  },
  HeadingLevelSkip: {
    title: 'Heading Level Skip',
    severity: 'Medium',
    description: 'Heading level skipped',
    impact: 'Breaks logical heading hierarchy',
    solution: 'Use sequential heading levels (h1, h2, h3, etc.)',
  },
  UnlabeledInput: {
    title: 'Unlabeled Input',
    severity: 'High',
    description: 'Form element lacks proper labeling',
    impact: 'Users cannot understand the purpose of this input',
    solution: 'Add a label element, aria-label, or aria-labelledby attribute',
  },
  NonSemanticClickable: {
    title: 'Non-semantic Clickable',
    severity: 'High',
    description: 'Clickable element is not a native control',
    impact: 'Element not accessible via keyboard or screen readers',
    solution: 'Use button/a elements or add role="button" and tabindex="0"',
  },
  PotentialContrastIssue: {
    title: 'Potential Contrast Issue',
    severity: 'Medium',
    description: 'Element has custom colors that may have contrast issues',
    impact: 'Text may be difficult to read for visually impaired users',
    solution: 'Verify color contrast ratio meets WCAG standards (4.5:1 for normal text)',
  },
  LinkWithoutHref: {
    title: 'Link Without Href',
    severity: 'Medium',
    description: 'Link element missing href attribute',
    impact: 'Link is not functional for keyboard users',
    solution: 'Add href attribute or use button element instead',
  },
  EmptyLinkText: {
    title: 'Empty Link Text',
    severity: 'High',
    description: 'Link has no accessible text',
    impact: 'Screen readers cannot describe the link purpose',
    solution: 'Add descriptive text or aria-label attribute',
  },
  TableWithoutHeaders: {
    title: 'Table Without Headers',
    severity: 'Medium',
    description: 'Table missing header cells (th elements)',
    impact: 'Screen readers cannot properly navigate table data',
    solution: 'Add th elements for column/row headers',
  },
  TableWithoutCaption: {
    title: 'Table Without Caption',
    severity: 'Low',
    description: 'Table missing caption element',
    impact: 'Users may not understand table purpose',
    solution: 'Add caption element describing table content',
  },
} as const satisfies Record<FindingKind, KindInfo>;

export function kindTitle(kind: FindingKind): string {
  return CATALOG[kind].title;
}

/** Severity, impact and solution always come from the catalog entry of `kind`. */
export function createFinding(
  kind: FindingKind,
  check: string,
  at: { location: string; elementSnippet: string; description?: string },
): Finding {
  const info: KindInfo = CATALOG[kind];
  return Object.freeze({
    kind,
    check,
    severity: info.severity,
    elementSnippet: at.elementSnippet,
    description: at.description ?? info.description,
    impact: info.impact,
    solution: info.solution,
    location: at.location,
  });
}
