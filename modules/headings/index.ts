import type { Check, Finding } from '../../core/types.js';
import { createFinding, DOCUMENT_SNIPPET } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

export const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;

function levelOf(tagName: string): number {
  return Number.parseInt(tagName.slice(1), 10);
}

const mod: Check = {
  slug: 'headings',
  version: '0.1.0',
  title: 'Headings',
  run(doc) {
    const headings = doc.findAllByTag(HEADING_TAGS);
    if (!headings.length) {
      return [createFinding('NoHeadings', mod.slug, { location: 'Entire document', elementSnippet: DOCUMENT_SNIPPET })];
    }

    const findings: Finding[] = [];
    const h1Count = headings.filter((h) => h.tagName === 'h1').length;
    if (h1Count === 0) {
      findings.push(createFinding('MissingH1', mod.slug, { location: 'Document head', elementSnippet: DOCUMENT_SNIPPET }));
    } else if (h1Count > 1) {
      findings.push(
        createFinding('MultipleH1', mod.slug, {
          location: 'Multiple locations',
          elementSnippet: DOCUMENT_SNIPPET,
          description: `Found ${h1Count} h1 elements`,
        }),
      );
    }

    // Only upward jumps count; going back down any number of levels is valid.
    let previousLevel = 0;
    headings.forEach((h, i) => {
      const currentLevel = levelOf(h.tagName);
      if (previousLevel > 0 && currentLevel > previousLevel + 1) {
        findings.push(
          createFinding('HeadingLevelSkip', mod.slug, {
            location: `Heading ${i + 1}`,
            elementSnippet: snippet(h),
            description: `Heading jumps from h${previousLevel} to h${currentLevel}`,
          }),
        );
      }
      previousLevel = currentLevel;
    });
    return findings;
  },
};

export default mod;
