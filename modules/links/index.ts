import type { Check, Finding } from '../../core/types.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

const mod: Check = {
  slug: 'links',
  version: '0.1.0',
  title: 'Links',
  run(doc) {
    const findings: Finding[] = [];
    doc.findAllByTag('a').forEach((a, i) => {
      const location = `Link ${i + 1}`;
      // independent conditions: one anchor may produce both findings
      if (!a.hasAttribute('href')) {
        findings.push(createFinding('LinkWithoutHref', mod.slug, { location, elementSnippet: snippet(a) }));
      }
      if (a.textContent === '' && !a.hasAttribute('aria-label')) {
        findings.push(createFinding('EmptyLinkText', mod.slug, { location, elementSnippet: snippet(a) }));
      }
    });
    return findings;
  },
};

export default mod;
