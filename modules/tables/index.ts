import type { Check, Finding } from '../../core/types.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

const mod: Check = {
  slug: 'tables',
  version: '0.1.0',
  title: 'Tables',
  run(doc) {
    const findings: Finding[] = [];
    doc.findAllByTag('table').forEach((table, i) => {
      const location = `Table ${i + 1}`;
      if (!table.find('th').length) {
        findings.push(createFinding('TableWithoutHeaders', mod.slug, { location, elementSnippet: snippet(table) }));
      }
      if (!table.childrenByTag('caption').length) {
        findings.push(createFinding('TableWithoutCaption', mod.slug, { location, elementSnippet: snippet(table) }));
      }
    });
    return findings;
  },
};

export default mod;
