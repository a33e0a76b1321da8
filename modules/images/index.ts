import type { Check, Finding } from '../../core/types.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

const mod: Check = {
  slug: 'images',
  version: '0.1.0',
  title: 'Images',
  run(doc) {
    const findings: Finding[] = [];
    doc.findAllByTag('img').forEach((img, i) => {
      const location = `Image ${i + 1}`;
      const alt = img.getAttribute('alt');
      if (alt === undefined) {
        findings.push(createFinding('MissingAltText', mod.slug, { location, elementSnippet: snippet(img) }));
      } else if (alt.trim() === '') {
        findings.push(createFinding('EmptyAltText', mod.slug, { location, elementSnippet: snippet(img) }));
      }
    });
    return findings;
  },
};

export default mod;
