import type { Check, Finding } from '../../core/types.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

/**
 * Flags inline styles that declare both a text color and a background. No colors
 * are parsed and no ratio is computed, so false positives are expected (a lone
 * `background-color:` matches too) and real contrast failures from stylesheets
 * are missed.
 */
export function hasCompetingColors(style: string): boolean {
  return style.includes('color:') && style.includes('background');
}

const mod: Check = {
  slug: 'color-contrast',
  version: '0.1.0',
  title: 'Color Contrast',
  run(doc) {
    const findings: Finding[] = [];
    doc.findAllWithAttribute('style').forEach((el, i) => {
      if (!hasCompetingColors(el.getAttribute('style') ?? '')) return;
      findings.push(
        createFinding('PotentialContrastIssue', mod.slug, {
          location: `Styled element ${i + 1}`,
          elementSnippet: snippet(el),
        }),
      );
    });
    return findings;
  },
};

export default mod;
