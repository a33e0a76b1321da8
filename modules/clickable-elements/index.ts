import type { Check, Finding } from '../../core/types.js';
import type { DocElement } from '../../core/document.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

const CLICK_ATTRIBUTE = 'onclick';
const INTERACTIVE_ROLES = new Set(['button', 'link']);

export function clickableProblems(el: DocElement): string[] {
  const problems: string[] = [];
  const role = el.getAttribute('role');
  if (role === undefined || !INTERACTIVE_ROLES.has(role)) problems.push('missing appropriate role');
  const tabindex = el.getAttribute('tabindex');
  if (tabindex === undefined || tabindex === '-1') problems.push('not keyboard accessible');
  return problems;
}

/**
 * Only inline handlers are visible here; listeners registered from script are
 * out of reach for a static pass.
 */
const mod: Check = {
  slug: 'clickable-elements',
  version: '0.1.0',
  title: 'Clickable Elements',
  run(doc) {
    const clickable = [
      ...doc.findAllWithAttribute(CLICK_ATTRIBUTE, 'div'),
      ...doc.findAllWithAttribute(CLICK_ATTRIBUTE, 'span'),
    ];
    const findings: Finding[] = [];
    clickable.forEach((el, i) => {
      const problems = clickableProblems(el);
      if (!problems.length) return;
      findings.push(
        createFinding('NonSemanticClickable', mod.slug, {
          location: `Clickable element ${i + 1}`,
          elementSnippet: snippet(el),
          description: `Clickable ${el.tagName} element with issues: ${problems.join(', ')}`,
        }),
      );
    });
    return findings;
  },
};

export default mod;
