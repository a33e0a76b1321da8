import type { Check, Finding } from '../../core/types.js';
import type { DocElement, DocumentModel } from '../../core/document.js';
import { createFinding } from '../../core/findings.js';
import { snippet } from '../../core/document.js';

export const FORM_CONTROL_TAGS = ['input', 'textarea', 'select'] as const;

/** Input types that never carry a visible label. */
const EXEMPT_TYPES = new Set(['hidden', 'submit', 'button']);

function labelTargets(doc: DocumentModel): Set<string> {
  const ids = new Set<string>();
  for (const label of doc.findAllWithAttribute('for', 'label')) {
    const target = label.getAttribute('for');
    if (target) ids.add(target);
  }
  return ids;
}

export function isLabeled(el: DocElement, labelFor: ReadonlySet<string>): boolean {
  const id = el.getAttribute('id');
  if (id && labelFor.has(id)) return true;
  if (el.closest('label')) return true;
  return el.hasAttribute('aria-label') || el.hasAttribute('aria-labelledby');
}

const mod: Check = {
  slug: 'form-labels',
  version: '0.1.0',
  title: 'Form Labels',
  run(doc) {
    const labelFor = labelTargets(doc);
    const findings: Finding[] = [];
    doc.findAllByTag(FORM_CONTROL_TAGS).forEach((el, i) => {
      if (el.tagName === 'input') {
        const type = (el.getAttribute('type') ?? 'text').trim().toLowerCase();
        if (EXEMPT_TYPES.has(type)) return;
      }
      if (isLabeled(el, labelFor)) return;
      findings.push(
        createFinding('UnlabeledInput', mod.slug, {
          location: `Form input ${i + 1}`,
          elementSnippet: snippet(el),
          description: `${el.tagName} element lacks proper labeling`,
        }),
      );
    });
    return findings;
  },
};

export default mod;
