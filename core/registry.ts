import type { Check, ScanConfig } from './types.js';
import { ScanError } from './errors.js';
import images from '../modules/images/index.js';
import headings from '../modules/headings/index.js';
import formLabels from '../modules/form-labels/index.js';
import clickableElements from '../modules/clickable-elements/index.js';
import colorContrast from '../modules/color-contrast/index.js';
import links from '../modules/links/index.js';
import tables from '../modules/tables/index.js';

/** Execution order of the checks. Output order of every analysis follows it. */
export const CHECK_ORDER: readonly Check[] = [
  images,
  headings,
  formLabels,
  clickableElements,
  colorContrast,
  links,
  tables,
];

const registered = new Map<string, Check>(CHECK_ORDER.map((c) => [c.slug, c]));

export function listSlugs(): string[] {
  return CHECK_ORDER.map((c) => c.slug);
}

export function getCheck(slug: string): Check | undefined {
  return registered.get(slug);
}

/**
 * Resolves the checks to run. `enabled` wins over the profile, the profile over
 * the `checks` switches. The result always keeps CHECK_ORDER, whatever order the
 * slugs were given in; unknown slugs are rejected.
 */
export function getChecks(enabled: string[] = [], config?: Pick<ScanConfig, 'profile' | 'profiles' | 'checks'>): Check[] {
  let list: string[];
  if (enabled.length) {
    list = enabled;
  } else if (config) {
    const prof = config.profiles[config.profile];
    list = prof && prof.length ? prof : listSlugs();
  } else {
    list = listSlugs();
  }
  if (list.includes('*')) list = listSlugs();

  const unknown = list.filter((slug) => !registered.has(slug));
  if (unknown.length) throw new ScanError(`Unknown check(s): ${unknown.join(', ')}`, 400, 'UNKNOWN_CHECK');

  const wanted = new Set(list);
  return CHECK_ORDER.filter((c) => wanted.has(c.slug) && config?.checks[c.slug] !== false);
}
