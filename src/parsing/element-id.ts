/**
 * Element id helpers. Taxonomies spell ids as `us-gaap_Assets` (schema ids,
 * locator hrefs) while instances use QNames `us-gaap:Assets`; everything is
 * compared in the underscore form.
 */

export const STANDARD_LABEL = 'http://www.xbrl.org/2003/role/label';
export const TERSE_LABEL = 'http://www.xbrl.org/2003/role/terseLabel';

/** Well-known taxonomy namespace bases, used when an instance omits the prefix declaration */
const KNOWN_NAMESPACE_BASES: Array<[prefix: string, base: string]> = [
  ['us-gaap', 'http://fasb.org/us-gaap'],
  ['ifrs', 'http://xbrl.ifrs.org/taxonomy'],
  ['dei', 'http://xbrl.sec.gov/dei'],
];

export function normalizeElementId(id: string): string {
  return id.replace(':', '_');
}

/** `us-gaap_Assets` -> `us-gaap:Assets` (only when the prefix is recognisable) */
export function toQName(id: string): string {
  if (id.includes(':')) return id;
  const idx = id.indexOf('_');
  return idx > 0 ? `${id.slice(0, idx)}:${id.slice(idx + 1)}` : id;
}

/** The fragment of a locator href: `us-gaap-2024.xsd#us-gaap_Assets` -> `us-gaap_Assets` */
export function elementIdFromHref(href: string): string {
  const parts = href.split('#');
  return normalizeElementId(parts[parts.length - 1]);
}

/** Local name part of an element id, e.g. `Assets` */
export function localPart(id: string): string {
  const normalized = normalizeElementId(id);
  const idx = normalized.indexOf('_');
  return idx >= 0 ? normalized.slice(idx + 1) : normalized;
}

export function guessPrefix(namespaceUri: string): string | null {
  for (const [prefix, base] of KNOWN_NAMESPACE_BASES) {
    if (namespaceUri.startsWith(base)) return prefix;
  }
  return null;
}

/** Pick a display label: preferred role, terse, standard, any, then the id */
export function selectDisplayLabel(
  labels: Record<string, string>,
  preferredLabel: string | null,
  standardLabel: string | null,
  elementId: string
): string {
  if (preferredLabel && labels[preferredLabel]) return labels[preferredLabel];
  if (labels[TERSE_LABEL]) return labels[TERSE_LABEL];
  if (standardLabel) return standardLabel;
  if (labels[STANDARD_LABEL]) return labels[STANDARD_LABEL];
  const any = Object.values(labels)[0];
  return any ?? elementId;
}
