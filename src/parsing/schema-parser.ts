import type { Balance, Diagnosed, ElementCatalogEntry, RoleType } from '../core/types.js';
import { normalizeElementId } from './element-id.js';
import { NS, attr, attrNS, childElements, descendants, parseXml, textOf } from './xml.js';

/**
 * Schema (.xsd) parsing: element declarations, role types, and any
 * linkbases the filer embedded under <xsd:appinfo>.
 */

export type LinkbaseKind = 'label' | 'presentation' | 'calculation' | 'definition';

export const LINKBASE_KINDS: LinkbaseKind[] = ['label', 'presentation', 'calculation', 'definition'];

/** Extended-link element name per linkbase kind */
export const EXTENDED_LINK: Record<LinkbaseKind, string> = {
  label: 'labelLink',
  presentation: 'presentationLink',
  calculation: 'calculationLink',
  definition: 'definitionLink',
};

export type EmbeddedLinkbases = Record<LinkbaseKind, Element[]>;

export interface ParsedSchema {
  elements: ElementCatalogEntry[];
  role_types: RoleType[];
  embedded: Diagnosed<EmbeddedLinkbases>;
}

function parseBalance(value: string | null): Balance | null {
  return value === 'debit' || value === 'credit' ? value : null;
}

export function parseElementDeclarations(root: Element): ElementCatalogEntry[] {
  const entries: ElementCatalogEntry[] = [];
  for (const el of descendants(root, NS.xsd, 'element')) {
    const name = attr(el, 'name');
    if (!name) continue;
    const periodType = attrNS(el, NS.xbrli, 'periodType', 'xbrli');
    entries.push({
      id: normalizeElementId(attr(el, 'id') ?? name),
      name,
      data_type: attr(el, 'type') ?? '',
      period_type: periodType === 'instant' ? 'instant' : 'duration',
      balance: parseBalance(attrNS(el, NS.xbrli, 'balance', 'xbrli')),
      is_abstract: attr(el, 'abstract') === 'true',
      labels: {},
    });
  }
  return entries;
}

export function parseRoleTypes(root: Element): RoleType[] {
  const roles: RoleType[] = [];
  for (const el of descendants(root, NS.link, 'roleType')) {
    const roleUri = attr(el, 'roleURI');
    if (!roleUri) continue;
    roles.push({
      role_uri: roleUri,
      id: attr(el, 'id'),
      definition: textOf(childElements(el, NS.link, 'definition')[0] ?? null),
      used_on: childElements(el, NS.link, 'usedOn')
        .map(u => textOf(u))
        .filter((u): u is string => u !== null),
    });
  }
  return roles;
}

/**
 * Pull extended links out of <appinfo><link:linkbase>. Best effort: any
 * failure is reported as a warning and yields no embedded linkbases.
 */
export function extractEmbeddedLinkbases(root: Element): Diagnosed<EmbeddedLinkbases> {
  const found: EmbeddedLinkbases = { label: [], presentation: [], calculation: [], definition: [] };
  try {
    for (const appinfo of descendants(root, NS.xsd, 'appinfo')) {
      for (const linkbase of descendants(appinfo, NS.link, 'linkbase')) {
        for (const kind of LINKBASE_KINDS) {
          found[kind].push(...descendants(linkbase, NS.link, EXTENDED_LINK[kind]));
        }
      }
    }
    return { value: found, warnings: [] };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return {
      value: { label: [], presentation: [], calculation: [], definition: [] },
      warnings: [`could not extract embedded linkbases: ${msg}`],
    };
  }
}

export function parseSchema(content: string, source: string = 'schema'): ParsedSchema {
  const root = parseXml(content, source);
  return {
    elements: parseElementDeclarations(root),
    role_types: parseRoleTypes(root),
    embedded: extractEmbeddedLinkbases(root),
  };
}
