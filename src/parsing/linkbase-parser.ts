import type {
  CalculationNode,
  CalculationTree,
  PresentationNode,
  PresentationTree,
  RoleType,
} from '../core/types.js';
import type { ElementCatalog } from './element-catalog.js';
import { elementIdFromHref, selectDisplayLabel } from './element-id.js';
import { NS, attr, descendants, parseXml, xlink } from './xml.js';

/**
 * Relationship linkbases (presentation, calculation, definition).
 *
 * Arcs are gathered per extended-link role, then trees are built top-down
 * from every element that appears only as an arc source.
 */

export interface RelationshipArc {
  from: string;
  to: string;
  order: number;
  arcrole: string | null;
  preferred_label: string | null;
  weight: number;
}

export type ArcsByRole = Map<string, RelationshipArc[]>;

function parseNumberAttr(value: string | null, fallback: number): number {
  if (value === null) return fallback;
  const n = parseFloat(value);
  return Number.isFinite(n) ? n : fallback;
}

/** Extract arcs of one arc element type from a set of extended links */
export function arcsFromLinks(links: Element[], arcName: string): ArcsByRole {
  const byRole: ArcsByRole = new Map();
  for (const link of links) {
    const role = xlink(link, 'role');
    if (!role) continue;

    const locators = new Map<string, string>();
    for (const loc of descendants(link, NS.link, 'loc')) {
      const label = xlink(loc, 'label');
      const href = xlink(loc, 'href');
      if (label && href) locators.set(label, elementIdFromHref(href));
    }

    const arcs = byRole.get(role) ?? [];
    for (const arc of descendants(link, NS.link, arcName)) {
      const fromLabel = xlink(arc, 'from');
      const toLabel = xlink(arc, 'to');
      const from = fromLabel ? locators.get(fromLabel) : undefined;
      const to = toLabel ? locators.get(toLabel) : undefined;
      if (!from || !to) continue;
      arcs.push({
        from,
        to,
        order: parseNumberAttr(attr(arc, 'order'), 1.0),
        arcrole: xlink(arc, 'arcrole'),
        preferred_label: attr(arc, 'preferredLabel'),
        weight: parseNumberAttr(attr(arc, 'weight'), 1.0),
      });
    }
    byRole.set(role, arcs);
  }
  return byRole;
}

export function parseRelationshipLinkbase(
  content: string,
  linkName: string,
  arcName: string,
  source: string
): ArcsByRole {
  const root = parseXml(content, source);
  return arcsFromLinks(descendants(root, NS.link, linkName), arcName);
}

/**
 * Merge arcs from several files / links into one list per role.
 * A repeated (from, to, arcrole) keeps its first position but takes the later attributes.
 */
export function mergeArcs(target: ArcsByRole, incoming: ArcsByRole): void {
  for (const [role, arcs] of incoming) {
    const existing = target.get(role) ?? [];
    const index = new Map<string, number>();
    existing.forEach((a, i) => index.set(`${a.from}|${a.to}|${a.arcrole ?? ''}`, i));
    for (const arc of arcs) {
      const key = `${arc.from}|${arc.to}|${arc.arcrole ?? ''}`;
      const at = index.get(key);
      if (at === undefined) {
        index.set(key, existing.length);
        existing.push(arc);
      } else {
        existing[at] = arc;
      }
    }
    target.set(role, existing);
  }
}

/** Elements that appear as `from` but never as `to`, in first-seen order */
export function findRoots(arcs: RelationshipArc[]): string[] {
  const targets = new Set(arcs.map(a => a.to));
  const roots: string[] = [];
  for (const arc of arcs) {
    if (!targets.has(arc.from) && !roots.includes(arc.from)) roots.push(arc.from);
  }
  return roots;
}

/** Human definition of a role: declared roleType definition, else its last URI segment */
export function roleDefinition(roleUri: string, roleTypes: ReadonlyMap<string, RoleType>): string {
  const declared = roleTypes.get(roleUri)?.definition;
  if (declared) return declared;
  const segments = roleUri.split('/');
  return segments[segments.length - 1].replace(/_/g, ' ');
}

function childrenIndex(arcs: RelationshipArc[]): Map<string, RelationshipArc[]> {
  const byParent = new Map<string, RelationshipArc[]>();
  for (const arc of arcs) {
    const list = byParent.get(arc.from) ?? [];
    list.push(arc);
    byParent.set(arc.from, list);
  }
  for (const list of byParent.values()) list.sort((a, b) => a.order - b.order);
  return byParent;
}

export function buildPresentationTree(
  roleUri: string,
  arcs: RelationshipArc[],
  catalog: ElementCatalog,
  definition: string,
  order: number = 0
): PresentationTree | null {
  const roots = findRoots(arcs);
  if (roots.length === 0) return null;

  const byParent = childrenIndex(arcs);
  const nodes = new Map<string, PresentationNode>();

  const visit = (elementId: string, parent: string | null, depth: number, via: RelationshipArc | null, path: Set<string>): void => {
    const entry = catalog.get(elementId);
    const labels = entry ? entry.labels : {};
    const standardLabel = catalog.standardLabel(elementId);
    const preferred = via ? via.preferred_label : null;
    const childArcs = (byParent.get(elementId) ?? []).filter(a => !path.has(a.to));

    nodes.set(elementId, {
      element_id: elementId,
      element_name: entry ? entry.name : elementId,
      parent,
      children: childArcs.map(a => a.to),
      depth,
      order: via ? via.order : 0,
      is_abstract: entry ? entry.is_abstract : false,
      labels,
      standard_label: standardLabel,
      preferred_label: preferred,
      display_label: selectDisplayLabel(labels, preferred, standardLabel, elementId),
    });

    const nextPath = new Set(path).add(elementId);
    for (const arc of childArcs) visit(arc.to, elementId, depth + 1, arc, nextPath);
  };

  for (const root of roots) visit(root, null, 0, null, new Set());

  return {
    role_uri: roleUri,
    definition,
    root_element_id: roots[0],
    root_element_ids: roots,
    all_nodes: nodes,
    order,
  };
}

export function buildCalculationTree(
  roleUri: string,
  arcs: RelationshipArc[],
  catalog: ElementCatalog,
  definition: string
): CalculationTree | null {
  const roots = findRoots(arcs);
  if (roots.length === 0) return null;

  const byParent = childrenIndex(arcs);
  const nodes = new Map<string, CalculationNode>();

  const visit = (elementId: string, parent: string | null, depth: number, via: RelationshipArc | null, path: Set<string>): void => {
    const entry = catalog.get(elementId);
    const childArcs = (byParent.get(elementId) ?? []).filter(a => !path.has(a.to));

    nodes.set(elementId, {
      element_id: elementId,
      parent,
      children: childArcs.map(a => a.to),
      depth,
      order: via ? via.order : 0,
      weight: via ? via.weight : 1.0,
      balance: entry ? entry.balance : null,
      period_type: entry ? entry.period_type : null,
    });

    const nextPath = new Set(path).add(elementId);
    for (const arc of childArcs) visit(arc.to, elementId, depth + 1, arc, nextPath);
  };

  for (const root of roots) visit(root, null, 0, null, new Set());

  return {
    role_uri: roleUri,
    definition,
    root_element_id: roots[0],
    root_element_ids: roots,
    all_nodes: nodes,
  };
}
