import type { Axis, Domain, Table } from '../core/types.js';
import type { ElementCatalog } from './element-catalog.js';
import type { ArcsByRole } from './linkbase-parser.js';

/**
 * Dimensional structures from definition-linkbase arcs: hypercubes (tables),
 * their axes, and the domain/member hierarchies under each axis.
 */

export const ARCROLE = {
  hypercubeDimension: 'http://xbrl.org/int/dim/arcrole/hypercube-dimension',
  dimensionDomain: 'http://xbrl.org/int/dim/arcrole/dimension-domain',
  domainMember: 'http://xbrl.org/int/dim/arcrole/domain-member',
  dimensionDefault: 'http://xbrl.org/int/dim/arcrole/dimension-default',
  all: 'http://xbrl.org/int/dim/arcrole/all',
} as const;

export interface DimensionalStructures {
  axes: Map<string, Axis>;
  domains: Map<string, Domain>;
  tables: Map<string, Table>;
}

export function buildDimensionalStructures(arcsByRole: ArcsByRole, catalog: ElementCatalog): DimensionalStructures {
  const axes = new Map<string, Axis>();
  const domains = new Map<string, Domain>();
  const tables = new Map<string, Table>();
  const memberParent = new Map<string, string>();

  const labelOf = (id: string): string => catalog.standardLabel(id) ?? id;

  const axisFor = (id: string): Axis => {
    let axis = axes.get(id);
    if (!axis) {
      axis = { element_id: id, label: labelOf(id), domain_id: null, default_member_id: null };
      axes.set(id, axis);
    }
    return axis;
  };

  const domainFor = (id: string): Domain => {
    let domain = domains.get(id);
    if (!domain) {
      domain = { element_id: id, label: labelOf(id), members: [], parent: null };
      domains.set(id, domain);
    }
    return domain;
  };

  for (const [role, arcs] of arcsByRole) {
    const tableAxes = new Map<string, string[]>();
    for (const arc of arcs) {
      if (arc.arcrole !== ARCROLE.hypercubeDimension) continue;
      axisFor(arc.to);
      const list = tableAxes.get(arc.from) ?? [];
      if (!list.includes(arc.to)) list.push(arc.to);
      tableAxes.set(arc.from, list);
    }

    for (const arc of arcs) {
      switch (arc.arcrole) {
        case ARCROLE.dimensionDomain:
          axisFor(arc.from).domain_id = arc.to;
          domainFor(arc.to);
          break;
        case ARCROLE.dimensionDefault:
          axisFor(arc.from).default_member_id = arc.to;
          break;
        case ARCROLE.domainMember: {
          const domain = domainFor(arc.from);
          if (!domain.members.includes(arc.to)) domain.members.push(arc.to);
          memberParent.set(arc.to, arc.from);
          break;
        }
        case ARCROLE.all: {
          // Standard direction is line items -> hypercube; tolerate the reverse
          const [tableId, lineItemsId] = tableAxes.has(arc.from) && !tableAxes.has(arc.to)
            ? [arc.from, arc.to]
            : [arc.to, arc.from];
          const axisIds = tableAxes.get(tableId) ?? [];
          if (axisIds.length === 0) break;
          const existing = tables.get(tableId);
          if (existing) {
            if (!existing.line_items.includes(lineItemsId)) existing.line_items.push(lineItemsId);
          } else {
            tables.set(tableId, {
              element_id: tableId,
              label: labelOf(tableId),
              role_uri: role,
              axes: axisIds,
              line_items: [lineItemsId],
            });
          }
          break;
        }
      }
    }
  }

  for (const domain of domains.values()) {
    domain.parent = memberParent.get(domain.element_id) ?? null;
  }

  return { axes, domains, tables };
}
