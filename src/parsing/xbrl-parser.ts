import type {
  Axis,
  CalculationTree,
  Context,
  Domain,
  ElementCatalogEntry,
  EntityInfo,
  PresentationTree,
  ReportingPeriod,
  RoleType,
  Table,
  Unit,
} from '../core/types.js';
import { FactStore } from '../core/fact-store.js';
import { debug, logWarnings } from '../core/logger.js';
import { applyCalculationWeights } from '../processing/sign-correction.js';
import { buildReportingPeriods } from '../processing/reporting-periods.js';
import { extractEntityInfo } from '../processing/entity-info.js';
import { type ElementCatalog, buildElementCatalog } from './element-catalog.js';
import { type LabelAssignment, labelsFromLinks, parseLabelLinkbase } from './label-parser.js';
import {
  type ArcsByRole,
  arcsFromLinks,
  buildCalculationTree,
  buildPresentationTree,
  mergeArcs,
  parseRelationshipLinkbase,
  roleDefinition,
} from './linkbase-parser.js';
import { buildDimensionalStructures } from './definition-parser.js';
import { type EmbeddedLinkbases, type LinkbaseKind, EXTENDED_LINK, LINKBASE_KINDS, parseSchema } from './schema-parser.js';
import { type ParsedInstance, parseInstance } from './instance-parser.js';

/**
 * XBRL parser. The parse* methods only collect raw records; build() assembles
 * them in a fixed order:
 *
 *   catalog + labels -> presentation / calculation / dimensional structures
 *   -> de-duplicated facts -> one sign-correction pass
 *   -> reporting periods -> entity info
 */

export interface XbrlModel {
  catalog: ElementCatalog;
  role_types: Map<string, RoleType>;
  presentation_trees: Map<string, PresentationTree>;
  calculation_trees: Map<string, CalculationTree>;
  axes: Map<string, Axis>;
  domains: Map<string, Domain>;
  tables: Map<string, Table>;
  contexts: Map<string, Context>;
  units: Map<string, Unit>;
  facts: FactStore;
  periods: ReportingPeriod[];
  context_period_map: Map<string, string>;
  entity_info: EntityInfo;
}

/** File contents by role; every part is optional */
export interface XbrlSources {
  schema?: string;
  labels?: string;
  presentation?: string;
  calculation?: string;
  definition?: string;
  instance?: string;
}

type RelationshipKind = Exclude<LinkbaseKind, 'label'>;

const ARC_NAME: Record<RelationshipKind, string> = {
  presentation: 'presentationArc',
  calculation: 'calculationArc',
  definition: 'definitionArc',
};

export class XbrlParser {
  private declarations: ElementCatalogEntry[] = [];
  private readonly roleTypes = new Map<string, RoleType>();
  private embedded: EmbeddedLinkbases = { label: [], presentation: [], calculation: [], definition: [] };
  private readonly standalone = new Set<LinkbaseKind>();
  private labels: LabelAssignment[] = [];
  private readonly arcs: Record<RelationshipKind, ArcsByRole> = {
    presentation: new Map(),
    calculation: new Map(),
    definition: new Map(),
  };
  private instance: ParsedInstance | null = null;

  parseSchema(content: string, source: string = 'schema'): this {
    const schema = parseSchema(content, source);
    this.declarations.push(...schema.elements);
    for (const role of schema.role_types) this.roleTypes.set(role.role_uri, role);
    logWarnings(source, schema.embedded.warnings);
    for (const kind of LINKBASE_KINDS) {
      this.embedded[kind].push(...schema.embedded.value[kind]);
    }
    return this;
  }

  parseLabels(content: string, source: string = 'label linkbase'): this {
    this.labels.push(...parseLabelLinkbase(content, source));
    this.standalone.add('label');
    return this;
  }

  parsePresentation(content: string, source: string = 'presentation linkbase'): this {
    return this.parseRelationships('presentation', content, source);
  }

  parseCalculation(content: string, source: string = 'calculation linkbase'): this {
    return this.parseRelationships('calculation', content, source);
  }

  parseDefinition(content: string, source: string = 'definition linkbase'): this {
    return this.parseRelationships('definition', content, source);
  }

  parseInstance(content: string, source: string = 'instance'): this {
    this.instance = parseInstance(content, source);
    return this;
  }

  /** Parse every provided source in dependency order; `names` labels them in errors */
  parseAll(sources: XbrlSources, names: Partial<Record<keyof XbrlSources, string>> = {}): this {
    if (sources.schema !== undefined) this.parseSchema(sources.schema, names.schema);
    if (sources.labels !== undefined) this.parseLabels(sources.labels, names.labels);
    if (sources.presentation !== undefined) this.parsePresentation(sources.presentation, names.presentation);
    if (sources.calculation !== undefined) this.parseCalculation(sources.calculation, names.calculation);
    if (sources.definition !== undefined) this.parseDefinition(sources.definition, names.definition);
    if (sources.instance !== undefined) this.parseInstance(sources.instance, names.instance);
    return this;
  }

  private parseRelationships(kind: RelationshipKind, content: string, source: string): this {
    mergeArcs(this.arcs[kind], parseRelationshipLinkbase(content, EXTENDED_LINK[kind], ARC_NAME[kind], source));
    this.standalone.add(kind);
    return this;
  }

  /** Standalone files win; embedded linkbases of a kind are used only when none was parsed */
  private relationshipArcs(kind: RelationshipKind): ArcsByRole {
    if (this.standalone.has(kind)) return this.arcs[kind];
    const embedded: ArcsByRole = new Map();
    mergeArcs(embedded, arcsFromLinks(this.embedded[kind], ARC_NAME[kind]));
    if (embedded.size > 0) debug(`using ${embedded.size} embedded ${kind} role(s)`);
    return embedded;
  }

  build(): XbrlModel {
    const labels = this.standalone.has('label') ? this.labels : labelsFromLinks(this.embedded.label);
    const catalog = buildElementCatalog(this.declarations, labels);

    const presentationTrees = new Map<string, PresentationTree>();
    let order = 0;
    for (const [role, arcs] of this.relationshipArcs('presentation')) {
      const tree = buildPresentationTree(role, arcs, catalog, roleDefinition(role, this.roleTypes), order++);
      if (tree) presentationTrees.set(role, tree);
    }

    const calculationTrees = new Map<string, CalculationTree>();
    for (const [role, arcs] of this.relationshipArcs('calculation')) {
      const tree = buildCalculationTree(role, arcs, catalog, roleDefinition(role, this.roleTypes));
      if (tree) calculationTrees.set(role, tree);
    }

    const { axes, domains, tables } = buildDimensionalStructures(this.relationshipArcs('definition'), catalog);

    const contexts = this.instance?.contexts ?? new Map<string, Context>();
    const units = this.instance?.units ?? new Map<string, Unit>();
    const corrected = applyCalculationWeights(new FactStore(this.instance?.facts ?? []), calculationTrees.values());
    logWarnings('sign correction', corrected.warnings);
    const facts = corrected.value;

    const { periods, context_period_map } = buildReportingPeriods(contexts.values());
    const entity = extractEntityInfo(facts, contexts, periods);
    logWarnings('entity info', entity.warnings);

    return {
      catalog,
      role_types: new Map(this.roleTypes),
      presentation_trees: presentationTrees,
      calculation_trees: calculationTrees,
      axes,
      domains,
      tables,
      contexts,
      units,
      facts,
      periods,
      context_period_map,
      entity_info: entity.value,
    };
  }
}
