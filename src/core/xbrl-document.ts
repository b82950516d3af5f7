import type {
  EntityInfo,
  Fact,
  LineItem,
  PeriodView,
  ReportingPeriod,
  StatementExtraction,
  StatementInfo,
  StatementType,
  StitchedStatement,
} from './types.js';
import { type XbrlModel, type XbrlSources, XbrlParser } from '../parsing/xbrl-parser.js';
import { StatementResolver } from '../processing/statement-resolver.js';
import { StatementRegistry, defaultStatementRegistry } from '../processing/statement-registry.js';
import { getPeriodViews } from '../processing/period-views.js';
import { FactsView } from '../processing/fact-query.js';
import { type StitchOptions, stitchStatements } from '../processing/stitching.js';
import { type SourcePaths, classifyDirectory, readSources } from './loader.js';
import { MemoCache, contentHash } from './cache.js';
import { getConfig } from './config.js';
import { debug } from './logger.js';

/**
 * A parsed XBRL filing. Read-only after construction.
 *
 *   const doc = XbrlDocument.parseDirectory('./filings/aapl-2024');
 *   doc.getStatement('BalanceSheet');
 *   doc.facts.query().byConcept('Revenue').execute();
 */

let documentCache: MemoCache<XbrlDocument> | null = null;

function cache(): MemoCache<XbrlDocument> {
  if (!documentCache) documentCache = new MemoCache<XbrlDocument>(getConfig().documentCacheSize);
  return documentCache;
}

/** Forget every memoized document; the next load re-parses */
export function clearDocumentCache(): void {
  documentCache = null;
}

export class XbrlDocument {
  readonly facts: FactsView;
  private readonly resolver: StatementResolver;

  constructor(
    readonly model: XbrlModel,
    private readonly registry: StatementRegistry = defaultStatementRegistry
  ) {
    this.resolver = new StatementResolver(model, registry);
    this.facts = new FactsView(this);
  }

  /** Parse file contents; identical inputs return the same document */
  static fromContents(sources: XbrlSources, names: SourcePaths = {}): XbrlDocument {
    const key = contentHash({ ...sources });
    return cache().getOrCompute(key, () => {
      debug(`parsing XBRL document ${key.slice(0, 12)}`);
      return new XbrlDocument(new XbrlParser().parseAll(sources, names).build());
    });
  }

  static fromFiles(paths: SourcePaths): XbrlDocument {
    return XbrlDocument.fromContents(readSources(paths), paths);
  }

  static parseDirectory(dir: string): XbrlDocument {
    return XbrlDocument.fromFiles(classifyDirectory(dir));
  }

  /** Stitch one statement type across documents ordered newest first */
  static stitchStatements(
    documents: XbrlDocument[],
    statementType: StatementType,
    periodType: string = 'RECENT_PERIODS',
    maxPeriods: number = 3,
    standardize: boolean = true,
    options: StitchOptions = {}
  ): StitchedStatement {
    return stitchStatements(documents, statementType, periodType, maxPeriods, standardize, options);
  }

  get entityInfo(): EntityInfo {
    return this.model.entity_info;
  }

  get reportingPeriods(): ReportingPeriod[] {
    return this.model.periods;
  }

  getAllStatements(): StatementInfo[] {
    return this.resolver.getAllStatements();
  }

  findStatement(roleOrType: string): StatementInfo | null {
    return this.resolver.findStatement(roleOrType);
  }

  /** Line items of a statement by role URI, type, role name or definition; [] when nothing matches */
  getStatement(roleOrType: string, periodFilter?: string): LineItem[] {
    return this.resolver.getStatement(roleOrType, periodFilter);
  }

  getStatementByType(type: StatementType): StatementExtraction | null {
    return this.resolver.getStatementByType(type);
  }

  getPeriodViews(statementType: string): PeriodView[] {
    const type = this.registry.isStatementType(statementType)
      ? statementType
      : this.resolver.findStatement(statementType)?.type ?? null;
    const nature = type ? this.registry.periodNature(type) : 'duration';
    return getPeriodViews(nature, this.model.periods, this.model.entity_info);
  }

  getFact(elementId: string, contextId: string): Fact | null {
    return this.model.facts.getFact(elementId, contextId);
  }
}
