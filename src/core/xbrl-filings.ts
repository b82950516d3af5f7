import type { EntityInfo, StatementExtraction, StatementType, StitchedStatement } from './types.js';
import { XbrlDocument } from './xbrl-document.js';
import { type StitchOptions, StatementStitcher } from '../processing/stitching.js';
import { EMPTY_ENTITY_INFO } from '../processing/entity-info.js';
import { warn } from './logger.js';

/**
 * Several filings of one company, stitched on demand.
 * Documents are kept newest first; stitched statements are memoized.
 */

function endDateOf(doc: XbrlDocument): string {
  return doc.entityInfo.document_period_end_date ?? doc.entityInfo.reporting_end_date ?? '';
}

export class XbrlFilings {
  readonly documents: XbrlDocument[];
  private readonly cache = new Map<string, StitchedStatement>();

  constructor(documents: XbrlDocument[]) {
    this.documents = [...documents].sort((a, b) => {
      const ea = endDateOf(a);
      const eb = endDateOf(b);
      return ea < eb ? 1 : ea > eb ? -1 : 0;
    });
  }

  /** Directories that fail to parse are skipped with a warning */
  static fromDirectories(dirs: string[]): XbrlFilings {
    const documents: XbrlDocument[] = [];
    for (const dir of dirs) {
      try {
        documents.push(XbrlDocument.parseDirectory(dir));
      } catch (err) {
        warn(`could not parse ${dir}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return new XbrlFilings(documents);
  }

  get entityInfo(): EntityInfo {
    return this.documents[0]?.entityInfo ?? { ...EMPTY_ENTITY_INFO };
  }

  /** Every period the filings carry, newest first, up to `maxPeriods` */
  getStatement(
    statementType: StatementType,
    maxPeriods: number = 8,
    standardize: boolean = true,
    options: StitchOptions = {}
  ): StitchedStatement {
    const key = [statementType, maxPeriods, standardize, options.keyBy ?? 'label', options.order ?? 'level'].join('|');
    const hit = this.cache.get(key);
    if (hit) return hit;

    const statements = this.documents
      .map(doc => doc.getStatementByType(statementType))
      .filter((s): s is StatementExtraction => s !== null);
    const stitched = new StatementStitcher().stitch(statements, 'ALL_PERIODS', maxPeriods, standardize, options);
    this.cache.set(key, stitched);
    return stitched;
  }

  balanceSheet(maxPeriods?: number, standardize?: boolean): StitchedStatement {
    return this.getStatement('BalanceSheet', maxPeriods, standardize);
  }

  incomeStatement(maxPeriods?: number, standardize?: boolean): StitchedStatement {
    return this.getStatement('IncomeStatement', maxPeriods, standardize);
  }

  cashFlowStatement(maxPeriods?: number, standardize?: boolean): StitchedStatement {
    return this.getStatement('CashFlowStatement', maxPeriods, standardize);
  }
}
