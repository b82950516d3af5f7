/**
 * Public library surface.
 *
 *   import { XbrlDocument } from 'xbrl-stitch';
 *   const doc = XbrlDocument.parseDirectory('./filings/2024-10k');
 *   doc.getStatement('IncomeStatement');
 */

export type * from './core/types.js';

export { XbrlDocument, clearDocumentCache } from './core/xbrl-document.js';
export { XbrlFilings } from './core/xbrl-filings.js';
export { XbrlParser, type XbrlModel, type XbrlSources } from './parsing/xbrl-parser.js';
export { type SourcePaths, type SourceRole, classifyDirectory, classifyFile, readSources } from './core/loader.js';
export { XbrlProcessingError, ConfigError, MappingFileError } from './core/errors.js';
export { type AppConfig, type LogLevel, getConfig, loadConfig, resetConfig } from './core/config.js';
export { FactStore } from './core/fact-store.js';
export { normalizeElementId } from './parsing/element-id.js';

export {
  StatementRegistry,
  type StatementTypeEntry,
  DEFAULT_STATEMENT_TYPES,
  defaultStatementRegistry,
} from './processing/statement-registry.js';
export { getPeriodViews, type PeriodNature } from './processing/period-views.js';
export {
  ConceptMapper,
  MappingStore,
  StandardConcept,
  type InferenceStrategy,
  type InferredMapping,
  getDefaultConceptMapper,
  inferByLabelSimilarity,
  standardizeStatement,
} from './processing/standardization.js';
export {
  PeriodType,
  type PeriodTypeKey,
  type StitchOptions,
  StatementStitcher,
  stitchStatements,
  stitchedToTable,
} from './processing/stitching.js';
export {
  type EnrichedFact,
  type FactTable,
  FactQuery,
  FactsView,
} from './processing/fact-query.js';
export { computeRatio } from './processing/calculations.js';
export { RATIO_DEFINITIONS, computeRatiosForPeriod, findRatioByName } from './processing/ratio-definitions.js';
