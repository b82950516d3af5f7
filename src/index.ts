#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import type { LineItem } from './core/types.js';
import { XbrlDocument } from './core/xbrl-document.js';
import { XbrlFilings } from './core/xbrl-filings.js';
import { defaultStatementRegistry } from './processing/statement-registry.js';
import { PeriodType } from './processing/stitching.js';
import { getDefaultConceptMapper, standardizeStatement } from './processing/standardization.js';
import {
  type RatioDefinition,
  RATIO_DEFINITIONS,
  computeRatiosForPeriod,
  findRatioByName,
} from './processing/ratio-definitions.js';
import {
  periodColumns,
  renderEntityInfo,
  renderFactTable,
  renderPeriodViews,
  renderStatement,
  renderStatementList,
  renderStitched,
} from './output/table-renderer.js';
import { renderFactsJson, renderStatementJson, renderStitchedJson } from './output/json-renderer.js';
import { renderFactTableCsv, renderStatementCsv, renderStitchedCsv } from './output/csv-renderer.js';

function fail(err: unknown): never {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

function parseCount(value: string, flag: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) fail(`${flag} must be a positive integer, got "${value}"`);
  return n;
}

const program = new Command();

program
  .name('xbrl-stitch')
  .description('Parse XBRL filings, resolve financial statements and stitch them across periods')
  .version('0.1.0');

program
  .command('info')
  .description('Show entity and document information for a filing')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .action((dir: string) => {
    try {
      const doc = XbrlDocument.parseDirectory(dir);
      console.log('');
      console.log(renderEntityInfo(doc.entityInfo));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program
  .command('statements')
  .alias('ls')
  .description('List the statements of a filing in presentation order')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .action((dir: string) => {
    try {
      const doc = XbrlDocument.parseDirectory(dir);
      console.log('');
      console.log(renderStatementList(doc.getAllStatements()));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program
  .command('statement')
  .description('Show one statement (e.g., statement ./filing BalanceSheet)')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .argument('<roleOrType>', 'Role URI, statement type, role name or definition text')
  .option('-p, --period <key>', 'Only this period key (e.g., instant_2024-12-31)')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .action((dir: string, roleOrType: string, options: { period?: string; json?: boolean; csv?: boolean }) => {
    try {
      const doc = XbrlDocument.parseDirectory(dir);
      const info = doc.findStatement(roleOrType);
      if (!info) fail(`No statement matches "${roleOrType}". Run "xbrl-stitch statements ${dir}" to list them.`);

      const items = doc.getStatement(info.role, options.period);
      const columns = periodColumns(items, doc.reportingPeriods);

      if (options.json) {
        console.log(renderStatementJson(info, items, columns, doc.entityInfo));
      } else if (options.csv) {
        console.log(renderStatementCsv(items, columns));
      } else {
        console.log('');
        console.log(renderStatement(info.definition, items, columns));
        console.log('');
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('periods')
  .description('List the period views available for a statement type')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .argument('<statementType>', 'Statement type, e.g. BalanceSheet or IncomeStatement')
  .action((dir: string, statementType: string) => {
    try {
      const doc = XbrlDocument.parseDirectory(dir);
      console.log('');
      console.log(renderPeriodViews(doc.getPeriodViews(statementType), doc.reportingPeriods));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program
  .command('facts')
  .description('Query the facts of a filing')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .option('-c, --concept <pattern>', 'Concept regex (case-insensitive)')
  .option('-t, --text <pattern>', 'Regex against concept, label and element name')
  .option('-p, --period <key>', 'Period key')
  .option('-n, --limit <n>', 'Maximum number of facts', '50')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .action((dir: string, options: { concept?: string; text?: string; period?: string; limit: string; json?: boolean; csv?: boolean }) => {
    try {
      const doc = XbrlDocument.parseDirectory(dir);
      const query = doc.facts.query();
      if (options.concept) query.byConcept(options.concept);
      if (options.text) query.byText(options.text);
      if (options.period) query.byPeriodKey(options.period);
      query.limit(parseCount(options.limit, '--limit'));

      if (options.json) {
        console.log(renderFactsJson(query.execute()));
        return;
      }

      const table = query.excludeContexts().excludeElementInfo().toDataFrame();
      if (options.csv) {
        console.log(renderFactTableCsv(table));
      } else {
        console.log('');
        console.log(renderFactTable(table));
        console.log('');
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('stitch')
  .description('Stitch one statement type across several filings (newest first)')
  .argument('<dirs...>', 'One directory per filing')
  .requiredOption('--type <statementType>', 'BalanceSheet, IncomeStatement, CashFlowStatement, ...')
  .option('--policy <periodType>', `Period selection: ${Object.keys(PeriodType).join(', ')}`, 'RECENT_PERIODS')
  .option('-m, --max-periods <n>', 'Maximum number of periods', '3')
  .option('--no-standardize', 'Keep filer labels instead of standard concepts')
  .option('--by-concept', 'Merge rows by label and concept instead of label alone')
  .option('-j, --json', 'Output as JSON')
  .option('--csv', 'Output as CSV')
  .action((dirs: string[], options: {
    type: string;
    policy: string;
    maxPeriods: string;
    standardize: boolean;
    byConcept?: boolean;
    json?: boolean;
    csv?: boolean;
  }) => {
    try {
      const type = options.type;
      if (!defaultStatementRegistry.isStatementType(type)) {
        fail(`Unknown statement type "${type}". Expected one of: ${defaultStatementRegistry.types.join(', ')}`);
      }
      const maxPeriods = parseCount(options.maxPeriods, '--max-periods');

      const filings = XbrlFilings.fromDirectories(dirs);
      if (filings.documents.length === 0) fail('None of the directories could be parsed.');

      const stitched = XbrlDocument.stitchStatements(
        filings.documents,
        type,
        options.policy,
        maxPeriods,
        options.standardize,
        { keyBy: options.byConcept ? 'concept' : 'label' }
      );

      if (options.json) {
        console.log(renderStitchedJson(type, stitched));
      } else if (options.csv) {
        console.log(renderStitchedCsv(stitched));
      } else {
        const name = filings.entityInfo.entity_name;
        console.log('');
        console.log(renderStitched(name ? `${name}: ${type}` : type, stitched));
        console.log('');
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('ratios')
  .description('Compute financial ratios for the most recent period of a filing')
  .argument('<dir>', 'Directory holding one filing\'s XBRL files')
  .option('-r, --ratio <name>', 'Only this ratio (id, name or keyword such as "roa")')
  .option('-j, --json', 'Output as JSON')
  .action((dir: string, options: { ratio?: string; json?: boolean }) => {
    try {
      let wanted: RatioDefinition[] = RATIO_DEFINITIONS;
      if (options.ratio) {
        const def = findRatioByName(options.ratio);
        if (!def) fail(`Unknown ratio "${options.ratio}"`);
        wanted = [def];
      }

      const doc = XbrlDocument.parseDirectory(dir);
      const mapper = getDefaultConceptMapper();
      const rows: LineItem[] = [];
      const periodKeys: string[] = [];
      for (const type of ['IncomeStatement', 'BalanceSheet'] as const) {
        const statement = doc.getStatementByType(type);
        if (!statement) continue;
        rows.push(...standardizeStatement(statement.data, mapper, type));
        const view = doc.getPeriodViews(type)[0];
        if (view?.period_keys[0]) periodKeys.push(view.period_keys[0]);
      }

      const ratios = computeRatiosForPeriod(rows, periodKeys);
      if (options.json) {
        console.log(JSON.stringify({ periods: periodKeys, ratios: Object.fromEntries(wanted.map(d => [d.id, ratios[d.id] ?? null])) }, null, 2));
        return;
      }

      console.log('');
      for (const def of wanted) {
        const value = ratios[def.id] ?? null;
        const shown = value === null ? chalk.dim('n/a') : def.format === 'percentage' ? `${value.toFixed(1)}%` : `${value.toFixed(2)}x`;
        console.log(`  ${chalk.cyan(def.display_name.padEnd(22))} ${shown}`);
      }
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

program.parse();
