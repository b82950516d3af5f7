import type { XbrlSources } from '../src/parsing/xbrl-parser.js';

/**
 * Synthetic XBRL documents for tests. Element ids use the underscore form
 * (us-gaap_Assets); instance facts use QNames (us-gaap:Assets).
 */

const NAMESPACES = [
  'xmlns:xsd="http://www.w3.org/2001/XMLSchema"',
  'xmlns:xbrli="http://www.xbrl.org/2003/instance"',
  'xmlns:link="http://www.xbrl.org/2003/linkbase"',
  'xmlns:xlink="http://www.w3.org/1999/xlink"',
].join(' ');

export const ROLE = {
  balanceSheet: 'http://example.com/role/BalanceSheet',
  balanceSheetParenthetical: 'http://example.com/role/BalanceSheetParenthetical',
  incomeStatement: 'http://example.com/role/IncomeStatement',
  cashFlow: 'http://example.com/role/CashFlow',
  segments: 'http://example.com/role/SegmentInformation',
} as const;

export const ARCROLE_PARENT_CHILD = 'http://www.xbrl.org/2003/arcrole/parent-child';
export const ARCROLE_SUMMATION = 'http://www.xbrl.org/2003/arcrole/summation-item';

// ── Schema ─────────────────────────────────────────────────────────────

export interface ElementDef {
  id: string;
  type?: string;
  periodType?: 'instant' | 'duration';
  balance?: 'debit' | 'credit';
  abstract?: boolean;
}

export interface RoleDef {
  uri: string;
  definition: string;
}

function elementXml(e: ElementDef): string {
  const name = e.id.slice(e.id.indexOf('_') + 1);
  const attrs = [
    `id="${e.id}"`,
    `name="${name}"`,
    `type="${e.type ?? (e.abstract ? 'xbrli:stringItemType' : 'xbrli:monetaryItemType')}"`,
    `xbrli:periodType="${e.periodType ?? 'duration'}"`,
  ];
  if (e.balance) attrs.push(`xbrli:balance="${e.balance}"`);
  if (e.abstract) attrs.push('abstract="true"');
  return `  <xsd:element ${attrs.join(' ')}/>`;
}

export function schemaXml(elements: ElementDef[], roles: RoleDef[] = [], embeddedLinkbase: string = ''): string {
  const roleTypes = roles.map(r =>
    `      <link:roleType roleURI="${r.uri}" id="${r.uri.split('/').pop() ?? 'role'}">\n` +
    `        <link:definition>${r.definition}</link:definition>\n` +
    `        <link:usedOn>link:presentationLink</link:usedOn>\n` +
    `      </link:roleType>`
  );
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<xsd:schema ${NAMESPACES} targetNamespace="http://example.com/test">`,
    '  <xsd:annotation>',
    '    <xsd:appinfo>',
    ...roleTypes,
    embeddedLinkbase,
    '    </xsd:appinfo>',
    '  </xsd:annotation>',
    ...elements.map(elementXml),
    '</xsd:schema>',
  ].join('\n');
}

// ── Linkbases ──────────────────────────────────────────────────────────

export interface LabelDef {
  id: string;
  text: string;
  role?: string;
  lang?: string;
}

function labelLinkXml(labels: LabelDef[]): string {
  const body: string[] = [];
  const located = new Set<string>();
  labels.forEach((l, i) => {
    if (!located.has(l.id)) {
      located.add(l.id);
      body.push(`    <link:loc xlink:type="locator" xlink:href="test.xsd#${l.id}" xlink:label="loc_${l.id}"/>`);
    }
    const role = l.role ?? 'http://www.xbrl.org/2003/role/label';
    body.push(`    <link:label xlink:type="resource" xlink:label="lab_${l.id}_${i}" xlink:role="${role}" xml:lang="${l.lang ?? 'en-US'}">${l.text}</link:label>`);
    body.push(`    <link:labelArc xlink:type="arc" xlink:arcrole="http://www.xbrl.org/2003/arcrole/concept-label" xlink:from="loc_${l.id}" xlink:to="lab_${l.id}_${i}"/>`);
  });
  return [
    '  <link:labelLink xlink:type="extended" xlink:role="http://www.xbrl.org/2003/role/link">',
    ...body,
    '  </link:labelLink>',
  ].join('\n');
}

export function labelXml(labels: LabelDef[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<link:linkbase ${NAMESPACES}>`,
    labelLinkXml(labels),
    '</link:linkbase>',
  ].join('\n');
}

export interface ArcDef {
  from: string;
  to: string;
  order?: number;
  weight?: number;
  arcrole?: string;
  preferredLabel?: string;
}

export interface LinkDef {
  role: string;
  arcs: ArcDef[];
}

type RelationshipKind = 'presentation' | 'calculation' | 'definition';

function relationshipLinksXml(kind: RelationshipKind, links: LinkDef[]): string {
  const defaultArcrole = kind === 'calculation' ? ARCROLE_SUMMATION : ARCROLE_PARENT_CHILD;
  return links.map(link => {
    const ids: string[] = [];
    for (const arc of link.arcs) {
      if (!ids.includes(arc.from)) ids.push(arc.from);
      if (!ids.includes(arc.to)) ids.push(arc.to);
    }
    const locs = ids.map(id => `    <link:loc xlink:type="locator" xlink:href="test.xsd#${id}" xlink:label="loc_${id}"/>`);
    const arcs = link.arcs.map((arc, i) => {
      const attrs = [
        'xlink:type="arc"',
        `xlink:arcrole="${arc.arcrole ?? defaultArcrole}"`,
        `xlink:from="loc_${arc.from}"`,
        `xlink:to="loc_${arc.to}"`,
        `order="${arc.order ?? i + 1}"`,
      ];
      if (arc.weight !== undefined) attrs.push(`weight="${arc.weight}"`);
      if (arc.preferredLabel) attrs.push(`preferredLabel="${arc.preferredLabel}"`);
      return `    <link:${kind}Arc ${attrs.join(' ')}/>`;
    });
    return [
      `  <link:${kind}Link xlink:type="extended" xlink:role="${link.role}">`,
      ...locs,
      ...arcs,
      `  </link:${kind}Link>`,
    ].join('\n');
  }).join('\n');
}

export function linkbaseXml(kind: RelationshipKind, links: LinkDef[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<link:linkbase ${NAMESPACES}>`,
    relationshipLinksXml(kind, links),
    '</link:linkbase>',
  ].join('\n');
}

/** A <link:linkbase> block for embedding under <xsd:appinfo> */
export function embeddedLinkbase(kind: RelationshipKind, links: LinkDef[], labels: LabelDef[] = []): string {
  return [
    '      <link:linkbase>',
    relationshipLinksXml(kind, links),
    labels.length > 0 ? labelLinkXml(labels) : '',
    '      </link:linkbase>',
  ].join('\n');
}

// ── Instance ───────────────────────────────────────────────────────────

export interface ContextDef {
  id: string;
  identifier?: string;
  instant?: string;
  start?: string;
  end?: string;
  forever?: boolean;
  /** dimension QName -> member QName, written under <segment> */
  dims?: Record<string, string>;
  /** dimension QName -> member QName, written under <scenario> */
  scenario?: Record<string, string>;
}

export interface UnitDef {
  id: string;
  measure?: string;
  numerator?: string;
  denominator?: string;
}

export interface FactDef {
  concept: string;
  context: string;
  value: string;
  unit?: string;
  decimals?: string;
}

function membersXml(dims: Record<string, string>): string {
  return Object.entries(dims)
    .map(([dim, member]) => `        <xbrldi:explicitMember dimension="${dim}">${member}</xbrldi:explicitMember>`)
    .join('\n');
}

function contextXml(c: ContextDef): string {
  const period = c.instant
    ? `      <xbrli:instant>${c.instant}</xbrli:instant>`
    : c.forever
      ? '      <xbrli:forever/>'
      : `      <xbrli:startDate>${c.start ?? ''}</xbrli:startDate>\n      <xbrli:endDate>${c.end ?? ''}</xbrli:endDate>`;
  const segment = c.dims ? `\n      <xbrli:segment>\n${membersXml(c.dims)}\n      </xbrli:segment>` : '';
  const scenario = c.scenario ? `\n    <xbrli:scenario>\n${membersXml(c.scenario)}\n    </xbrli:scenario>` : '';
  return [
    `  <xbrli:context id="${c.id}">`,
    '    <xbrli:entity>',
    `      <xbrli:identifier scheme="http://www.sec.gov/CIK">${c.identifier ?? '0000123456'}</xbrli:identifier>${segment}`,
    '    </xbrli:entity>',
    '    <xbrli:period>',
    period,
    `    </xbrli:period>${scenario}`,
    '  </xbrli:context>',
  ].join('\n');
}

function unitXml(u: UnitDef): string {
  if (u.numerator && u.denominator) {
    return [
      `  <xbrli:unit id="${u.id}">`,
      '    <xbrli:divide>',
      `      <xbrli:unitNumerator><xbrli:measure>${u.numerator}</xbrli:measure></xbrli:unitNumerator>`,
      `      <xbrli:unitDenominator><xbrli:measure>${u.denominator}</xbrli:measure></xbrli:unitDenominator>`,
      '    </xbrli:divide>',
      '  </xbrli:unit>',
    ].join('\n');
  }
  return `  <xbrli:unit id="${u.id}"><xbrli:measure>${u.measure ?? 'iso4217:USD'}</xbrli:measure></xbrli:unit>`;
}

function factXml(f: FactDef): string {
  const attrs = [`contextRef="${f.context}"`];
  if (f.unit) attrs.push(`unitRef="${f.unit}"`);
  if (f.decimals) attrs.push(`decimals="${f.decimals}"`);
  return `  <${f.concept} ${attrs.join(' ')}>${f.value}</${f.concept}>`;
}

export function instanceXml(doc: { contexts: ContextDef[]; units?: UnitDef[]; facts: FactDef[] }): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<xbrli:xbrl xmlns:xbrli="http://www.xbrl.org/2003/instance"',
    '  xmlns:link="http://www.xbrl.org/2003/linkbase"',
    '  xmlns:xlink="http://www.w3.org/1999/xlink"',
    '  xmlns:xbrldi="http://xbrl.org/2006/xbrldi"',
    '  xmlns:iso4217="http://www.xbrl.org/2003/iso4217"',
    '  xmlns:us-gaap="http://fasb.org/us-gaap/2024"',
    '  xmlns:dei="http://xbrl.sec.gov/dei/2024"',
    '  xmlns:test="http://example.com/test">',
    ...doc.contexts.map(contextXml),
    ...(doc.units ?? [{ id: 'usd' }]).map(unitXml),
    ...doc.facts.map(factXml),
    '</xbrli:xbrl>',
  ].join('\n');
}

// ── Sample filing ──────────────────────────────────────────────────────

export const SAMPLE_ELEMENTS: ElementDef[] = [
  { id: 'us-gaap_StatementOfFinancialPositionAbstract', abstract: true },
  { id: 'us-gaap_Assets', periodType: 'instant', balance: 'debit' },
  { id: 'us-gaap_Liabilities', periodType: 'instant', balance: 'credit' },
  { id: 'us-gaap_StockholdersEquity', periodType: 'instant', balance: 'credit' },
  { id: 'us-gaap_IncomeStatementAbstract', abstract: true },
  { id: 'us-gaap_Revenues', balance: 'credit' },
  { id: 'us-gaap_NetIncomeLoss', balance: 'credit' },
  { id: 'us-gaap_StatementOfCashFlowsAbstract', abstract: true },
  { id: 'us-gaap_IncreaseDecreaseInInventories', balance: 'credit' },
  { id: 'us-gaap_NetCashProvidedByUsedInOperatingActivities', balance: 'debit' },
];

export const SAMPLE_LABELS: LabelDef[] = [
  { id: 'us-gaap_StatementOfFinancialPositionAbstract', text: 'Statement of Financial Position [Abstract]' },
  { id: 'us-gaap_Assets', text: 'Assets' },
  { id: 'us-gaap_Assets', text: 'Total assets', role: 'http://www.xbrl.org/2003/role/totalLabel' },
  { id: 'us-gaap_Liabilities', text: 'Liabilities' },
  { id: 'us-gaap_StockholdersEquity', text: 'Stockholders equity' },
  { id: 'us-gaap_IncomeStatementAbstract', text: 'Income Statement [Abstract]' },
  { id: 'us-gaap_Revenues', text: 'Revenues' },
  { id: 'us-gaap_NetIncomeLoss', text: 'Net income (loss)' },
  { id: 'us-gaap_StatementOfCashFlowsAbstract', text: 'Statement of Cash Flows [Abstract]' },
  { id: 'us-gaap_IncreaseDecreaseInInventories', text: 'Increase (decrease) in inventories' },
  { id: 'us-gaap_NetCashProvidedByUsedInOperatingActivities', text: 'Net cash provided by operating activities' },
];

export const SAMPLE_ROLES: RoleDef[] = [
  { uri: ROLE.balanceSheet, definition: '0001 - Statement - Consolidated Balance Sheets' },
  { uri: ROLE.incomeStatement, definition: '0002 - Statement - Consolidated Statements of Operations' },
  { uri: ROLE.cashFlow, definition: '0003 - Statement - Consolidated Statements of Cash Flows' },
];

export const SAMPLE_PRESENTATION: LinkDef[] = [
  {
    role: ROLE.balanceSheet,
    arcs: [
      { from: 'us-gaap_StatementOfFinancialPositionAbstract', to: 'us-gaap_Assets' },
      { from: 'us-gaap_StatementOfFinancialPositionAbstract', to: 'us-gaap_Liabilities' },
      { from: 'us-gaap_StatementOfFinancialPositionAbstract', to: 'us-gaap_StockholdersEquity' },
    ],
  },
  {
    role: ROLE.incomeStatement,
    arcs: [
      { from: 'us-gaap_IncomeStatementAbstract', to: 'us-gaap_Revenues' },
      { from: 'us-gaap_IncomeStatementAbstract', to: 'us-gaap_NetIncomeLoss' },
    ],
  },
  {
    role: ROLE.cashFlow,
    arcs: [
      { from: 'us-gaap_StatementOfCashFlowsAbstract', to: 'us-gaap_IncreaseDecreaseInInventories' },
      { from: 'us-gaap_StatementOfCashFlowsAbstract', to: 'us-gaap_NetCashProvidedByUsedInOperatingActivities' },
    ],
  },
];

export const SAMPLE_CALCULATION: LinkDef[] = [
  {
    role: ROLE.cashFlow,
    arcs: [
      { from: 'us-gaap_NetCashProvidedByUsedInOperatingActivities', to: 'us-gaap_IncreaseDecreaseInInventories', weight: -1 },
    ],
  },
];

/**
 * A 10-K for fiscal `year` (calendar year end) reporting `year` and `year - 1`.
 * Values depend only on the year they describe, so overlapping filings agree:
 *
 *   Assets       1000 - 100 * (2024 - y)
 *   Liabilities   400 -  50 * (2024 - y)
 *   Equity        600 -  50 * (2024 - y)
 *   Revenues     5000 - 1000 * (2024 - y)
 *   Net income    500 - 200 * (2024 - y)
 *   Inventories increase 50 (raw, current year only; weight -1)
 *   Operating cash 700 (current year only)
 */
export function sampleInstance(year: number = 2024): string {
  const back = (y: number): number => 2024 - y;
  const contexts: ContextDef[] = [];
  const facts: FactDef[] = [];

  for (const y of [year, year - 1]) {
    contexts.push({ id: `I${y}`, instant: `${y}-12-31` });
    contexts.push({ id: `D${y}`, start: `${y}-01-01`, end: `${y}-12-31` });
    facts.push(
      { concept: 'us-gaap:Assets', context: `I${y}`, value: String(1000 - 100 * back(y)), unit: 'usd', decimals: '-6' },
      { concept: 'us-gaap:Liabilities', context: `I${y}`, value: String(400 - 50 * back(y)), unit: 'usd', decimals: '-6' },
      { concept: 'us-gaap:StockholdersEquity', context: `I${y}`, value: String(600 - 50 * back(y)), unit: 'usd', decimals: '-6' },
      { concept: 'us-gaap:Revenues', context: `D${y}`, value: String(5000 - 1000 * back(y)), unit: 'usd', decimals: '-6' },
      { concept: 'us-gaap:NetIncomeLoss', context: `D${y}`, value: String(500 - 200 * back(y)), unit: 'usd', decimals: '-6' },
    );
  }

  facts.push(
    { concept: 'us-gaap:IncreaseDecreaseInInventories', context: `D${year}`, value: '50', unit: 'usd', decimals: '-6' },
    { concept: 'us-gaap:NetCashProvidedByUsedInOperatingActivities', context: `D${year}`, value: '700', unit: 'usd', decimals: '-6' },
    { concept: 'dei:DocumentType', context: `D${year}`, value: '10-K' },
    { concept: 'dei:EntityRegistrantName', context: `D${year}`, value: 'Example Corp' },
    { concept: 'dei:TradingSymbol', context: `D${year}`, value: 'EXMP' },
    { concept: 'dei:DocumentPeriodEndDate', context: `D${year}`, value: `${year}-12-31` },
    { concept: 'dei:DocumentFiscalYearFocus', context: `D${year}`, value: String(year) },
    { concept: 'dei:DocumentFiscalPeriodFocus', context: `D${year}`, value: 'FY' },
    { concept: 'dei:CurrentFiscalYearEndDate', context: `D${year}`, value: '--12-31' },
  );

  return instanceXml({ contexts, facts });
}

export function sampleFiling(year: number = 2024): XbrlSources {
  return {
    schema: schemaXml(SAMPLE_ELEMENTS, SAMPLE_ROLES),
    labels: labelXml(SAMPLE_LABELS),
    presentation: linkbaseXml('presentation', SAMPLE_PRESENTATION),
    calculation: linkbaseXml('calculation', SAMPLE_CALCULATION),
    instance: sampleInstance(year),
  };
}
