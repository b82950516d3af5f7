import type { Context, ContextPeriod, Decimals, Fact, Unit } from '../core/types.js';
import { guessPrefix } from './element-id.js';
import {
  NS,
  attr,
  childElements,
  firstChild,
  namespaceDeclarations,
  ownText,
  parseXml,
  textOf,
} from './xml.js';

/**
 * Instance document parsing: contexts, units and facts.
 */

export interface ParsedInstance {
  contexts: Map<string, Context>;
  units: Map<string, Unit>;
  /** Every fact in document order, before (element, context) de-duplication */
  facts: Fact[];
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Strip thousands separators and parse; null when the value is not a number */
export function parseNumericValue(value: string): number | null {
  const cleaned = value.replace(/,/g, '').trim();
  if (!NUMBER_PATTERN.test(cleaned)) return null;
  const n = parseFloat(cleaned);
  return Number.isFinite(n) ? n : null;
}

export function parseDecimals(value: string | null): Decimals | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed === 'INF') return 'INF';
  return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

function parsePeriod(el: Element | null): ContextPeriod | null {
  if (!el) return null;
  const instant = textOf(firstChild(el, NS.xbrli, 'instant'));
  if (instant) return { type: 'instant', instant };
  const start = textOf(firstChild(el, NS.xbrli, 'startDate'));
  const end = textOf(firstChild(el, NS.xbrli, 'endDate'));
  if (start && end) return { type: 'duration', start_date: start, end_date: end };
  if (firstChild(el, NS.xbrli, 'forever')) return { type: 'forever' };
  return null;
}

function readDimensions(container: Element | null, into: Record<string, string>): void {
  if (!container) return;
  for (const member of childElements(container, NS.xbrldi, 'explicitMember')) {
    const dimension = attr(member, 'dimension');
    const value = textOf(member);
    if (dimension && value) into[dimension] = value;
  }
  for (const member of childElements(container, NS.xbrldi, 'typedMember')) {
    const dimension = attr(member, 'dimension');
    const typed = childElements(member)[0];
    if (dimension && typed) into[dimension] = typed.nodeName;
  }
}

export function parseContext(el: Element): Context | null {
  const contextId = attr(el, 'id');
  if (!contextId) return null;

  const entity = firstChild(el, NS.xbrli, 'entity');
  const identifier = entity ? firstChild(entity, NS.xbrli, 'identifier') : null;
  const dimensions: Record<string, string> = {};
  readDimensions(entity ? firstChild(entity, NS.xbrli, 'segment') : null, dimensions);
  readDimensions(firstChild(el, NS.xbrli, 'scenario'), dimensions);

  return {
    context_id: contextId,
    entity: {
      scheme: identifier ? attr(identifier, 'scheme') ?? '' : '',
      identifier: textOf(identifier) ?? '',
    },
    period: parsePeriod(firstChild(el, NS.xbrli, 'period')),
    dimensions,
  };
}

function measures(container: Element | null): string[] {
  if (!container) return [];
  return childElements(container, NS.xbrli, 'measure')
    .map(m => textOf(m))
    .filter((m): m is string => m !== null);
}

export function parseUnit(el: Element): Unit | null {
  const unitId = attr(el, 'id');
  if (!unitId) return null;
  const divide = firstChild(el, NS.xbrli, 'divide');
  if (divide) {
    return {
      unit_id: unitId,
      kind: 'divide',
      numerator: measures(firstChild(divide, NS.xbrli, 'unitNumerator')),
      denominator: measures(firstChild(divide, NS.xbrli, 'unitDenominator')),
    };
  }
  return { unit_id: unitId, kind: 'simple', measures: measures(el) };
}

function isStructural(el: Element): boolean {
  if (el.namespaceURI === NS.link) return true;
  return el.namespaceURI === NS.xbrli && (el.localName === 'context' || el.localName === 'unit');
}

export function parseInstance(content: string, source: string = 'instance'): ParsedInstance {
  const root = parseXml(content, source);
  const prefixes = namespaceDeclarations(root);

  const contexts = new Map<string, Context>();
  const units = new Map<string, Unit>();
  const facts: Fact[] = [];

  const elementIdOf = (el: Element): string => {
    const local = el.localName;
    const uri = el.namespaceURI;
    if (!uri) return local;
    const prefix = prefixes.get(uri) ?? guessPrefix(uri);
    return prefix ? `${prefix}:${local}` : local;
  };

  const readFact = (el: Element): void => {
    const contextRef = attr(el, 'contextRef');
    if (!contextRef) return;

    let value = ownText(el).trim();
    if (!value) {
      const nested = childElements(el)[0];
      if (nested) value = ownText(nested).trim();
    }

    facts.push(Object.freeze({
      element_id: elementIdOf(el),
      context_ref: contextRef,
      value,
      numeric_value: parseNumericValue(value),
      decimals: parseDecimals(attr(el, 'decimals')),
      unit_ref: attr(el, 'unitRef'),
      instance_id: facts.length,
    }));
  };

  for (const child of childElements(root)) {
    if (child.namespaceURI === NS.xbrli && child.localName === 'context') {
      const ctx = parseContext(child);
      if (ctx) contexts.set(ctx.context_id, ctx);
      continue;
    }
    if (child.namespaceURI === NS.xbrli && child.localName === 'unit') {
      const unit = parseUnit(child);
      if (unit) units.set(unit.unit_id, unit);
      continue;
    }
    if (isStructural(child)) continue;

    readFact(child);
    // wrapper elements (tuples) carry their facts one level down
    for (const nested of childElements(child)) readFact(nested);
  }

  return { contexts, units, facts };
}
