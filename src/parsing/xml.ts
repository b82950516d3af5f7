import { DOMParser } from '@xmldom/xmldom';
import { XbrlProcessingError } from '../core/errors.js';
import { debug } from '../core/logger.js';

/**
 * Thin helpers over @xmldom/xmldom. All lookups are namespace-aware so
 * filers that pick unusual prefixes still parse.
 */

export const NS = {
  xlink: 'http://www.w3.org/1999/xlink',
  xsd: 'http://www.w3.org/2001/XMLSchema',
  xbrli: 'http://www.xbrl.org/2003/instance',
  link: 'http://www.xbrl.org/2003/linkbase',
  xbrldi: 'http://xbrl.org/2006/xbrldi',
  xml: 'http://www.w3.org/XML/1998/namespace',
} as const;

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

/** Parse XML text, raising XbrlProcessingError (with a snippet) on any parser error */
export function parseXml(content: string, source: string): Element {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => debug(`${source}: ${String(msg)}`),
      error: (msg: unknown) => { problems.push(String(msg)); },
      fatalError: (msg: unknown) => { problems.push(String(msg)); },
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(content, 'text/xml');
  } catch (err) {
    throw new XbrlProcessingError(err instanceof Error ? err.message : String(err), source, content);
  }

  if (problems.length > 0) {
    throw new XbrlProcessingError(problems[0], source, content);
  }
  const root = doc.documentElement;
  if (!root) {
    throw new XbrlProcessingError('no document element', source, content);
  }
  return root;
}

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

/** Direct element children, optionally filtered by namespace + local name */
export function childElements(parent: Element, ns?: string, local?: string): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (!isElement(node)) continue;
    if (ns !== undefined && node.namespaceURI !== ns) continue;
    if (local !== undefined && node.localName !== local) continue;
    out.push(node);
  }
  return out;
}

export function firstChild(parent: Element, ns: string, local: string): Element | null {
  return childElements(parent, ns, local)[0] ?? null;
}

/** All descendants matching namespace + local name, in document order */
export function descendants(root: Element, ns: string, local: string): Element[] {
  const out: Element[] = [];
  const list = root.getElementsByTagNameNS(ns, local);
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) out.push(el);
  }
  return out;
}

export function attr(el: Element, name: string): string | null {
  const value = el.getAttribute(name);
  return value ? value : null;
}

/** Namespaced attribute, falling back to the conventional prefixed name */
export function attrNS(el: Element, ns: string, local: string, prefix: string): string | null {
  const value = el.getAttributeNS(ns, local) || el.getAttribute(`${prefix}:${local}`);
  return value ? value : null;
}

export function xlink(el: Element, local: string): string | null {
  return attrNS(el, NS.xlink, local, 'xlink');
}

/** Text directly inside the element, ignoring nested elements */
export function ownText(el: Element): string {
  let text = '';
  const nodes = el.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (node && (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE)) {
      text += node.nodeValue ?? '';
    }
  }
  return text;
}

export function textOf(el: Element | null): string | null {
  if (!el) return null;
  const text = (el.textContent ?? '').trim();
  return text || null;
}

/** Namespace declarations on an element: URI -> prefix */
export function namespaceDeclarations(el: Element): Map<string, string> {
  const out = new Map<string, string>();
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i++) {
    const a = attrs.item(i);
    if (a && a.name.startsWith('xmlns:')) {
      out.set(a.value, a.name.slice('xmlns:'.length));
    }
  }
  return out;
}
