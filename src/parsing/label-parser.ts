import { STANDARD_LABEL, elementIdFromHref } from './element-id.js';
import { NS, descendants, parseXml, xlink, attrNS } from './xml.js';

/**
 * Label linkbase parsing. Labels hang off locators through two hops:
 * loc (href -> element) --labelArc--> label resource (role, lang, text).
 */

export const LABEL_LANG = 'en-US';

export interface LabelAssignment {
  element_id: string;
  role: string;
  text: string;
}

interface LabelResource {
  role: string;
  lang: string;
  text: string;
}

export function labelsFromLinks(links: Element[]): LabelAssignment[] {
  const locators = new Map<string, string>();
  const resources = new Map<string, LabelResource[]>();
  const arcs: Array<{ from: string; to: string }> = [];

  for (const link of links) {
    for (const loc of descendants(link, NS.link, 'loc')) {
      const label = xlink(loc, 'label');
      const href = xlink(loc, 'href');
      if (label && href) locators.set(label, elementIdFromHref(href));
    }
    for (const res of descendants(link, NS.link, 'label')) {
      const label = xlink(res, 'label');
      if (!label) continue;
      const list = resources.get(label) ?? [];
      list.push({
        role: xlink(res, 'role') ?? STANDARD_LABEL,
        lang: attrNS(res, NS.xml, 'lang', 'xml') ?? LABEL_LANG,
        text: (res.textContent ?? '').trim(),
      });
      resources.set(label, list);
    }
    for (const arc of descendants(link, NS.link, 'labelArc')) {
      const from = xlink(arc, 'from');
      const to = xlink(arc, 'to');
      if (from && to) arcs.push({ from, to });
    }
  }

  const out: LabelAssignment[] = [];
  for (const { from, to } of arcs) {
    const elementId = locators.get(from);
    const labels = resources.get(to);
    if (!elementId || !labels) continue;
    for (const res of labels) {
      if (res.lang !== LABEL_LANG || !res.text) continue;
      out.push({ element_id: elementId, role: res.role, text: res.text });
    }
  }
  return out;
}

export function parseLabelLinkbase(content: string, source: string = 'label linkbase'): LabelAssignment[] {
  const root = parseXml(content, source);
  return labelsFromLinks(descendants(root, NS.link, 'labelLink'));
}
