import type { ElementCatalogEntry } from '../core/types.js';
import type { LabelAssignment } from './label-parser.js';
import { STANDARD_LABEL, normalizeElementId } from './element-id.js';

/**
 * Read-only element catalog. Lookups accept either `ns:Local` or `ns_Local`.
 */
export class ElementCatalog {
  private readonly entries: ReadonlyMap<string, ElementCatalogEntry>;

  constructor(entries: Map<string, ElementCatalogEntry>) {
    this.entries = entries;
  }

  get(elementId: string): ElementCatalogEntry | null {
    return this.entries.get(normalizeElementId(elementId)) ?? null;
  }

  has(elementId: string): boolean {
    return this.entries.has(normalizeElementId(elementId));
  }

  get size(): number {
    return this.entries.size;
  }

  values(): IterableIterator<ElementCatalogEntry> {
    return this.entries.values();
  }

  /** Standard label, else the first label, else null */
  standardLabel(elementId: string): string | null {
    const entry = this.get(elementId);
    if (!entry) return null;
    return entry.labels[STANDARD_LABEL] ?? Object.values(entry.labels)[0] ?? null;
  }
}

/**
 * Merge schema declarations with label assignments. A label for an element
 * the schema never declared gets a placeholder entry rather than being dropped.
 */
export function buildElementCatalog(
  declarations: ElementCatalogEntry[],
  labels: LabelAssignment[]
): ElementCatalog {
  const entries = new Map<string, ElementCatalogEntry>();
  for (const decl of declarations) {
    entries.set(decl.id, { ...decl, labels: { ...decl.labels } });
  }

  for (const { element_id, role, text } of labels) {
    let entry = entries.get(element_id);
    if (!entry) {
      entry = {
        id: element_id,
        name: element_id,
        data_type: '',
        period_type: 'duration',
        balance: null,
        is_abstract: false,
        labels: {},
      };
      entries.set(element_id, entry);
    }
    entry.labels[role] = text;
  }

  for (const entry of entries.values()) Object.freeze(entry.labels);
  return new ElementCatalog(entries);
}
