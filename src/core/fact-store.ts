import type { Fact } from './types.js';
import { normalizeElementId } from '../parsing/element-id.js';

/**
 * Immutable fact store keyed by (normalized element id, context id).
 * A store is replaced, never edited; `sign_corrected` records which
 * generation this is.
 */
export class FactStore {
  private readonly byKey: ReadonlyMap<string, Fact>;
  private readonly byElement: ReadonlyMap<string, Fact[]>;

  constructor(facts: Iterable<Fact>, public readonly sign_corrected: boolean = false) {
    const byKey = new Map<string, Fact>();
    for (const fact of facts) {
      // later duplicates replace earlier ones
      byKey.set(FactStore.key(fact.element_id, fact.context_ref), fact);
    }

    const byElement = new Map<string, Fact[]>();
    for (const fact of byKey.values()) {
      const id = normalizeElementId(fact.element_id);
      const list = byElement.get(id) ?? [];
      list.push(fact);
      byElement.set(id, list);
    }

    this.byKey = byKey;
    this.byElement = byElement;
  }

  static key(elementId: string, contextId: string): string {
    return `${normalizeElementId(elementId)}|${contextId}`;
  }

  get size(): number {
    return this.byKey.size;
  }

  getFact(elementId: string, contextId: string): Fact | null {
    return this.byKey.get(FactStore.key(elementId, contextId)) ?? null;
  }

  /** Every fact reported for an element, across all contexts */
  factsForElement(elementId: string): Fact[] {
    return this.byElement.get(normalizeElementId(elementId)) ?? [];
  }

  entries(): IterableIterator<[string, Fact]> {
    return this.byKey.entries();
  }

  all(): Fact[] {
    return [...this.byKey.values()];
  }

  /** A new store holding `facts`, flagged as sign-corrected */
  withCorrections(facts: Iterable<Fact>): FactStore {
    return new FactStore(facts, true);
  }
}
