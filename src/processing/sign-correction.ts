import type { CalculationTree, Diagnosed, Fact } from '../core/types.js';
import type { FactStore } from '../core/fact-store.js';
import { normalizeElementId } from '../parsing/element-id.js';
import { debug } from '../core/logger.js';

/**
 * Calculation-weight sign correction.
 *
 * A fact whose element sits under a negative calculation weight (e.g.
 * "increase in inventory" in operating cash flow) has its numeric value and
 * its text negated. Runs once per load; the result is a new store.
 */

/** Element id -> weight across all roles. Last role wins when an element repeats. */
export function calculationWeights(trees: Iterable<CalculationTree>): Map<string, number> {
  const weights = new Map<string, number>();
  for (const tree of trees) {
    for (const node of tree.all_nodes.values()) {
      weights.set(normalizeElementId(node.element_id), node.weight);
    }
  }
  return weights;
}

/** Flip the sign carried in a fact's text: "1,000" -> "-1,000", "-5" -> "5" */
export function negateText(value: string): string {
  if (!value) return value;
  return value.startsWith('-') ? value.slice(1) : `-${value}`;
}

function negateFact(fact: Fact): Fact {
  if (fact.numeric_value === null) {
    throw new Error(`fact ${fact.element_id}/${fact.context_ref} has no numeric value`);
  }
  return Object.freeze({
    ...fact,
    numeric_value: -fact.numeric_value,
    value: negateText(fact.value),
  });
}

export function applyCalculationWeights(
  store: FactStore,
  trees: Iterable<CalculationTree>
): Diagnosed<FactStore> {
  if (store.sign_corrected) {
    return { value: store, warnings: ['facts are already sign-corrected; skipping'] };
  }

  const warnings: string[] = [];
  let weights: Map<string, number>;
  try {
    weights = calculationWeights(trees);
  } catch (err) {
    warnings.push(`could not index calculation weights: ${err instanceof Error ? err.message : String(err)}`);
    return { value: store.withCorrections(store.all()), warnings };
  }

  const corrected: Fact[] = [];
  let flipped = 0;
  for (const fact of store.all()) {
    const weight = weights.get(normalizeElementId(fact.element_id));
    if (weight === undefined || weight >= 0 || fact.numeric_value === null || fact.numeric_value === 0) {
      corrected.push(fact);
      continue;
    }
    try {
      corrected.push(negateFact(fact));
      flipped++;
    } catch (err) {
      warnings.push(err instanceof Error ? err.message : String(err));
      corrected.push(fact);
    }
  }

  debug(`sign correction flipped ${flipped} fact(s)`);
  return { value: store.withCorrections(corrected), warnings };
}
