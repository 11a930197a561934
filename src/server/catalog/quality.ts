/**
 * Catalog quality checks (used by scripts/check-catalog.ts)
 */

import type { AttributeKey, Catalog, EntityId } from '@/server/algo/types';
import { attributeWeight, compareIds } from '@/server/algo/scoring';

export interface AttributeCoverage {
  attributeKey: AttributeKey;
  /** entities whose map lists the attribute */
  entityCount: number;
  questionCount: number;
}

export function computeAttributeCoverage(catalog: Catalog): AttributeCoverage[] {
  const counts = new Map<AttributeKey, number>();
  for (const entity of catalog.entities) {
    for (const key of Object.keys(entity.attributes)) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([attributeKey, entityCount]) => ({
      attributeKey,
      entityCount,
      questionCount: catalog.questionsByAttribute.get(attributeKey)?.length ?? 0,
    }))
    .sort((a, b) => compareIds(a.attributeKey, b.attributeKey));
}

/**
 * Pairs of entities that no question can tell apart
 */
export function findIndistinguishablePairs(
  catalog: Catalog,
  missingAttributeWeight: number = 0
): Array<[EntityId, EntityId]> {
  const keys = [...catalog.questionsByAttribute.keys()];
  const pairs: Array<[EntityId, EntityId]> = [];

  for (let i = 0; i < catalog.entities.length; i++) {
    for (let j = i + 1; j < catalog.entities.length; j++) {
      const a = catalog.entities[i];
      const b = catalog.entities[j];
      const same = keys.every(
        key =>
          attributeWeight(a, key, missingAttributeWeight) ===
          attributeWeight(b, key, missingAttributeWeight)
      );
      if (same) {
        pairs.push([a.id, b.id]);
      }
    }
  }

  return pairs;
}
