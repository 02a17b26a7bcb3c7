/**
 * Maps provider category labels ("Coffee Shop", "Bubble Tea Shop") to
 * business ids. The longest matching keyword wins; ties go to the business
 * listed first in the table.
 */

import type { BusinessId } from '../site-decision/contracts/site-decision.types.js';
import type { Place } from './area-data.types.js';

export type PlaceCategoryTable = Readonly<Record<BusinessId, readonly string[]>>;

export function mapPlaceCategory(table: PlaceCategoryTable, label: string): BusinessId | undefined {
  const text = label.toLowerCase();
  let best: BusinessId | undefined;
  let bestLength = 0;

  for (const [businessId, keywords] of Object.entries(table)) {
    for (const keyword of keywords) {
      if (keyword.length > bestLength && text.includes(keyword)) {
        best = businessId;
        bestLength = keyword.length;
      }
    }
  }
  return best;
}

export function countCategories(places: readonly Place[]): Record<BusinessId, number> {
  const counts: Record<BusinessId, number> = {};
  for (const place of places) {
    if (!place.businessId) continue;
    counts[place.businessId] = (counts[place.businessId] ?? 0) + 1;
  }
  return counts;
}
