/**
 * Shared fixtures for site-decision tests
 */

import { vi } from 'vitest';
import type { Logger } from '../../../common/logger.js';
import { loadSiteCatalog } from '../catalog/catalog.loader.js';
import type { MarketContext } from '../contracts/site-decision.types.js';

export const catalog = loadSiteCatalog();

export const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}) satisfies Logger;

/**
 * Neutral context: medium income, mid rent, no seasonality.
 */
export function makeContext(overrides: Partial<MarketContext> = {}): MarketContext {
  return {
    osmCounts: {},
    categoryCounts: {},
    populationDensity: 1500,
    incomeLevel: 'medium',
    footTrafficScore: 0.5,
    rentLevel: 2,
    seasonalFactor: 1,
    ...overrides,
  };
}

/** The site used by the quick-screen example. */
export const EXAMPLE_OSM = { police: 1, hospital: 0, bus_stop: 3, subway: 0, school: 2, office: 1, park: 0 };

/** Category counts that throw on every read. */
export function unreadableCounts(): Record<string, number> {
  const fail = (): never => {
    throw new Error('category counts unavailable');
  };
  return new Proxy<Record<string, number>>({}, { ownKeys: fail, getOwnPropertyDescriptor: fail, get: fail, has: fail });
}
