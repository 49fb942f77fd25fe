/**
 * Hit list test helper
 * Builds small lists and domains with quiet logging
 */

import { Logger } from '../../src/lib/logger.js';
import { TopHits, type TopHitsOptions } from '../../src/services/top-hits.js';
import { createEmptyDomain, findBestDomain, type Domain, type Hit } from '../../src/models/hit.js';

/**
 * Logger that writes nowhere
 */
export function createQuietLogger(): Logger {
  return new Logger({ console: false });
}

/**
 * Create a list, failing the test if allocation fails
 */
export function createTestList(options: TopHitsOptions = {}): TopHits {
  return TopHits.create({ logger: createQuietLogger(), ...options })._unsafeUnwrap();
}

/**
 * Append one hit per key; names default to h0, h1, ...
 */
export function addKeys(list: TopHits, keys: number[], names?: string[]): Hit[] {
  return keys.map((sortKey, i) =>
    list.add({ name: names?.[i] ?? `h${i}`, sortKey, score: sortKey })._unsafeUnwrap()
  );
}

/**
 * Create a sorted list holding the given keys
 */
export function createSortedList(keys: number[], names?: string[], options: TopHitsOptions = {}): TopHits {
  const list = createTestList(options);
  addKeys(list, keys, names);
  list.sort();
  return list;
}

export function rankedKeys(list: TopHits): number[] {
  return list.ranked().map(hit => hit.sortKey);
}

export function rankedNames(list: TopHits): Array<string | null> {
  return list.ranked().map(hit => hit.name);
}

export function makeDomain(overrides: Partial<Domain> = {}): Domain {
  return { ...createEmptyDomain(), ...overrides };
}

/**
 * Attach domains to a hit and point bestDomain at the highest scorer
 */
export function attachDomains(hit: Hit, domains: Domain[]): Hit {
  hit.domains = domains;
  hit.bestDomain = findBestDomain(domains);
  return hit;
}
