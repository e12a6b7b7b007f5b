/**
 * Language Aggregation
 * Layer: core
 *
 * Provided ports:
 *   - languages.merge
 *   - languages.shares
 *
 * Pure functions: sums per-repository language bytes and converts the
 * totals into ranked percentage shares.
 */

import type { LanguageBytes, LanguageShare } from './types';

// -----------------------------------------------------------------------------
// Port: languages.merge
// -----------------------------------------------------------------------------

/**
 * Sums bytes per language across repositories.
 */
export function mergeLanguageBytes(perRepo: LanguageBytes[]): LanguageBytes {
  const totals: LanguageBytes = {};
  for (const repo of perRepo) {
    for (const [language, bytes] of Object.entries(repo)) {
      totals[language] = (totals[language] ?? 0) + bytes;
    }
  }
  return totals;
}

// -----------------------------------------------------------------------------
// Port: languages.shares
// -----------------------------------------------------------------------------

/**
 * Converts byte totals into percentage shares, largest first.
 * Ties are broken by name so the output is stable between runs.
 *
 * @param limit - Maximum number of languages returned
 */
export function toLanguageShares(totals: LanguageBytes, limit: number): LanguageShare[] {
  const totalBytes = Object.values(totals).reduce((sum, bytes) => sum + bytes, 0);
  if (totalBytes <= 0) {
    return [];
  }

  return Object.entries(totals)
    .map(([name, bytes]) => ({ name, percentage: (bytes * 100) / totalBytes }))
    .sort((a, b) => b.percentage - a.percentage || a.name.localeCompare(b.name))
    .slice(0, limit);
}
