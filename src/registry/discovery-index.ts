/**
 * Discovery Index
 *
 * Cheap enumeration of registered tools: names and categories only.
 * Anything that needs a summary or parameter schema goes through the
 * Resolver instead, so listing cost never grows with schema size.
 */

import type { DescriptorSource, DiscoveryEntry } from '../types.js';

export interface CategorySummary {
  category: string;
  count: number;
}

export interface SearchOptions {
  /** Max results (default: 5) */
  limit?: number;
}

export class DiscoveryIndex {
  constructor(
    private readonly source: DescriptorSource,
    private readonly defaultSearchLimit = 5
  ) {}

  /**
   * List tools, optionally restricted to one category.
   * An unknown category yields an empty list.
   */
  async discover(category?: string): Promise<DiscoveryEntry[]> {
    const entries: DiscoveryEntry[] = [];
    for await (const entry of this.source.listAll()) {
      if (category === undefined || entry.category === category) {
        // Rebuild the projection so nothing beyond name/category leaks through
        entries.push({ name: entry.name, category: entry.category });
      }
    }
    return entries;
  }

  /**
   * Distinct categories with their tool counts, sorted by category.
   */
  async categories(): Promise<CategorySummary[]> {
    const counts = new Map<string, number>();
    for await (const entry of this.source.listAll()) {
      counts.set(entry.category, (counts.get(entry.category) ?? 0) + 1);
    }
    return [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([category, count]) => ({ category, count }));
  }

  /**
   * Keyword search over names and categories.
   * Each keyword scores 10 on an exact name, 5 on a name substring and
   * 2 on a category substring. Ties are broken by name.
   */
  async search(query: string, options: SearchOptions = {}): Promise<DiscoveryEntry[]> {
    const limit = options.limit ?? this.defaultSearchLimit;
    const entries = await this.discover();
    const keywords = query
      .toLowerCase()
      .split(/[\s_\-]+/)
      .filter((k) => k.length > 0);

    if (keywords.length === 0) {
      return entries.slice(0, limit);
    }

    const scored = entries.map((entry) => {
      const name = entry.name.toLowerCase();
      const category = entry.category.toLowerCase();
      let score = 0;
      for (const keyword of keywords) {
        if (name === keyword) score += 10;
        else if (name.includes(keyword)) score += 5;
        if (category.includes(keyword)) score += 2;
      }
      return { entry, score };
    });

    // discover() is already name-sorted and sort is stable
    return scored
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((s) => s.entry);
  }
}
