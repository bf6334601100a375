/**
 * In-memory source loader
 *
 * Trees are registered up front instead of discovered on disk. Registering
 * the same source twice for a locale behaves like two discovered files:
 * both are returned, in registration order.
 */

import type { RawTranslationInput } from '../schemas/translation-schemas.js';
import type { SourceLoader } from '../translator/types.js';

export class MemorySourceLoader implements SourceLoader {
  /** locale -> source -> registered trees */
  private readonly sources = new Map<string, Map<string, RawTranslationInput[]>>();

  /** locale -> source -> load calls */
  private readonly loads = new Map<string, Map<string, number>>();

  register(locale: string, source: string, tree: RawTranslationInput): this {
    let bySource = this.sources.get(locale);
    if (!bySource) {
      bySource = new Map();
      this.sources.set(locale, bySource);
    }
    const trees = bySource.get(source) ?? [];
    trees.push(tree);
    bySource.set(source, trees);
    return this;
  }

  load(source: string, locale: string): RawTranslationInput[] {
    let counts = this.loads.get(locale);
    if (!counts) {
      counts = new Map();
      this.loads.set(locale, counts);
    }
    counts.set(source, this.loadCount(source, locale) + 1);
    return [...(this.sources.get(locale)?.get(source) ?? [])];
  }

  /**
   * How many times `load` was asked for a pair
   */
  loadCount(source: string, locale: string): number {
    return this.loads.get(locale)?.get(source) ?? 0;
  }
}
